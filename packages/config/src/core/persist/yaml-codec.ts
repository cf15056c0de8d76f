import {
  Document,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  Pair,
  parse,
  parseAllDocuments,
  Scalar,
  YAMLMap,
  YAMLSeq,
} from "yaml"
import type { ParsedSource, SourceDocument } from "../../ports/source"
import { StructureError } from "../errors/errors"
import { isSourceMapping, type SourceMapping, type SourceValue, Tagged } from "../tree/tags"
import type { Scalar as ScalarValue } from "../tree/values"

const CORE_TAG_PREFIX = "tag:yaml.org,2002:"

function localTag(tag: string | undefined): string | undefined {
  if (tag === undefined || tag.startsWith(CORE_TAG_PREFIX) || !tag.startsWith("!")) return undefined

  return tag.slice(1)
}

function toScalar(value: unknown, source: string): ScalarValue {
  if (value === null || value === undefined) return null
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value
  if (typeof value === "bigint") return Number(value)

  throw new StructureError(`Unsupported YAML value in ${source}: ${String(value)}`, { source })
}

// A scalar behind an unknown tag is left as a raw string by the parser.
function resolvePlain(raw: string, source: string): ScalarValue {
  const value: unknown = parse(raw)

  return value === null || typeof value !== "object" ? toScalar(value, source) : raw
}

function keyOf(key: unknown): string {
  return isScalar(key) ? String(key.value) : String(key)
}

function toSourceValue(node: unknown, doc: Document.Parsed, source: string): SourceValue {
  if (isAlias(node)) return toSourceValue(node.resolve(doc), doc, source)

  if (isMap(node)) {
    const mapping: SourceMapping = {}
    for (const pair of node.items) mapping[keyOf(pair.key)] = toSourceValue(pair.value, doc, source)

    const tag = localTag(node.tag)
    return tag === undefined ? mapping : new Tagged(tag, mapping)
  }

  if (isSeq(node)) {
    const items = node.items.map((item) => toSourceValue(item, doc, source))

    const tag = localTag(node.tag)
    return tag === undefined ? items : new Tagged(tag, items)
  }

  if (isScalar(node)) {
    const tag = localTag(node.tag)
    if (tag === undefined) return toScalar(node.value, source)

    const value =
      node.type === "PLAIN" && typeof node.value === "string"
        ? resolvePlain(node.value, source)
        : toScalar(node.value, source)

    return new Tagged(tag, value)
  }

  return null
}

/**
 * Parses a YAML stream into documents. `--- !name` tags a whole document;
 * `key: !name` tags a value.
 */
export function parseYamlSource(text: string, source: string): ParsedSource {
  const documents: SourceDocument[] = []

  for (const doc of parseAllDocuments(text)) {
    const [error] = doc.errors
    if (error) {
      throw new StructureError(`Could not parse ${source}: ${error.message}`, { source }, error)
    }
    if (doc.contents === null) continue

    const value = toSourceValue(doc.contents, doc, source)

    if (value instanceof Tagged && isSourceMapping(value.value)) {
      documents.push({ tag: value.tag, body: value.value })
    } else if (isSourceMapping(value)) {
      documents.push({ body: value })
    } else {
      throw new StructureError(`The top level of each document in ${source} must be a mapping`, { source })
    }
  }

  return { documents }
}

export type YamlNode = Scalar | YAMLMap | YAMLSeq

export function toYamlNode(value: SourceValue): YamlNode {
  if (value instanceof Tagged) {
    const node = toYamlNode(value.value)
    node.tag = `!${value.tag}`
    return node
  }

  if (Array.isArray(value)) {
    const seq = new YAMLSeq()
    for (const item of value) seq.items.push(toYamlNode(item))
    return seq
  }

  if (isSourceMapping(value)) {
    const map = new YAMLMap()
    for (const [key, item] of Object.entries(value)) map.items.push(new Pair(new Scalar(key), toYamlNode(item)))
    return map
  }

  return new Scalar(value)
}

export function renderYaml(contents: YamlNode): string {
  const doc = new Document()
  doc.contents = contents

  return doc.toString()
}
