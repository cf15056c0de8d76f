import { StructureError } from "../errors/errors"
import { joinPath, splitPath } from "../path/path-matcher"
import {
  type BuiltinHookName,
  isBuiltinHookName,
  isSourceMapping,
  REPLACE_TAG,
  type SourceMapping,
  type SourceValue,
  Tagged,
} from "../tree/tags"
import type { ParamValue } from "../tree/values"

export type FlatEntry =
  | { kind: "node"; path: string }
  | {
      kind: "leaf"
      path: string
      value: Exclude<SourceValue, Tagged>
      replace: boolean
      hook?: BuiltinHookName
    }

/**
 * Turns a mapping into dotted (path, value) pairs in source order.
 *
 * A mapping tagged with its own key becomes a node entry followed by its
 * children. Untagged mappings stay whole: whether they are opaque values or
 * patches for an existing sub-config is decided against the tree.
 */
export function flatten(mapping: SourceMapping, prefix = ""): FlatEntry[] {
  const out: FlatEntry[] = []

  for (const [key, raw] of Object.entries(mapping)) {
    const path = joinPath(prefix, key)

    if (!(raw instanceof Tagged)) {
      out.push({ kind: "leaf", path, value: raw, replace: false })
      continue
    }

    const inner = raw.value
    if (inner instanceof Tagged) {
      throw new StructureError(`'${path}' carries more than one tag`, { path })
    }

    if (raw.tag === REPLACE_TAG) {
      out.push({ kind: "leaf", path, value: inner, replace: true })
    } else if (isBuiltinHookName(raw.tag)) {
      out.push({ kind: "leaf", path, value: inner, replace: false, hook: raw.tag })
    } else if (isSourceMapping(inner)) {
      const name = splitPath(key).at(-1)

      if (raw.tag !== name && raw.tag !== key) {
        throw new StructureError(`Tag '!${raw.tag}' does not match the parameter name '${key}'`, {
          path,
          tag: raw.tag,
        })
      }
      out.push({ kind: "node", path }, ...flatten(inner, path))
    } else {
      throw new StructureError(`Tag '!${raw.tag}' on '${path}' is neither a sub-config nor a known hook`, {
        path,
        tag: raw.tag,
      })
    }
  }

  return out
}

/** Strips a source value down to plain data; tags are not allowed below this point. */
export function toParamValue(value: SourceValue, path: string): ParamValue {
  if (value instanceof Tagged) {
    throw new StructureError(`Unexpected tag '!${value.tag}' inside the value of '${path}'`, {
      path,
      tag: value.tag,
    })
  }
  if (Array.isArray(value)) return value.map((item) => toParamValue(item, path))
  if (isSourceMapping(value)) {
    const out: Record<string, ParamValue> = {}

    for (const [key, item] of Object.entries(value)) out[key] = toParamValue(item, path)

    return out
  }

  return value
}
