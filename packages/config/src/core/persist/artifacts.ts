import fs from "node:fs"
import path from "node:path"
import { Pair, Scalar, YAMLMap } from "yaml"
import type { Clock } from "../../ports/clock"
import type { HierarchyEntry } from "../../ports/source"
import { ArtifactError } from "../errors/errors"
import { joinPath } from "../path/path-matcher"
import { type ConfigState, rawValueOf } from "../state"
import type { ConfigNode } from "../tree/config-node"
import { type BuiltinHookName, isSourceMapping, type SourceMapping, Tagged } from "../tree/tags"
import { buildMetadata, METADATA_KEY } from "./metadata"
import { parseYamlSource, renderYaml, toYamlNode } from "./yaml-codec"

export const HIERARCHY_KEY = "config_hierarchy"

const DEFAULT_EXTENSION = ".yaml"

/** `runs/config` → `runs/config.yaml`; other extensions are kept. */
export function withDefaultExtension(file: string): string {
  return path.extname(file) === "" ? `${file}${DEFAULT_EXTENSION}` : file
}

/** `runs/config.yaml` → `runs/config_hierarchy.yaml` */
export function hierarchyPathFor(file: string): string {
  const ext = path.extname(file)

  return `${file.slice(0, file.length - ext.length)}_hierarchy${ext || DEFAULT_EXTENSION}`
}

function hookOf(state: ConfigState, param: string): BuiltinHookName | undefined {
  for (const rule of state.registry.matching(param, "pre")) {
    if (rule.action.kind === "builtin") return rule.action.hook
  }

  return undefined
}

// Leaves are written as they were before post-processing, so a reload
// post-processes them exactly once. Leaves bound to a built-in hook keep
// its tag so a reload registers them again.
function nodeToYaml(state: ConfigState, node: ConfigNode, prefix: string): YAMLMap {
  const map = new YAMLMap()

  for (const key of node.keys()) {
    const entry = node.entry(key)
    const param = joinPath(prefix, key)

    if (entry?.kind === "leaf") {
      const raw = rawValueOf(state, param, entry.value)
      const hook = hookOf(state, param)
      map.items.push(new Pair(new Scalar(key), toYamlNode(hook ? new Tagged(hook, raw) : raw)))
    } else if (entry?.kind === "node") {
      const child = nodeToYaml(state, entry.node, param)
      child.tag = `!${key}`
      map.items.push(new Pair(new Scalar(key), child))
    }
  }

  return map
}

export function renderConfig(state: ConfigState, clock: Clock): string {
  const metadata: SourceMapping = Object.fromEntries(
    Object.entries(buildMetadata(clock, state.regime, state.variationName)).filter(
      (pair): pair is [string, string | number] => pair[1] !== undefined,
    ),
  )
  const map = nodeToYaml(state, state.root, "")

  map.items.unshift(new Pair(new Scalar(METADATA_KEY), toYamlNode(metadata)))

  return renderYaml(map)
}

export function renderHierarchy(hierarchy: readonly HierarchyEntry[]): string {
  return renderYaml(toYamlNode({ [HIERARCHY_KEY]: [...hierarchy] }))
}

/**
 * Writes `<file>` and `<file>_hierarchy`, creating parent folders.
 * Returns the absolute path of the config file.
 */
export function writeArtifacts(state: ConfigState, clock: Clock, file: string, cwd: string): string {
  const target = path.resolve(cwd, withDefaultExtension(file))

  fs.mkdirSync(path.dirname(target), { recursive: true })
  fs.writeFileSync(target, renderConfig(state, clock), "utf-8")
  fs.writeFileSync(hierarchyPathFor(target), renderHierarchy(state.hierarchy), "utf-8")

  return target
}

export function readHierarchy(file: string, cwd: string = process.cwd()): HierarchyEntry[] {
  const target = path.resolve(cwd, file)
  const { documents } = parseYamlSource(fs.readFileSync(target, "utf-8"), target)
  const entries = documents[0]?.body[HIERARCHY_KEY]

  if (!Array.isArray(entries) || entries.length === 0) {
    throw new ArtifactError(`${target} has no '${HIERARCHY_KEY}' list`, { file: target })
  }

  return entries.map((entry, index) => {
    if (typeof entry === "string" || isSourceMapping(entry)) return entry

    throw new ArtifactError(`Entry ${index} of ${target} is neither a path nor a mapping`, {
      file: target,
      index,
    })
  })
}
