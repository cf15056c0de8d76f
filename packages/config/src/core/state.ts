import path from "node:path"
import type { Logger } from "@strata/logger"
import type { Clock } from "../ports/clock"
import type { Diagnostic, OverwritingRegime } from "../ports/config"
import type { HierarchyEntry, SourceResolver } from "../ports/source"
import type { ProcessingRegistry } from "./processing/processing-registry"
import { cloneSourceMapping } from "./tree/tags"
import { ConfigNode } from "./tree/config-node"
import type { ParamValue } from "./tree/values"
import type { Grid, Variation } from "./variations/variation-expander"

/**
 * Everything a built config owns. Cloning it yields a fully independent tree.
 */
export type ConfigState = {
  root: ConfigNode
  hierarchy: HierarchyEntry[]
  regime: OverwritingRegime
  savedPath: string | undefined
  /** Leaf path → name of the source that last set it. */
  provenance: Map<string, string>
  /** Leaf path → value before post-processing, for post-processed leaves. */
  rawValues: Map<string, ParamValue>
  registry: ProcessingRegistry
  variations: Map<string, Variation>
  grids: Map<string, Grid>
  /** Parameter registered with the experiment_path hook, if any. */
  experimentParam: string | undefined
  variationName: string | undefined
  diagnostics: Diagnostic[]
}

export type ConfigServices = {
  logger: Logger
  clock: Clock
  cwd: string
  resolveSource: SourceResolver
}

export function createState(
  name: string,
  regime: OverwritingRegime,
  registry: ProcessingRegistry,
): ConfigState {
  return {
    root: new ConfigNode(name),
    hierarchy: [],
    regime,
    savedPath: undefined,
    provenance: new Map(),
    rawValues: new Map(),
    registry,
    variations: new Map(),
    grids: new Map(),
    experimentParam: undefined,
    variationName: undefined,
    diagnostics: [],
  }
}

/** Value stored before post-processing, or the live value when none was recorded. */
export function rawValueOf(state: ConfigState, param: string, current: ParamValue): ParamValue {
  return state.rawValues.has(param) ? (state.rawValues.get(param) ?? null) : current
}

/**
 * Folder registered through the experiment_path hook. Variation children
 * get a sub-folder named after the variation.
 */
export function experimentDirectory(state: ConfigState): string | undefined {
  const param = state.experimentParam
  if (param === undefined) return undefined

  const entry = state.root.find(param)
  if (entry?.kind !== "leaf" || typeof entry.value !== "string" || entry.value === "") return undefined

  return state.variationName === undefined ? entry.value : path.join(entry.value, state.variationName)
}

export function cloneHierarchyEntry(entry: HierarchyEntry): HierarchyEntry {
  return typeof entry === "string" ? entry : cloneSourceMapping(entry)
}

export function cloneState(state: ConfigState): ConfigState {
  return {
    root: state.root.clone(),
    hierarchy: state.hierarchy.map(cloneHierarchyEntry),
    regime: state.regime,
    savedPath: state.savedPath,
    provenance: new Map(state.provenance),
    rawValues: new Map([...state.rawValues].map(([path, value]) => [path, structuredClone(value)])),
    registry: state.registry.clone(),
    variations: new Map(
      [...state.variations].map(([name, v]) => [
        name,
        { name: v.name, entries: v.entries.map((e) => ({ name: e.name, patch: cloneHierarchyEntry(e.patch) })) },
      ]),
    ),
    grids: new Map([...state.grids].map(([name, g]) => [name, { name: g.name, dimensions: [...g.dimensions] }])),
    experimentParam: state.experimentParam,
    variationName: state.variationName,
    diagnostics: [...state.diagnostics],
  }
}
