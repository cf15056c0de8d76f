import path from "node:path"
import type { Logger } from "@strata/logger"
import type { MergeReport } from "../../ports/config"
import type { ProcessingRule } from "../../ports/processing"
import type { ConfigSource } from "../../ports/source"
import { ProcessingError, StructureError, TypeMismatchError, UnknownParameterError } from "../errors/errors"
import { isPattern, joinPath, matchPaths, PathMatcher, splitPath } from "../path/path-matcher"
import { extractMetadata } from "../persist/metadata"
import { createExperimentFolder } from "../processing/experiment-folder"
import { type ApplyOptions, builtin } from "../processing/processing-registry"
import {
  cloneHierarchyEntry,
  type ConfigServices,
  type ConfigState,
  experimentDirectory,
  rawValueOf,
} from "../state"
import type { ConfigNode } from "../tree/config-node"
import { type BuiltinHookName, cloneSourceValue, isSourceMapping, type SourceValue } from "../tree/tags"
import { kindOf, type ParamValue } from "../tree/values"
import { toVariationEntries } from "../variations/variation-expander"
import { type FlatEntry, flatten, toParamValue } from "./flatten"

export type MergeOptions = {
  isDefault: boolean
  /** Append the source to the hierarchy. Off for files pulled in by another source. */
  record?: boolean
}

/**
 * `full` runs every pre-processing rule. `artifact` is used for saved
 * configs, whose values are already pre-processed: only the hooks that
 * register variations and grids run.
 */
type PreProcessingMode = "full" | "artifact"

type Pass = {
  isDefault: boolean
  mode: PreProcessingMode
  source: string
  report: MergeReport
}

const REGISTRATION_HOOKS: ReadonlySet<BuiltinHookName> = new Set(["config_variations", "grid"])

function isString(value: ParamValue): value is string {
  return typeof value === "string"
}

/**
 * Merges sources into a config state, one pass per source.
 *
 * There is no rollback: a pass that throws leaves whatever it already set.
 */
export class MergeEngine {
  private readonly log: Logger
  private readonly sourceDirs: string[] = []

  constructor(
    private readonly state: ConfigState,
    private readonly services: ConfigServices,
  ) {
    this.log = services.logger.child({ module: "merge" })
  }

  merge(source: ConfigSource, options: MergeOptions): MergeReport {
    const parsed = source.load()
    const { documents, metadata } = extractMetadata(parsed.documents, source.name)
    const pass: Pass = {
      isDefault: options.isDefault,
      mode: metadata ? "artifact" : "full",
      source: source.name,
      report: { source: source.name, changed: [], expansions: [] },
    }

    if (metadata) {
      if (options.isDefault) {
        this.state.regime = metadata.regime
        this.state.variationName = metadata.variation
      }
      if (metadata.regime === "unsafe") {
        this.log.warn(`Loading '${source.name}', which was saved under the unsafe regime`, {
          source: source.name,
        })
        this.state.diagnostics.push({ kind: "unsafe-artifact", source: source.name })
      }
    }

    if (options.record ?? true) this.state.hierarchy.push(cloneHierarchyEntry(source.descriptor))

    const dir = typeof source.descriptor === "string" ? path.dirname(source.descriptor) : undefined
    if (dir !== undefined) this.sourceDirs.push(dir)

    try {
      for (const doc of documents) {
        if (doc.tag !== undefined) this.enterNode(doc.tag, pass)
        for (const entry of flatten(doc.body, doc.tag ?? "")) this.apply(entry, pass)
      }
    } finally {
      if (dir !== undefined) this.sourceDirs.pop()
    }

    this.log.debug("Merged source", {
      source: source.name,
      changed: pass.report.changed.length,
      isDefault: options.isDefault,
    })

    return pass.report
  }

  /**
   * Runs post-processing for `paths`, starting each from its value before
   * any earlier post-processing.
   */
  postProcess(paths: Iterable<string>): void {
    const { registry, rawValues, root } = this.state
    const targets = new Set(paths)

    // Contextual rules read other parameters, so they rerun on every pass.
    for (const param of root.leafPaths()) {
      if (registry.matching(param, "post").some((rule) => rule.action.kind === "contextual")) targets.add(param)
    }

    for (const param of targets) {
      const target = root.locate(param)
      const entry = target?.node.entry(target.key)
      if (!target || entry?.kind !== "leaf") continue
      if (registry.matching(param, "post").length === 0) continue

      const raw = rawValueOf(this.state, param, entry.value)
      const processed = this.guarded(param, "post", () =>
        registry.apply(param, raw, "post", {
          dispatch: (hook) => {
            throw new ProcessingError(`Built-in hook '${hook}' only runs during pre-processing`, {
              path: param,
            })
          },
          context: this.contextFor(false),
        }),
      )

      rawValues.set(param, raw)
      target.node.setLeaf(target.key, processed)
    }
  }

  private apply(entry: FlatEntry, pass: Pass): void {
    if (entry.kind === "node") {
      this.enterNode(entry.path, pass)
      return
    }

    if (pass.isDefault) {
      this.applyDefault(entry, pass)
      return
    }

    // Saved configs carry the tags of the hooks they were built with.
    if (entry.hook && pass.mode !== "artifact") {
      throw new StructureError(
        `Hook tag '!${entry.hook}' on '${entry.path}' is only honoured in the default source`,
        { path: entry.path, source: pass.source },
      )
    }

    if (isPattern(entry.path)) this.applyPattern(entry.path, entry.value, entry.replace, pass)
    else this.applyOverride(entry.path, entry.value, entry.replace, pass)
  }

  private enterNode(nodePath: string, pass: Pass): ConfigNode {
    if (pass.isDefault) {
      let node = this.state.root
      for (const segment of splitPath(nodePath)) node = node.ensureNode(segment)
      return node
    }

    const found = this.state.root.find(nodePath)

    if (!found) {
      if (this.crossesLeaf(nodePath)) throw this.notASubConfig(nodePath, pass)
      throw new UnknownParameterError(nodePath, pass.source)
    }
    if (found.kind === "leaf") {
      throw new StructureError(`Tag '${nodePath}' targets a parameter, not a sub-config`, {
        path: nodePath,
        source: pass.source,
      })
    }

    return found.node
  }

  private applyDefault(entry: Extract<FlatEntry, { kind: "leaf" }>, pass: Pass): void {
    if (isPattern(entry.path)) {
      throw new StructureError(`Wildcard key '${entry.path}' is not allowed in the default source`, {
        path: entry.path,
        source: pass.source,
      })
    }

    const segments = splitPath(entry.path)
    const key = segments.pop()
    if (key === undefined) return

    const parent = this.enterNode(joinPath(...segments), pass)
    const existing = parent.entry(key)

    if (existing?.kind === "node") {
      throw new StructureError(`'${entry.path}' is a sub-config and cannot hold a plain value`, {
        path: entry.path,
        source: pass.source,
      })
    }
    if (existing) {
      throw new StructureError(`Parameter '${entry.path}' is set twice in the default config`, {
        path: entry.path,
        source: pass.source,
      })
    }

    if (entry.hook && !this.state.registry.hasBuiltin(entry.path, entry.hook)) {
      this.state.registry.register("pre", entry.path, builtin(entry.hook))
    }

    this.assign(parent, key, entry.path, toParamValue(entry.value, entry.path), pass)
  }

  private applyPattern(pattern: string, value: SourceValue, replace: boolean, pass: Pass): void {
    const matches = matchPaths(pattern, this.state.root.leafPaths())

    pass.report.expansions.push({ pattern, matches })
    this.state.diagnostics.push({ kind: "wildcard-match", pattern, source: pass.source, matches })

    if (matches.length === 0) {
      this.log.warn(`Pattern parameter '${pattern}' will be ignored: it matches no existing parameter`, {
        path: pattern,
        source: pass.source,
      })
      return
    }

    this.log.info(`Pattern parameter '${pattern}' will be merged into: ${matches.join(", ")}`, {
      path: pattern,
      source: pass.source,
      matches,
    })

    for (const match of matches) this.applyOverride(match, cloneSourceValue(value), replace, pass)
  }

  private applyOverride(param: string, value: SourceValue, replace: boolean, pass: Pass): void {
    const found = this.state.root.find(param)

    if (!found) {
      if (this.crossesLeaf(param)) throw this.notASubConfig(param, pass)
      throw new UnknownParameterError(param, pass.source)
    }

    if (found.kind === "node") {
      if (isSourceMapping(value) && !replace) {
        for (const entry of flatten(value, param)) this.apply(entry, pass)
        return
      }
      throw new StructureError(`Sub-config '${param}' can only be merged with a mapping`, {
        path: param,
        source: pass.source,
      })
    }

    const next = toParamValue(value, param)
    const current = kindOf(found.value)
    const incoming = kindOf(next)

    if (!replace && current !== incoming && current !== "null" && incoming !== "null") {
      throw new TypeMismatchError(param, current, incoming, pass.source)
    }

    const target = this.state.root.locate(param)
    if (target) this.assign(target.node, target.key, param, next, pass)
  }

  private assign(node: ConfigNode, key: string, param: string, value: ParamValue, pass: Pass): void {
    node.setLeaf(key, value)
    this.state.provenance.set(param, pass.source)
    this.state.rawValues.delete(param)

    const processed = this.preProcess(param, value, pass)
    if (processed !== value) node.setLeaf(key, processed)

    pass.report.changed.push(param)
  }

  private preProcess(param: string, value: ParamValue, pass: Pass): ParamValue {
    // A saved experiment path names a folder created when the config was first built.
    if (pass.mode === "artifact" && this.state.registry.hasBuiltin(param, "experiment_path")) {
      this.state.experimentParam = param
    }

    const filter =
      pass.mode === "artifact"
        ? (rule: ProcessingRule) =>
            rule.action.kind === "builtin" && REGISTRATION_HOOKS.has(rule.action.hook)
        : undefined

    return this.guarded(param, "pre", () =>
      this.state.registry.apply(param, value, "pre", {
        dispatch: (hook, hookPath, hookValue) => this.runBuiltin(hook, hookPath, hookValue, pass),
        context: this.contextFor(pass.isDefault),
        filter,
      }),
    )
  }

  private contextFor(fromDefault: boolean): ApplyOptions["context"] {
    return (param, phase) => ({
      path: param,
      phase,
      fromDefault,
      cwd: this.services.cwd,
      get: (target) => new PathMatcher(this.state.root).read(target),
      paramPaths: (pattern) => matchPaths(pattern, this.state.root.leafPaths()),
      experimentDirectory: () => experimentDirectory(this.state),
    })
  }

  private guarded(param: string, phase: "pre" | "post", run: () => ParamValue): ParamValue {
    try {
      return run()
    } catch (err) {
      if (err instanceof ProcessingError) {
        this.log.error(`ERROR while ${phase}-processing param '${param}'`, { path: param, phase, err })
      }
      throw err
    }
  }

  private runBuiltin(hook: BuiltinHookName, param: string, value: ParamValue, pass: Pass): ParamValue {
    switch (hook) {
      case "experiment_path":
        return this.registerExperimentPath(param, value)
      case "additional_config_file":
        return this.mergeAdditionalFiles(param, value, pass)
      case "config_variations":
        return this.registerVariations(param, value)
      case "grid":
        return this.registerGrid(param, value)
    }
  }

  private registerExperimentPath(param: string, value: ParamValue): ParamValue {
    if (value === null || value === "") return value
    if (!isString(value)) {
      throw new ProcessingError(`Experiment path '${param}' must be a string`, { path: param })
    }

    const experimentPath = createExperimentFolder(value, this.services.cwd)

    this.state.experimentParam = param
    this.log.info(`Registered experiment folder '${experimentPath}'`, { path: param })

    return experimentPath
  }

  private mergeAdditionalFiles(param: string, value: ParamValue, pass: Pass): ParamValue {
    if (value === null || value === "") return value

    const files = isString(value) ? [value] : Array.isArray(value) && value.every(isString) ? value : undefined
    if (!files) {
      throw new ProcessingError(`Additional config file '${param}' must be a path or a list of paths`, {
        path: param,
      })
    }

    for (const file of files) {
      const source = this.services.resolveSource(file, {
        cwd: this.services.cwd,
        searchDirs: [...this.sourceDirs].reverse(),
      })

      this.log.debug(`Merging additional config file '${source.name}'`, { path: param, source: source.name })
      this.merge(source, { isDefault: pass.isDefault, record: false })
    }

    return value
  }

  private registerVariations(param: string, value: ParamValue): ParamValue {
    if (value === null) {
      this.state.variations.delete(param)
      return value
    }

    this.requireTopLevel(param, "Config variations")
    this.state.variations.set(param, { name: param, entries: toVariationEntries(param, value) })

    return value
  }

  private registerGrid(param: string, value: ParamValue): ParamValue {
    if (value === null) {
      this.state.grids.delete(param)
      return value
    }

    this.requireTopLevel(param, "Grids")
    if (!Array.isArray(value) || !value.every(isString)) {
      throw new StructureError(`Grid '${param}' must be a list of variation names`, { path: param })
    }
    this.state.grids.set(param, { name: param, dimensions: [...value] })

    return value
  }

  private requireTopLevel(param: string, what: string): void {
    if (splitPath(param).length > 1) {
      throw new StructureError(`${what} must be declared in the main config, not in a sub-config ('${param}')`, {
        path: param,
      })
    }
  }

  private crossesLeaf(param: string): boolean {
    const segments = splitPath(param)

    for (let end = 1; end < segments.length; end++) {
      if (this.state.root.find(joinPath(...segments.slice(0, end)))?.kind === "leaf") return true
    }

    return false
  }

  private notASubConfig(param: string, pass: Pass): StructureError {
    return new StructureError(`'${param}' goes through a parameter that is not a sub-config`, {
      path: param,
      source: pass.source,
    })
  }
}
