import fs from "node:fs"
import path from "node:path"
import type { Logger } from "@strata/logger"
import { stringify } from "yaml"
import type { ConfigDifference, Diagnostic, IConfig, MergeReport, OverwritingRegime } from "../ports/config"
import type { ConfigSource, HierarchyEntry, SourceInput, SourceLookup } from "../ports/source"
import { ObjectSource } from "../adapters/object/object-source"
import { ArtifactError, PathNotFoundError, StructureError } from "./errors/errors"
import { createMutationPolicy, type MutationPolicy } from "./guard/overwrite-guard"
import { MergeEngine } from "./merge/merge-engine"
import { matchPaths, PathMatcher } from "./path/path-matcher"
import { writeArtifacts } from "./persist/artifacts"
import {
  cloneHierarchyEntry,
  cloneState,
  type ConfigServices,
  type ConfigState,
  experimentDirectory,
  rawValueOf,
} from "./state"
import { type ParamMapping, type ParamValue, valuesEqual } from "./tree/values"
import { planVariations } from "./variations/variation-expander"

export const CODE_SOURCE = "code"

const DEFAULT_SAVE_NAME = "config.yaml"

/** Directories of the file sources merged so far, most recent first. */
export function sourceLookup(hierarchy: readonly HierarchyEntry[], cwd: string): SourceLookup {
  const searchDirs = hierarchy
    .filter((entry): entry is string => typeof entry === "string")
    .map((file) => path.dirname(file))
    .reverse()

  return { cwd, searchDirs: [...new Set(searchDirs)] }
}

function unique(paths: readonly string[]): string[] {
  return [...new Set(paths)]
}

export class Config implements IConfig {
  private readonly engine: MergeEngine
  private readonly policy: MutationPolicy
  private readonly log: Logger

  constructor(
    private readonly state: ConfigState,
    private readonly services: ConfigServices,
  ) {
    this.engine = new MergeEngine(state, services)
    this.log = services.logger.child({ module: "config", config: state.root.name })
    this.policy = createMutationPolicy(
      state.regime,
      {
        assign: (param, value) => this.assign(param, value),
        mergeValue: (param, value) => {
          this.applyMerge(new ObjectSource({ [param]: value }, { name: CODE_SOURCE }))
        },
        savedPath: () => this.state.savedPath,
        save: (file) => this.save(file),
        report: (diagnostic) => this.state.diagnostics.push(diagnostic),
      },
      this.log,
    )
  }

  get name(): string {
    return this.state.root.name
  }

  get regime(): OverwritingRegime {
    return this.policy.regime
  }

  get hierarchy(): readonly HierarchyEntry[] {
    return this.state.hierarchy.map(cloneHierarchyEntry)
  }

  get savedPath(): string | undefined {
    return this.state.savedPath
  }

  get variationName(): string | undefined {
    return this.state.variationName
  }

  get diagnostics(): readonly Diagnostic[] {
    return [...this.state.diagnostics]
  }

  get(param: string): ParamValue {
    return new PathMatcher(this.state.root).read(param)
  }

  has(param: string): boolean {
    return this.state.root.find(param) !== undefined
  }

  /** True when `param` names a sub-config rather than a leaf. */
  isSubConfig(param: string): boolean {
    return this.state.root.find(param)?.kind === "node"
  }

  paramPaths(pattern?: string): string[] {
    const paths = this.state.root.leafPaths()

    return pattern === undefined ? paths : matchPaths(pattern, paths)
  }

  subConfigPaths(): string[] {
    return this.state.root.nodePaths()
  }

  explain(param: string): string {
    const source = this.state.provenance.get(param)

    if (source === undefined || this.state.root.find(param)?.kind !== "leaf") {
      throw new PathNotFoundError(param)
    }

    return source
  }

  sourcesUsed(): string[] {
    return unique(this.paramPaths().flatMap((param) => this.state.provenance.get(param) ?? []))
  }

  set(param: string, value: ParamValue): void {
    const entry = new PathMatcher(this.state.root).resolve(param)

    if (entry.kind === "node") {
      throw new StructureError(`'${param}' is a sub-config; set its parameters instead`, { path: param })
    }

    this.policy.mutate(param, value)
  }

  merge(input: SourceInput | ConfigSource): MergeReport {
    const report = this.applyMerge(this.services.resolveSource(input, this.lookup()))

    this.policy.afterMerge()

    return report
  }

  save(file?: string): string {
    const target = file ?? this.state.savedPath ?? this.defaultSavePath()
    const written = writeArtifacts(this.state, this.services.clock, target, this.services.cwd)

    this.state.savedPath = written
    this.log.info(`Saved config to '${written}'`, { path: written })

    return written
  }

  /**
   * Builds one independent config per declared variation entry and per grid
   * combination. Each child's hierarchy ends with the patches it received.
   */
  createVariations(): Config[] {
    const plans = planVariations(this.state.variations, this.state.grids)
    const parentFolder = this.experimentDirectory()

    const children = plans.map((plan) => {
      const childState = cloneState(this.state)
      childState.savedPath = undefined
      childState.variationName = plan.name
      childState.diagnostics = []

      const engine = new MergeEngine(childState, this.services)
      const changed: string[] = []

      for (const { patch } of plan.patches) {
        const source = this.services.resolveSource(patch, sourceLookup(childState.hierarchy, this.services.cwd))
        changed.push(...engine.merge(source, { isDefault: false }).changed)
      }
      engine.postProcess(unique(changed))

      if (parentFolder !== undefined) {
        fs.mkdirSync(path.resolve(this.services.cwd, parentFolder, plan.name), { recursive: true })
      }

      return new Config(childState, this.services)
    })

    this.log.info(`Created ${children.length} variation(s)`, {
      variations: children.map((child) => child.variationName),
    })

    return children
  }

  /**
   * Folder registered through the experiment_path hook. Variation children
   * get a sub-folder named after the variation.
   */
  experimentDirectory(): string | undefined {
    return experimentDirectory(this.state)
  }

  /**
   * Parameters whose values differ from `other`, compared before
   * post-processing, each with its value in `other`. Parameters `other`
   * lacks come first, in this config's order, with `undefined`; parameters
   * only `other` has follow.
   */
  compare(other: Config): ConfigDifference[] {
    const differences: ConfigDifference[] = []
    const ours = this.paramPaths()

    for (const param of ours) {
      if (other.state.root.find(param)?.kind !== "leaf") {
        differences.push({ path: param, value: undefined })
        continue
      }

      const theirs = other.rawValue(param)
      if (!valuesEqual(this.rawValue(param), theirs)) differences.push({ path: param, value: theirs })
    }

    const known = new Set(ours)
    for (const param of other.paramPaths()) {
      if (!known.has(param)) differences.push({ path: param, value: other.rawValue(param) })
    }

    return differences
  }

  clone(): Config {
    return new Config(cloneState(this.state), this.services)
  }

  /** The only way to change the regime: a copy built under another one. */
  withRegime(regime: OverwritingRegime): Config {
    return new Config({ ...cloneState(this.state), regime }, this.services)
  }

  toObject(): ParamMapping {
    return this.state.root.toObject()
  }

  /** `--path=literal` tokens that rebuild the current values through the command line. */
  toCommandLine(pattern?: string): string[] {
    return this.paramPaths(pattern).flatMap((param) => {
      const value = this.get(param)
      if (value === null) return []

      const literal = typeof value === "boolean" || typeof value === "number" ? String(value) : flowLiteral(value)

      return [`--${param}=${literal}`]
    })
  }

  private defaultSavePath(): string {
    const folder = this.experimentDirectory()

    if (folder === undefined) {
      throw new ArtifactError("No file given to save() and no experiment folder registered", {
        config: this.name,
      })
    }

    return path.join(folder, DEFAULT_SAVE_NAME)
  }

  private lookup(): SourceLookup {
    return sourceLookup(this.state.hierarchy, this.services.cwd)
  }

  private applyMerge(source: ConfigSource): MergeReport {
    const report = this.engine.merge(source, { isDefault: false })

    this.engine.postProcess(unique(report.changed))

    return report
  }

  private rawValue(param: string): ParamValue {
    return rawValueOf(this.state, param, this.get(param))
  }

  private assign(param: string, value: ParamValue): void {
    new PathMatcher(this.state.root).write(param, value)
    this.state.provenance.set(param, CODE_SOURCE)
    this.state.rawValues.delete(param)
  }
}

function flowLiteral(value: ParamValue): string {
  return stringify(value, { collectionStyle: "flow", lineWidth: 0 }).trimEnd()
}
