import type { ParamValue } from "../core/tree/values"
import type { ProcessingPhase } from "./processing"
import type { ConfigSource, HierarchyEntry, SourceInput } from "./source"

export const overwritingRegimes = ["locked", "unsafe", "auto-save"] as const

/**
 * Policy for direct mutation after construction:
 * - `locked`: rejected
 * - `unsafe`: applied as-is, no checks
 * - `auto-save`: applied through the merge pipeline, then re-saved if the config was saved
 */
export type OverwritingRegime = (typeof overwritingRegimes)[number]

/** Non-fatal signals raised while building or mutating a config. */
export type Diagnostic =
  | { kind: "wildcard-match"; pattern: string; source: string; matches: string[] }
  | { kind: "unmatched-pattern"; pattern: string; phase: ProcessingPhase }
  | { kind: "unknown-flag"; name: string }
  | { kind: "auto-save"; file: string }
  | { kind: "unsafe-regime" }
  | { kind: "unsafe-artifact"; source: string }

export type WildcardExpansion = {
  pattern: string
  matches: string[]
}

export type MergeReport = {
  source: string
  /** Leaf paths the merge set, in merge order. */
  changed: string[]
  expansions: WildcardExpansion[]
}

/** A parameter that differs between two configs, with its value in the other one. */
export type ConfigDifference = {
  path: string
  /** `undefined` when the other config has no such parameter. */
  value: ParamValue | undefined
}

/**
 * A built parameter tree.
 *
 * @example
 * ```typescript
 * const config = loadConfig({
 *   defaultSource: "configs/default.yaml",
 *   sources: ["configs/small-lr.yaml"],
 *   overrides: ["--model.lr=0.01"],
 * })
 *
 * config.get("model.lr")      // 0.01
 * config.explain("model.lr")  // "command-line"
 * ```
 */
export interface IConfig {
  readonly name: string
  readonly regime: OverwritingRegime
  readonly hierarchy: readonly HierarchyEntry[]
  readonly savedPath: string | undefined
  readonly variationName: string | undefined
  readonly diagnostics: readonly Diagnostic[]

  /** Value at an exact path; a sub-config comes back as a plain mapping. */
  get(path: string): ParamValue

  has(path: string): boolean

  /** Leaf paths, optionally filtered by a pattern, in tree order. */
  paramPaths(pattern?: string): string[]

  /** Name of the source that last set the leaf at `path`. */
  explain(path: string): string

  /** Sources that set at least one leaf still in the tree, in order of first use. */
  sourcesUsed(): string[]

  /** Direct mutation, governed by the overwriting regime. */
  set(path: string, value: ParamValue): void

  /** Merges one more source as an experiment (non-default) source. */
  merge(source: SourceInput | ConfigSource): MergeReport

  /** Writes the config and its hierarchy; returns the config file path. */
  save(file?: string): string

  toObject(): Record<string, ParamValue>
}
