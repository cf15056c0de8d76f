import type { BuiltinHookName } from "../core/tree/tags"
import type { ParamValue } from "../core/tree/values"

export type ProcessingPhase = "pre" | "post"

/**
 * A processing hook: one value in, one value out.
 */
export type Transform = (value: ParamValue) => ParamValue

export type BuiltinRef = { readonly builtin: BuiltinHookName }

/**
 * Read-only view of the config a contextual transform runs in.
 */
export type ProcessingContext = {
  /** Path of the parameter being processed. */
  readonly path: string
  readonly phase: ProcessingPhase
  /** True while the default source is being merged. */
  readonly fromDefault: boolean
  readonly cwd: string
  get(path: string): ParamValue
  paramPaths(pattern: string): string[]
  experimentDirectory(): string | undefined
}

/**
 * A transform that needs the surrounding config. `bind` is called each time
 * the rule applies and returns the one-argument transform to run.
 */
export type ContextualTransform = {
  readonly name: string
  readonly bind: (context: ProcessingContext) => Transform
}

export type ProcessingHandler = Transform | BuiltinRef | ContextualTransform

export type ProcessingAction =
  | { kind: "transform"; name: string; transform: Transform }
  | { kind: "contextual"; name: string; bind: ContextualTransform["bind"] }
  | { kind: "builtin"; hook: BuiltinHookName }

export type ProcessingRule = {
  readonly pattern: string
  readonly action: ProcessingAction
}

/**
 * A rule as supplied by the embedding application. Lists are applied in
 * order; when several patterns match a path, every one of them runs.
 *
 * @example
 * ```ts
 * const pre: RuleInput[] = [
 *   ["*.lr", inRange(0, 1)],
 *   ["run.folder", builtin("experiment_path")],
 * ]
 * ```
 */
export type RuleInput = readonly [pattern: string, handler: ProcessingHandler]
