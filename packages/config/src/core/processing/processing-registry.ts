import type {
  BuiltinRef,
  ProcessingAction,
  ProcessingContext,
  ProcessingHandler,
  ProcessingPhase,
  ProcessingRule,
  RuleInput,
  Transform,
} from "../../ports/processing"
import { isConfigError } from "../errors/config-error"
import { ProcessingError } from "../errors/errors"
import { matchesPattern } from "../path/path-matcher"
import type { BuiltinHookName } from "../tree/tags"
import { isParamValue, type ParamValue } from "../tree/values"

export function builtin(hook: BuiltinHookName): BuiltinRef {
  return { builtin: hook }
}

/** Runs a built-in hook for one path. Supplied by the merge engine. */
export type BuiltinDispatcher = (hook: BuiltinHookName, path: string, value: ParamValue) => ParamValue

export type ApplyOptions = {
  dispatch: BuiltinDispatcher
  /** Context handed to contextual transforms. */
  context: (path: string, phase: ProcessingPhase) => ProcessingContext
  /** Rules for which this returns false are skipped. */
  filter?: (rule: ProcessingRule) => boolean
}

function isBuiltinRef(handler: ProcessingHandler): handler is BuiltinRef {
  return typeof handler !== "function" && "builtin" in handler
}

function toAction(handler: ProcessingHandler): ProcessingAction {
  if (isBuiltinRef(handler)) return { kind: "builtin", hook: handler.builtin }
  if (typeof handler !== "function") return { kind: "contextual", name: handler.name, bind: handler.bind }

  if (handler.length > 1) {
    throw new ProcessingError(
      `Processing function '${handler.name || "anonymous"}' must take exactly one argument, it declares ${handler.length}`,
      { function: handler.name },
    )
  }

  return { kind: "transform", name: handler.name || "anonymous", transform: handler }
}

/**
 * Ordered pattern→transform bindings for the pre and post phases.
 *
 * Precedence is declaration order only: a later, more specific pattern
 * does not shadow an earlier, broader one; both run, earlier first.
 */
export class ProcessingRegistry {
  private readonly phases: Record<ProcessingPhase, ProcessingRule[]> = { pre: [], post: [] }

  constructor(rules: { pre?: readonly RuleInput[]; post?: readonly RuleInput[] } = {}) {
    for (const [pattern, handler] of rules.pre ?? []) this.register("pre", pattern, handler)
    for (const [pattern, handler] of rules.post ?? []) this.register("post", pattern, handler)
  }

  register(phase: ProcessingPhase, pattern: string, handler: ProcessingHandler): void {
    if (phase === "post" && isBuiltinRef(handler)) {
      throw new ProcessingError(`Built-in hook '${handler.builtin}' can only be registered for pre-processing`, {
        pattern,
      })
    }
    this.phases[phase].push({ pattern, action: toAction(handler) })
  }

  rules(phase: ProcessingPhase): readonly ProcessingRule[] {
    return this.phases[phase]
  }

  matching(path: string, phase: ProcessingPhase): ProcessingRule[] {
    return this.phases[phase].filter((rule) => matchesPattern(rule.pattern, path))
  }

  hasBuiltin(path: string, hook: BuiltinHookName): boolean {
    return this.matching(path, "pre").some(
      (rule) => rule.action.kind === "builtin" && rule.action.hook === hook,
    )
  }

  /**
   * Threads `value` through every matching rule of `phase`, in declared order.
   */
  apply(path: string, value: ParamValue, phase: ProcessingPhase, options: ApplyOptions): ParamValue {
    let current = value

    for (const rule of this.matching(path, phase)) {
      if (options.filter && !options.filter(rule)) continue

      const { action } = rule

      if (action.kind === "builtin") {
        current = options.dispatch(action.hook, path, current)
      } else if (action.kind === "contextual") {
        const context = options.context(path, phase)
        current = runTransform(action.name, (value) => action.bind(context)(value), path, current, phase)
      } else {
        current = runTransform(action.name, action.transform, path, current, phase)
      }
    }

    return current
  }

  /** Patterns (per phase) that match none of `paths`. */
  unmatched(paths: readonly string[]): Array<{ phase: ProcessingPhase; pattern: string }> {
    const out: Array<{ phase: ProcessingPhase; pattern: string }> = []

    for (const phase of ["pre", "post"] as const) {
      const seen = new Set<string>()

      for (const { pattern } of this.phases[phase]) {
        if (seen.has(pattern)) continue
        seen.add(pattern)
        if (!paths.some((path) => matchesPattern(pattern, path))) out.push({ phase, pattern })
      }
    }

    return out
  }

  clone(): ProcessingRegistry {
    const copy = new ProcessingRegistry()

    copy.phases.pre.push(...this.phases.pre)
    copy.phases.post.push(...this.phases.post)

    return copy
  }
}

function runTransform(
  name: string,
  transform: Transform,
  path: string,
  value: ParamValue,
  phase: ProcessingPhase,
): ParamValue {
  let result: unknown

  try {
    result = transform(value)
  } catch (err) {
    if (isConfigError(err)) throw err

    throw new ProcessingError(
      `ERROR while ${phase}-processing '${path}' with '${name}': ${err instanceof Error ? err.message : String(err)}`,
      { path, phase, function: name },
      err,
    )
  }

  if (result === undefined) {
    throw new ProcessingError(`'${name}' returned nothing while ${phase}-processing '${path}'`, {
      path,
      phase,
      function: name,
    })
  }

  if (!isParamValue(result)) {
    throw new ProcessingError(
      `'${name}' returned a value that is not plain data while ${phase}-processing '${path}'`,
      { path, phase, function: name },
    )
  }

  return result
}
