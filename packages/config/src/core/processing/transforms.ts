import fs from "node:fs"
import path from "node:path"
import { type ZodType, z } from "zod"
import type { ContextualTransform, ProcessingContext, Transform } from "../../ports/processing"
import { ProcessingError } from "../errors/errors"
import { kindOf, type ParamValue, valuesEqual } from "../tree/values"

/**
 * Validates (and possibly coerces) the value with a zod schema.
 *
 * @example
 * ```ts
 * postProcessing: [["train.epochs", checkSchema(z.number().int().positive())]]
 * ```
 */
export function checkSchema<T extends ParamValue>(schema: ZodType<T>): Transform {
  return function checkSchema(value) {
    const result = schema.safeParse(value)

    if (!result.success) {
      throw new ProcessingError(`Value failed validation:\n${z.prettifyError(result.error)}`, {
        received: value,
      })
    }

    return result.data
  }
}

export function oneOf(allowed: readonly ParamValue[]): Transform {
  return function oneOf(value) {
    if (!allowed.some((candidate) => valuesEqual(candidate, value))) {
      throw new ProcessingError(
        `Value ${JSON.stringify(value)} is not one of ${JSON.stringify(allowed)}`,
        { received: value, allowed },
      )
    }

    return value
  }
}

/** Inclusive bounds. `null` passes, so optional numeric parameters stay optional. */
export function inRange(min: number, max: number): Transform {
  return function inRange(value) {
    if (value === null) return value
    if (typeof value !== "number") {
      throw new ProcessingError(`Expected a number, got a ${kindOf(value)} value`, { received: value })
    }
    if (value < min || value > max) {
      throw new ProcessingError(`Value ${value} is outside [${min}, ${max}]`, { received: value, min, max })
    }

    return value
  }
}

/** Resolves a relative file-system path against `baseDir`. Empty and null values pass through. */
export function resolvePath(baseDir: string): Transform {
  return function resolvePath(value) {
    if (value === null || value === "") return value
    if (typeof value !== "string") {
      throw new ProcessingError(`Expected a path string, got a ${kindOf(value)} value`, { received: value })
    }

    return path.resolve(baseDir, value)
  }
}

function rejectOverride(context: ProcessingContext): void {
  if (!context.fromDefault) {
    throw new ProcessingError(
      `Parameter '${context.path}' is protected, it cannot be set from configs other than the default config`,
      { path: context.path },
    )
  }
}

/** Pre-processing only: any source but the default one setting the parameter is an error. */
export function protectedParam(): ContextualTransform {
  return {
    name: "protectedParam",
    bind: (context) => (value) => {
      if (context.phase !== "pre") {
        throw new ProcessingError("protectedParam only runs during pre-processing", { path: context.path })
      }
      rejectOverride(context)

      return value
    },
  }
}

/**
 * Declares a parameter as a copy of another one, whose path is its default
 * value. Register the same handler for both phases: pre-processing protects
 * the parameter, post-processing replaces the path with the copied value.
 *
 * @example
 * ```ts
 * const copy = copyParam()
 * loadConfig({
 *   defaultSource: { lr: 0.1, eval_lr: "lr" },
 *   preProcessing: [["eval_lr", copy]],
 *   postProcessing: [["eval_lr", copy]],
 * })
 * ```
 */
export function copyParam(): ContextualTransform {
  return {
    name: "copyParam",
    bind: (context) => (value) => {
      if (context.phase === "pre") rejectOverride(context)
      if (typeof value !== "string") {
        throw new ProcessingError(
          `The default value of a copied parameter must be the path of the parameter it copies, got a ${kindOf(value)} value`,
          { path: context.path, received: value },
        )
      }

      if (context.phase === "pre") return value

      const matches = context.paramPaths(value)
      if (matches.length > 1) {
        throw new ProcessingError(`Ambiguous copy: '${value}' matches ${matches.join(", ")}`, {
          path: context.path,
          matches,
        })
      }

      const [source] = matches
      return source === undefined ? value : context.get(source)
    },
  }
}

/**
 * `[pattern, expected]` holds when every parameter matching `pattern` equals
 * `expected`; a third element maps each value before the comparison.
 */
export type FolderCondition =
  | readonly [pattern: string, expected: ParamValue]
  | readonly [pattern: string, expected: ParamValue, map: (value: ParamValue) => ParamValue]

/**
 * Post-processing: places the value inside the experiment folder, and creates
 * that folder when every condition holds.
 *
 * @example
 * ```ts
 * postProcessing: [["weights", folderInExperiment([["mode", "train"]])]]
 * ```
 */
export function folderInExperiment(conditions: readonly FolderCondition[] = []): ContextualTransform {
  return {
    name: "folderInExperiment",
    bind: (context) => (value) => {
      if (typeof value !== "string") {
        throw new ProcessingError(`Expected a folder name, got a ${kindOf(value)} value`, { received: value })
      }

      const experiment = context.experimentDirectory()
      if (experiment === undefined) {
        throw new ProcessingError(`'${context.path}' needs an experiment folder, and none is registered`, {
          path: context.path,
        })
      }

      const folder = path.join(experiment, value).replace(/[\\/]+$/, "")
      const met = conditions.every(([pattern, expected, map]) =>
        context.paramPaths(pattern).every((param) => {
          const current = context.get(param)
          return valuesEqual(map ? map(current) : current, expected)
        }),
      )

      if (met) fs.mkdirSync(path.resolve(context.cwd, folder), { recursive: true })

      return folder
    },
  }
}
