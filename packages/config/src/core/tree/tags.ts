import type { Scalar } from "./values"

/** Tag marking a value that may change the kind of the parameter it replaces. */
export const REPLACE_TAG = "replace"

export const builtinHookNames = [
  "experiment_path",
  "additional_config_file",
  "config_variations",
  "grid",
] as const

export type BuiltinHookName = (typeof builtinHookNames)[number]

export function isBuiltinHookName(tag: string): tag is BuiltinHookName {
  return (builtinHookNames as readonly string[]).includes(tag)
}

/**
 * A value as read from a source, before it lands in the tree: plain data
 * plus tag annotations.
 */
export type SourceValue = Scalar | SourceValue[] | SourceMapping | Tagged

export type SourceMapping = { [key: string]: SourceValue }

/**
 * A tag annotation, as written `key: !tag value` in YAML.
 *
 * On a mapping, the tag names the sub-config the mapping becomes. On a leaf,
 * it selects a built-in hook (`!grid`) or marks a replacement (`!replace`).
 */
export class Tagged {
  constructor(
    readonly tag: string,
    readonly value: SourceValue,
  ) {}
}

export function tagged(tag: string, value: SourceValue): Tagged {
  return new Tagged(tag, value)
}

/**
 * Marks `value` as a full structural replacement, so a later source may
 * change the parameter's kind (e.g. a list replacing a number).
 */
export function replace(value: SourceValue): Tagged {
  return new Tagged(REPLACE_TAG, value)
}

export function isSourceMapping(value: SourceValue): value is SourceMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Tagged)
}

export function cloneSourceValue(value: SourceValue): SourceValue {
  if (value instanceof Tagged) return new Tagged(value.tag, cloneSourceValue(value.value))
  if (Array.isArray(value)) return value.map(cloneSourceValue)
  if (isSourceMapping(value)) return cloneSourceMapping(value)

  return value
}

export function cloneSourceMapping(mapping: SourceMapping): SourceMapping {
  const copy: SourceMapping = {}

  for (const [key, value] of Object.entries(mapping)) {
    copy[key] = cloneSourceValue(value)
  }

  return copy
}
