export type Scalar = string | number | boolean | null

/** A leaf value: plain data that survives a save and reload. */
export type ParamValue = Scalar | ParamValue[] | ParamMapping

export type ParamMapping = { [key: string]: ParamValue }

export const valueKinds = ["null", "boolean", "number", "string", "sequence", "mapping"] as const

export type ValueKind = (typeof valueKinds)[number]

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

export function isParamValue(value: unknown): value is ParamValue {
  if (value === null) return true

  switch (typeof value) {
    case "string":
    case "boolean":
      return true
    case "number":
      return !Number.isNaN(value)
    case "object":
      if (Array.isArray(value)) return value.every(isParamValue)
      return isPlainObject(value) && Object.values(value).every(isParamValue)
    default:
      return false
  }
}

export function isParamMapping(value: ParamValue): value is ParamMapping {
  return isPlainObject(value)
}

// Integers and floats share one kind: JS numbers cannot tell 3 from 3.0.
export function kindOf(value: ParamValue): ValueKind {
  if (value === null) return "null"
  if (Array.isArray(value)) return "sequence"

  switch (typeof value) {
    case "boolean":
      return "boolean"
    case "number":
      return "number"
    case "string":
      return "string"
    default:
      return "mapping"
  }
}

export function cloneValue<T extends ParamValue>(value: T): T {
  return structuredClone(value)
}

export function valuesEqual(a: ParamValue, b: ParamValue): boolean {
  if (a === b) return true
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((v, i) => valuesEqual(v, b[i] ?? null))
  }
  if (a !== null && b !== null && isParamMapping(a) && isParamMapping(b)) {
    const keys = Object.keys(a)

    return (
      keys.length === Object.keys(b).length &&
      keys.every((key) => key in b && valuesEqual(a[key] ?? null, b[key] ?? null))
    )
  }

  return false
}
