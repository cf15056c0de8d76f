import type { HierarchyEntry } from "../../ports/source"
import { StructureError } from "../errors/errors"
import { isParamMapping, type ParamValue } from "../tree/values"

export type VariationEntry = {
  /** Child name, e.g. "lr_0" or the key of a named variation. */
  name: string
  patch: HierarchyEntry
}

/** Alternative partial patches, each producing one sibling config. */
export type Variation = {
  name: string
  entries: VariationEntry[]
}

/** Cartesian combination of variations, in declared order. */
export type Grid = {
  name: string
  dimensions: string[]
}

/** One child to build: patches applied in order onto a clone of the parent. */
export type VariationPlan = {
  name: string
  patches: VariationEntry[]
}

export const GRID_NAME_SEPARATOR = "+"

function toPatch(param: string, value: ParamValue, at: string): HierarchyEntry {
  if (typeof value === "string") return value
  if (value !== null && isParamMapping(value)) return value

  throw new StructureError(
    `Variation ${at} of '${param}' must be a mapping of parameters or a path to a config file`,
    { path: param, entry: at },
  )
}

/**
 * Reads a variations parameter: a list of patches (children named
 * `<param>_<index>`) or a mapping of child name → patch.
 */
export function toVariationEntries(param: string, value: ParamValue): VariationEntry[] {
  if (Array.isArray(value)) {
    return value.map((item, index) => ({
      name: `${param}_${index}`,
      patch: toPatch(param, item, String(index)),
    }))
  }

  if (value !== null && isParamMapping(value)) {
    return Object.entries(value).map(([name, item]) => ({ name, patch: toPatch(param, item, `'${name}'`) }))
  }

  throw new StructureError(`Config variations '${param}' must be a list or a mapping of patches`, {
    path: param,
  })
}

function product(dimensions: VariationEntry[][]): VariationEntry[][] {
  return dimensions.reduce<VariationEntry[][]>(
    (combos, entries) => combos.flatMap((combo) => entries.map((entry) => [...combo, entry])),
    [[]],
  )
}

/**
 * Decides which children `createVariations` builds, without building them.
 *
 * Grids come first, in declaration order, each as the cartesian product of
 * its dimensions (first dimension outermost). Variations that no grid uses
 * follow, one child per entry.
 */
export function planVariations(
  variations: ReadonlyMap<string, Variation>,
  grids: ReadonlyMap<string, Grid>,
): VariationPlan[] {
  const plans: VariationPlan[] = []
  const consumed = new Set<string>()

  for (const grid of grids.values()) {
    const dimensions = grid.dimensions.map((name) => {
      const variation = variations.get(name)

      if (!variation) {
        throw new StructureError(`Grid '${grid.name}' uses '${name}', which is not a declared variation`, {
          grid: grid.name,
          variation: name,
        })
      }
      if (variation.entries.length === 0) {
        throw new StructureError(`Grid '${grid.name}' uses '${name}', which has no entries`, {
          grid: grid.name,
          variation: name,
        })
      }

      consumed.add(name)
      return variation.entries
    })

    if (dimensions.length === 0) continue

    for (const combo of product(dimensions)) {
      plans.push({ name: combo.map((entry) => entry.name).join(GRID_NAME_SEPARATOR), patches: combo })
    }
  }

  for (const variation of variations.values()) {
    if (consumed.has(variation.name)) continue

    for (const entry of variation.entries) plans.push({ name: entry.name, patches: [entry] })
  }

  return plans
}
