import { PathNotFoundError } from "../errors/errors"
import type { ConfigEntry, ConfigNode } from "../tree/config-node"
import { cloneValue, type ParamValue } from "../tree/values"

export const SEGMENT_WILDCARD = "*"
/** Matches one or more segments. */
export const DEEP_WILDCARD = "**"

export function splitPath(path: string): string[] {
  return path === "" ? [] : path.split(".")
}

export function joinPath(...parts: string[]): string {
  return parts.filter((part) => part !== "").join(".")
}

export function isPattern(path: string): boolean {
  return splitPath(path).some((segment) => segment === SEGMENT_WILDCARD || segment === DEEP_WILDCARD)
}

function matchSegments(pattern: string[], path: string[], p: number, s: number): boolean {
  if (p === pattern.length) return s === path.length

  const segment = pattern[p]

  if (segment === DEEP_WILDCARD) {
    for (let end = s + 1; end <= path.length; end++) {
      if (matchSegments(pattern, path, p + 1, end)) return true
    }
    return false
  }

  if (s === path.length) return false

  return (segment === SEGMENT_WILDCARD || segment === path[s]) && matchSegments(pattern, path, p + 1, s + 1)
}

/**
 * `*` stands for exactly one segment, so `*.lr` matches `data.lr` but
 * neither `lr` nor `data.nested.lr`.
 */
export function matchesPattern(pattern: string, path: string): boolean {
  return matchSegments(splitPath(pattern), splitPath(path), 0, 0)
}

export function matchPaths(pattern: string, paths: Iterable<string>): string[] {
  return [...paths].filter((path) => matchesPattern(pattern, path))
}

/**
 * Point reads and writes by exact path, and pattern enumeration, over one tree.
 */
export class PathMatcher {
  constructor(private readonly root: ConfigNode) {}

  resolve(path: string): ConfigEntry {
    const entry = this.root.find(path)

    if (!entry) throw new PathNotFoundError(path)

    return entry
  }

  read(path: string): ParamValue {
    const entry = this.resolve(path)

    return entry.kind === "leaf" ? cloneValue(entry.value) : entry.node.toObject()
  }

  /** Overwrites an existing leaf; never creates one. */
  write(path: string, value: ParamValue): void {
    const entry = this.resolve(path)

    if (entry.kind === "node") throw new PathNotFoundError(path)

    const target = this.root.locate(path)

    if (!target) throw new PathNotFoundError(path)

    target.node.setLeaf(target.key, value)
  }

  /** Leaf paths matching `pattern`, in tree order. */
  enumerate(pattern: string): string[] {
    return matchPaths(pattern, this.root.leafPaths())
  }
}
