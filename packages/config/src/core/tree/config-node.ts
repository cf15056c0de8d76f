import { StructureError } from "../errors/errors"
import { joinPath, splitPath } from "../path/path-matcher"
import { cloneValue, type ParamMapping, type ParamValue } from "./values"

export type ConfigEntry =
  | { kind: "leaf"; value: ParamValue }
  | { kind: "node"; node: ConfigNode }

/**
 * A named scope in the parameter tree. Children are either leaves or
 * nested nodes, kept in insertion order.
 */
export class ConfigNode {
  private readonly entries = new Map<string, ConfigEntry>()

  constructor(
    readonly name: string,
    readonly parent?: ConfigNode,
  ) {}

  /** Dotted path from the root; empty for the root itself. */
  get path(): string {
    if (!this.parent) return ""

    return joinPath(this.parent.path, this.name)
  }

  get root(): ConfigNode {
    return this.parent ? this.parent.root : this
  }

  keys(): string[] {
    return [...this.entries.keys()]
  }

  entry(key: string): ConfigEntry | undefined {
    return this.entries.get(key)
  }

  find(path: string): ConfigEntry | undefined {
    const segments = splitPath(path)
    if (segments.length === 0) return { kind: "node", node: this }

    let current: ConfigNode = this

    for (const [index, segment] of segments.entries()) {
      const entry = current.entries.get(segment)
      if (!entry) return undefined
      if (index === segments.length - 1) return entry
      if (entry.kind === "leaf") return undefined
      current = entry.node
    }

    return undefined
  }

  findNode(path: string): ConfigNode | undefined {
    const entry = this.find(path)

    return entry?.kind === "node" ? entry.node : undefined
  }

  /** Parent node and final key for `path`, when the parent exists. */
  locate(path: string): { node: ConfigNode; key: string } | undefined {
    const segments = splitPath(path)
    const key = segments.pop()
    if (key === undefined) return undefined

    const node = this.findNode(joinPath(...segments))

    return node ? { node, key } : undefined
  }

  setLeaf(key: string, value: ParamValue): void {
    const existing = this.entries.get(key)

    if (existing?.kind === "node") {
      throw new StructureError(`'${joinPath(this.path, key)}' is a sub-config and cannot hold a plain value`, {
        path: joinPath(this.path, key),
      })
    }

    this.entries.set(key, { kind: "leaf", value })
  }

  /** Returns the existing sub-config under `key`, or creates it. */
  ensureNode(key: string): ConfigNode {
    const existing = this.entries.get(key)

    if (existing?.kind === "node") return existing.node
    if (existing) {
      throw new StructureError(`'${joinPath(this.path, key)}' is a parameter, not a sub-config`, {
        path: joinPath(this.path, key),
      })
    }

    const node = new ConfigNode(key, this)
    this.entries.set(key, { kind: "node", node })

    return node
  }

  /** Every leaf below this node as [path relative to this node, value]. */
  *leaves(prefix = ""): Generator<[string, ParamValue]> {
    for (const [key, entry] of this.entries) {
      const path = joinPath(prefix, key)

      if (entry.kind === "leaf") yield [path, entry.value]
      else yield* entry.node.leaves(path)
    }
  }

  leafPaths(): string[] {
    return [...this.leaves()].map(([path]) => path)
  }

  nodePaths(prefix = ""): string[] {
    const paths: string[] = []

    for (const [key, entry] of this.entries) {
      if (entry.kind === "node") {
        const path = joinPath(prefix, key)
        paths.push(path, ...entry.node.nodePaths(path))
      }
    }

    return paths
  }

  toObject(): ParamMapping {
    const out: ParamMapping = {}

    for (const [key, entry] of this.entries) {
      out[key] = entry.kind === "leaf" ? cloneValue(entry.value) : entry.node.toObject()
    }

    return out
  }

  clone(parent?: ConfigNode): ConfigNode {
    const copy = new ConfigNode(this.name, parent)

    for (const [key, entry] of this.entries) {
      copy.entries.set(
        key,
        entry.kind === "leaf"
          ? { kind: "leaf", value: cloneValue(entry.value) }
          : { kind: "node", node: entry.node.clone(copy) },
      )
    }

    return copy
  }
}
