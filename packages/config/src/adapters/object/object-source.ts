import type { ConfigSource, ParsedSource } from "../../ports/source"
import { cloneSourceMapping, type SourceMapping } from "../../core/tree/tags"

export type ObjectSourceOptions = {
  /** Provenance name. */
  name?: string
}

/**
 * An inline partial config. The hierarchy records the mapping itself.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string
  readonly descriptor: SourceMapping

  constructor(
    private readonly mapping: SourceMapping,
    opts: ObjectSourceOptions = {},
  ) {
    this.name = opts.name ?? "object:inline"
    this.descriptor = cloneSourceMapping(mapping)
  }

  load(): ParsedSource {
    return { documents: [{ body: cloneSourceMapping(this.mapping) }] }
  }
}
