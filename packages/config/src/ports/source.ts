import type { SourceMapping } from "../core/tree/tags"

/**
 * What the hierarchy records for one merge: a file path, or the inline
 * mapping itself.
 */
export type HierarchyEntry = string | SourceMapping

/**
 * One document of a source. A tagged document (`--- !model`) targets the
 * sub-config named by its tag; an untagged one targets the root.
 */
export type SourceDocument = {
  tag?: string
  body: SourceMapping
}

export type ParsedSource = {
  documents: SourceDocument[]
}

/**
 * A source of configuration values.
 *
 * A ConfigSource only *reads* values and their tag annotations. Merging,
 * type checks and processing happen in the engine.
 *
 * Sources are merged in order; later sources may only update keys the
 * first (default) source declared.
 */
export interface ConfigSource {
  /**
   * Name used for provenance and logs.
   * Example: "yaml:experiment.yaml", "object:inline", "command-line"
   */
  readonly name: string

  /** Recorded in the hierarchy so the merge can be replayed. */
  readonly descriptor: HierarchyEntry

  /**
   * Load the source.
   *
   * - Must return a fresh structure on every call
   * - Throws on unreadable input; I/O errors surface as-is
   */
  load(): ParsedSource
}

/** Anything `loadConfig` accepts where a source is expected. */
export type SourceInput = string | SourceMapping | ConfigSource

/** Directories searched, in order, for relative file sources. */
export type SourceLookup = {
  cwd: string
  searchDirs?: readonly string[]
}

export type SourceResolver = (input: SourceInput, lookup: SourceLookup) => ConfigSource
