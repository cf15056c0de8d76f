import fs from "node:fs"
import path from "node:path"
import type { ConfigSource, ParsedSource } from "../../ports/source"
import { StructureError } from "../../core/errors/errors"
import { isParamMapping, isParamValue } from "../../core/tree/values"

/**
 * Options for creating a JSON configuration source.
 */
export type JsonSourceOptions = {
  /**
   * Path to the JSON file, absolute or relative to `cwd`.
   *
   * @example "configs/default.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true` (default): reading a missing file throws.
   * - `false`: a missing file is an empty source.
   */
  required?: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/** JSON has no tags, so a JSON source can set values but never declare sub-configs. */
export class JsonSource implements ConfigSource {
  readonly name: string
  readonly descriptor: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
    this.descriptor = path.resolve(opts.cwd ?? process.cwd(), opts.file)
  }

  load(): ParsedSource {
    let content: string

    try {
      content = fs.readFileSync(this.descriptor, "utf-8")
    } catch (err) {
      if (this.opts.required === false && err instanceof Error && "code" in err && err.code === "ENOENT") {
        return { documents: [] }
      }
      throw err
    }

    const parsed: unknown = JSON.parse(content)

    if (!isParamValue(parsed) || parsed === null || !isParamMapping(parsed)) {
      throw new StructureError(`${this.name} must contain a JSON object`, { source: this.name })
    }

    return { documents: [{ body: parsed }] }
  }
}
