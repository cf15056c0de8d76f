import fs from "node:fs"
import path from "node:path"
import type { ConfigSource, ParsedSource } from "../../ports/source"
import { parseYamlSource } from "../../core/persist/yaml-codec"

export type YamlSourceOptions = {
  /**
   * Path to the YAML file, absolute or relative to `cwd`.
   *
   * @example "configs/default.yaml"
   */
  file: string

  /** A missing optional file is an empty source. @default true */
  required?: boolean

  /** @default process.cwd() */
  cwd?: string
}

/**
 * A YAML file, possibly holding several documents. Tags carry structure:
 * `--- !model` scopes a document to the `model` sub-config and
 * `model: !model` declares one inline.
 */
export class YamlSource implements ConfigSource {
  readonly name: string
  readonly descriptor: string

  constructor(private readonly opts: YamlSourceOptions) {
    this.name = `yaml:${opts.file}`
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

    return parseYamlSource(content, this.name)
  }
}
