import fs from "node:fs"
import path from "node:path"
import type { ConfigSource, SourceInput, SourceLookup } from "../ports/source"
import { JsonSource } from "./json/json-source"
import { ObjectSource } from "./object/object-source"
import { YamlSource } from "./yaml/yaml-source"

const YAML_EXTENSIONS = [".yaml", ".yml"]

export function isConfigSource(input: SourceInput): input is ConfigSource {
  return typeof input === "object" && "load" in input && typeof input.load === "function"
}

/**
 * Finds a relative file in the search directories (latest source first),
 * then in `cwd`. A path without extension also tries `.yaml` and `.yml`.
 * When nothing exists, the `cwd`-relative path is returned so reading it
 * reports the missing file.
 */
export function findSourceFile(file: string, lookup: SourceLookup): string {
  if (path.isAbsolute(file)) return file

  const names = path.extname(file) === "" ? [file, ...YAML_EXTENSIONS.map((ext) => `${file}${ext}`)] : [file]

  for (const dir of [...(lookup.searchDirs ?? []), lookup.cwd]) {
    for (const name of names) {
      const candidate = path.resolve(dir, name)
      if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) return candidate
    }
  }

  return path.resolve(lookup.cwd, file)
}

export function resolveSource(input: SourceInput, lookup: SourceLookup): ConfigSource {
  if (isConfigSource(input)) return input
  if (typeof input !== "string") return new ObjectSource(input)

  const file = findSourceFile(input, lookup)

  return path.extname(file).toLowerCase() === ".json"
    ? new JsonSource({ file, cwd: lookup.cwd })
    : new YamlSource({ file, cwd: lookup.cwd })
}
