import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { StructureError } from "../../../core/errors/errors"
import { Tagged } from "../../../core/tree/tags"
import { YamlSource } from "../yaml-source"

describe("YamlSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "yaml-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("reads tagged sub-configs and tagged documents", async () => {
    await fs.writeFile(
      path.join(cwd, "default.yaml"),
      ["lr: 0.1", "model: !model", "  depth: 3", "--- !data", "path: train.csv", ""].join("\n"),
    )

    const source = new YamlSource({ file: "default.yaml", cwd })

    expect(source.load().documents).toEqual([
      { body: { lr: 0.1, model: new Tagged("model", { depth: 3 }) } },
      { tag: "data", body: { path: "train.csv" } },
    ])
  })

  it("names itself after the file and records the absolute path", () => {
    const source = new YamlSource({ file: "default.yaml", cwd })

    expect(source.name).toBe("yaml:default.yaml")
    expect(source.descriptor).toBe(path.join(cwd, "default.yaml"))
  })

  it("treats a missing optional file as empty", () => {
    expect(new YamlSource({ file: "missing.yaml", required: false, cwd }).load()).toEqual({ documents: [] })
    expect(() => new YamlSource({ file: "missing.yaml", cwd }).load()).toThrow()
  })

  it("reports syntax errors as structure errors", async () => {
    await fs.writeFile(path.join(cwd, "bad.yaml"), "a: [1, 2\n")

    expect(() => new YamlSource({ file: "bad.yaml", cwd }).load()).toThrow(StructureError)
  })
})
