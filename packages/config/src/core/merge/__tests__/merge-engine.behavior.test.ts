import fs from "node:fs"
import path from "node:path"
import { FakeClock } from "../../../adapters/clock/fake-clock"
import { ObjectSource } from "../../../adapters/object/object-source"
import { resolveSource } from "../../../adapters/resolve-source"
import type { RuleInput, Transform } from "../../../ports/processing"
import type { ConfigSource, SourceDocument } from "../../../ports/source"
import { RecordingLogger } from "../../../tests/utils/recording-logger"
import { makeTempDir, removeDir, writeFiles } from "../../../tests/utils/temp-dir"
import {
  ArtifactError,
  ProcessingError,
  StructureError,
  TypeMismatchError,
  UnknownParameterError,
} from "../../errors/errors"
import { PathMatcher } from "../../path/path-matcher"
import { ProcessingRegistry } from "../../processing/processing-registry"
import { copyParam, protectedParam } from "../../processing/transforms"
import { type ConfigState, createState } from "../../state"
import { replace, type SourceMapping, tagged } from "../../tree/tags"
import type { ParamValue } from "../../tree/values"
import { MergeEngine } from "../merge-engine"

const double: Transform = function double(value) {
  return typeof value === "number" ? value * 2 : value
}

function documentsSource(name: string, documents: SourceDocument[]): ConfigSource {
  return { name, descriptor: name, load: () => ({ documents }) }
}

describe("MergeEngine", () => {
  let dir: string
  let logger: RecordingLogger

  beforeEach(() => {
    dir = makeTempDir()
    logger = new RecordingLogger()
  })

  afterEach(() => {
    removeDir(dir)
  })

  function createEngine(rules: { pre?: RuleInput[]; post?: RuleInput[] } = {}) {
    const state = createState("main", "auto-save", new ProcessingRegistry(rules))
    const engine = new MergeEngine(state, { logger, clock: new FakeClock(0), cwd: dir, resolveSource })

    return { state, engine }
  }

  function setup(defaults: SourceMapping, rules: { pre?: RuleInput[]; post?: RuleInput[] } = {}) {
    const { state, engine } = createEngine(rules)
    engine.merge(new ObjectSource(defaults, { name: "default" }), { isDefault: true })

    return { state, engine }
  }

  function read(state: ConfigState, param: string): ParamValue {
    return new PathMatcher(state.root).read(param)
  }

  function mergeExperiment(engine: MergeEngine, mapping: SourceMapping) {
    return engine.merge(new ObjectSource(mapping, { name: "experiment" }), { isDefault: false })
  }

  describe("default source", () => {
    it("creates parameters and tagged sub-configs", () => {
      const { state } = setup({
        lr: 0.1,
        model: tagged("model", { depth: 3, head: tagged("head", { size: 8 }) }),
        opts: { a: 1 },
        "data.path": "train.csv",
      })

      expect(state.root.leafPaths()).toEqual(["lr", "model.depth", "model.head.size", "opts", "data.path"])
      expect(state.root.nodePaths()).toEqual(["model", "model.head", "data"])
      expect(read(state, "opts")).toEqual({ a: 1 })
      expect(state.provenance.get("model.head.size")).toBe("default")
    })

    it("targets the sub-config named by a document tag", () => {
      const { state, engine } = createEngine()
      engine.merge(documentsSource("docs", [{ body: { a: 1 } }, { tag: "model", body: { lr: 2 } }]), {
        isDefault: true,
      })

      expect(state.root.toObject()).toEqual({ a: 1, model: { lr: 2 } })
    })

    it("rejects wildcards", () => {
      expect(() => setup({ "*.lr": 1 })).toThrow(StructureError)
    })

    it("rejects a parameter set twice", () => {
      const { engine } = createEngine()

      expect(() =>
        engine.merge(documentsSource("docs", [{ body: { a: 1 } }, { body: { a: 2 } }]), { isDefault: true }),
      ).toThrow("Parameter 'a' is set twice in the default config")
    })

    it("records the source in the hierarchy", () => {
      const { state } = setup({ a: 1 })

      expect(state.hierarchy).toEqual([{ a: 1 }])
    })
  })

  describe("experiment sources", () => {
    const defaults: SourceMapping = {
      lr: 0.1,
      name: "run",
      optimizer: null,
      data: tagged("data", { lr: 1 }),
      model: tagged("model", { lr: 2, nested: tagged("nested", { lr: 3 }) }),
    }

    it("updates existing parameters and reports what changed", () => {
      const { state, engine } = setup(defaults)

      const report = mergeExperiment(engine, { lr: 0.5, "model.lr": 4 })

      expect(report).toEqual({ source: "experiment", changed: ["lr", "model.lr"], expansions: [] })
      expect(read(state, "model.lr")).toBe(4)
      expect(state.provenance.get("lr")).toBe("experiment")
      expect(state.hierarchy).toHaveLength(2)
    })

    it("rejects parameters the default never declared", () => {
      const { engine } = setup(defaults)

      expect(() => mergeExperiment(engine, { epochs: 3 })).toThrow(UnknownParameterError)
      expect(() => mergeExperiment(engine, { other: tagged("other", { x: 1 }) })).toThrow(UnknownParameterError)
    })

    it("rejects kind changes unless marked as a replacement", () => {
      const { state, engine } = setup(defaults)

      expect(() => mergeExperiment(engine, { lr: "fast" })).toThrow(TypeMismatchError)

      mergeExperiment(engine, { lr: replace("fast") })
      expect(read(state, "lr")).toBe("fast")
    })

    it("lets null stand in for any kind", () => {
      const { state, engine } = setup(defaults)

      mergeExperiment(engine, { optimizer: "adam" })
      expect(read(state, "optimizer")).toBe("adam")

      mergeExperiment(engine, { optimizer: null })
      expect(read(state, "optimizer")).toBeNull()
    })

    it("expands wildcards over existing leaves", () => {
      const { state, engine } = setup(defaults)

      const report = mergeExperiment(engine, { "*.lr": 0.5 })

      expect(report.expansions).toEqual([{ pattern: "*.lr", matches: ["data.lr", "model.lr"] }])
      expect(read(state, "model.nested.lr")).toBe(3)
      expect(logger.messages("info")).toContain("Pattern parameter '*.lr' will be merged into: data.lr, model.lr")
    })

    it("warns and moves on when a wildcard matches nothing", () => {
      const { state, engine } = setup(defaults)

      const report = mergeExperiment(engine, { "*.missing": 1 })

      expect(report.changed).toEqual([])
      expect(state.diagnostics).toContainEqual({
        kind: "wildcard-match",
        pattern: "*.missing",
        source: "experiment",
        matches: [],
      })
      expect(logger.messages("warn")).toEqual([
        "Pattern parameter '*.missing' will be ignored: it matches no existing parameter",
      ])
    })

    it("merges an untagged mapping into an existing sub-config", () => {
      const { state, engine } = setup(defaults)

      mergeExperiment(engine, { model: { lr: 5 } })

      expect(read(state, "model")).toEqual({ lr: 5, nested: { lr: 3 } })
    })

    it("rejects shape conflicts", () => {
      const { engine } = setup(defaults)

      expect(() => mergeExperiment(engine, { model: 3 })).toThrow("Sub-config 'model' can only be merged with a mapping")
      expect(() => mergeExperiment(engine, { "lr.x": 1 })).toThrow(StructureError)
      expect(() => mergeExperiment(engine, { lr: tagged("lr", { x: 1 }) })).toThrow(StructureError)
    })

    it("honours hook tags only in the default source", () => {
      const { engine } = setup(defaults)

      expect(() => mergeExperiment(engine, { name: tagged("grid", ["x"]) })).toThrow(
        "Hook tag '!grid' on 'name' is only honoured in the default source",
      )
    })
  })

  describe("pre-processing", () => {
    it("runs as each leaf is set and sees earlier siblings", () => {
      const state = createState("main", "auto-save", new ProcessingRegistry())
      const copyA: Transform = function copyA(value) {
        const a = state.root.find("a")
        return a?.kind === "leaf" ? a.value : value
      }
      state.registry.register("pre", "a", double)
      state.registry.register("pre", "b", copyA)
      const engine = new MergeEngine(state, { logger, clock: new FakeClock(0), cwd: dir, resolveSource })

      engine.merge(new ObjectSource({ a: 1, b: 0 }), { isDefault: true })

      expect(state.root.toObject()).toEqual({ a: 2, b: 2 })
    })

    it("logs and rethrows processing failures", () => {
      const explode: Transform = function explode() {
        throw new Error("kaboom")
      }

      expect(() => setup({ lr: 0.1 }, { pre: [["lr", explode]] })).toThrow(ProcessingError)
      expect(logger.messages("error")).toEqual(["ERROR while pre-processing param 'lr'"])
    })
  })

  describe("post-processing", () => {
    it("always starts from the raw value", () => {
      const { state, engine } = setup({ lr: 0.1 }, { post: [["lr", double]] })

      engine.postProcess(["lr"])
      engine.postProcess(["lr"])

      expect(read(state, "lr")).toBe(0.2)
      expect(state.rawValues.get("lr")).toBe(0.1)
    })

    it("keeps a null raw value as the starting point", () => {
      const fill: Transform = function fill(value) {
        return value === null ? 1 : typeof value === "number" ? value + 1 : value
      }
      const { state, engine } = setup({ n: null }, { post: [["n", fill]] })

      engine.postProcess(["n"])
      engine.postProcess(["n"])

      expect(read(state, "n")).toBe(1)
      expect(state.rawValues.has("n")).toBe(true)
      expect(state.rawValues.get("n")).toBeNull()
    })

    it("reruns contextual rules even when their parameter did not change", () => {
      const copy = copyParam()
      const { state, engine } = setup({ lr: 0.1, eval_lr: "lr" }, { post: [["eval_lr", copy]] })

      engine.postProcess([])
      expect(read(state, "eval_lr")).toBe(0.1)

      mergeExperiment(engine, { lr: 0.5 })
      engine.postProcess(["lr"])

      expect(read(state, "eval_lr")).toBe(0.5)
      expect(state.rawValues.get("eval_lr")).toBe("lr")
    })
  })

  describe("protected parameters", () => {
    it("accept the default value and reject later sources", () => {
      const { state, engine } = setup({ seed: 1 }, { pre: [["seed", protectedParam()]] })

      expect(read(state, "seed")).toBe(1)
      expect(() => mergeExperiment(engine, { seed: 2 })).toThrow(
        "Parameter 'seed' is protected, it cannot be set from configs other than the default config",
      )
      expect(logger.messages("error")).toEqual(["ERROR while pre-processing param 'seed'"])
    })
  })

  describe("built-in hooks", () => {
    it("creates a numbered experiment folder", () => {
      const { state } = setup({ folder: tagged("experiment_path", "runs") })

      expect(read(state, "folder")).toBe("runs_0")
      expect(fs.statSync(path.join(dir, "runs_0")).isDirectory()).toBe(true)
      expect(state.experimentParam).toBe("folder")
    })

    it("merges additional files into the default pass without recording them", () => {
      writeFiles(dir, { "extra.yaml": "b: 2\n" })

      const { state } = setup({ extra: tagged("additional_config_file", "extra.yaml"), a: 1 })

      expect(state.root.toObject()).toEqual({ extra: "extra.yaml", b: 2, a: 1 })
      expect(state.hierarchy).toHaveLength(1)
    })

    it("merges additional files named by an experiment source as experiment files", () => {
      writeFiles(dir, { "override.yaml": "b: 5\n", "unknown.yaml": "c: 1\n" })
      const { state, engine } = setup({ second: tagged("additional_config_file", null), b: 0 })

      mergeExperiment(engine, { second: "override.yaml" })

      expect(read(state, "b")).toBe(5)
      expect(state.hierarchy).toHaveLength(2)
      expect(() => mergeExperiment(engine, { second: "unknown.yaml" })).toThrow(UnknownParameterError)
    })

    it("registers variations and grids declared at top level", () => {
      const { state } = setup({
        v: tagged("config_variations", [{ lr: 0.1 }, { lr: 0.2 }]),
        sweep: tagged("grid", ["v"]),
      })

      expect(state.variations.get("v")?.entries.map((entry) => entry.name)).toEqual(["v_0", "v_1"])
      expect(state.grids.get("sweep")).toEqual({ name: "sweep", dimensions: ["v"] })
    })

    it("rejects variations declared in a sub-config", () => {
      expect(() => setup({ model: tagged("model", { v: tagged("config_variations", [{}]) }) })).toThrow(
        "Config variations must be declared in the main config, not in a sub-config ('model.v')",
      )
    })
  })

  describe("saved configs", () => {
    const metadata = { saved_at: "2024-01-15T10:30:00.000Z", saved_at_ms: 1705314600000, regime: "locked" }

    it("adopts the saved regime and skips user pre-processing", () => {
      const { state } = setup({ config_metadata: metadata, lr: 0.1 }, { pre: [["lr", double]] })

      expect(state.regime).toBe("locked")
      expect(state.root.toObject()).toEqual({ lr: 0.1 })
    })

    it("re-registers a saved experiment folder without creating another", () => {
      const { state } = setup({ config_metadata: metadata, folder: tagged("experiment_path", "runs_0") })

      expect(state.experimentParam).toBe("folder")
      expect(read(state, "folder")).toBe("runs_0")
      expect(fs.readdirSync(dir)).toEqual([])
    })

    it("rejects malformed metadata", () => {
      expect(() => setup({ config_metadata: { ...metadata, regime: "frozen" }, lr: 0.1 })).toThrow(ArtifactError)
    })

    it("warns when the saved regime was unsafe", () => {
      const { state } = setup({ config_metadata: { ...metadata, regime: "unsafe" }, lr: 0.1 })

      expect(state.diagnostics).toContainEqual({ kind: "unsafe-artifact", source: "default" })
      expect(logger.messages("warn")).toEqual(["Loading 'default', which was saved under the unsafe regime"])
    })
  })
})
