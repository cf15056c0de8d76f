import type { ProcessingContext, ProcessingPhase, Transform } from "../../../ports/processing"
import { ProcessingError } from "../../errors/errors"
import type { ParamValue } from "../../tree/values"
import { builtin, ProcessingRegistry } from "../processing-registry"

const double: Transform = function double(value) {
  return typeof value === "number" ? value * 2 : value
}

const increment: Transform = function increment(value) {
  return typeof value === "number" ? value + 1 : value
}

function contextFor(path: string, phase: ProcessingPhase): ProcessingContext {
  return {
    path,
    phase,
    fromDefault: false,
    cwd: "/work",
    get: () => 7,
    paramPaths: () => [],
    experimentDirectory: () => undefined,
  }
}

const noDispatch = { dispatch: () => null, context: contextFor }

describe("ProcessingRegistry", () => {
  it("runs every matching rule in declaration order", () => {
    const broadFirst = new ProcessingRegistry({ pre: [["*.lr", double], ["model.lr", increment]] })
    const specificFirst = new ProcessingRegistry({ pre: [["model.lr", increment], ["*.lr", double]] })

    expect(broadFirst.apply("model.lr", 1, "pre", noDispatch)).toBe(3)
    expect(specificFirst.apply("model.lr", 1, "pre", noDispatch)).toBe(4)
  })

  it("leaves non-matching paths untouched", () => {
    const registry = new ProcessingRegistry({ pre: [["*.lr", double]] })

    expect(registry.apply("lr", 5, "pre", noDispatch)).toBe(5)
    expect(registry.apply("data.lr", 5, "post", noDispatch)).toBe(5)
  })

  it("dispatches built-in hooks", () => {
    const registry = new ProcessingRegistry({ pre: [["sweep", builtin("grid")]] })
    const dispatch = vi.fn((_hook: string, _path: string, value: ParamValue) => value)

    expect(registry.apply("sweep", ["a", "b"], "pre", { ...noDispatch, dispatch })).toEqual(["a", "b"])
    expect(dispatch).toHaveBeenCalledWith("grid", "sweep", ["a", "b"])
    expect(registry.hasBuiltin("sweep", "grid")).toBe(true)
    expect(registry.hasBuiltin("sweep", "experiment_path")).toBe(false)
  })

  it("binds contextual transforms to the path and phase being processed", () => {
    const seen: Array<[string, ProcessingPhase]> = []
    const registry = new ProcessingRegistry({
      post: [
        [
          "*.lr",
          {
            name: "addOther",
            bind: (context) => {
              seen.push([context.path, context.phase])
              return (value) => (typeof value === "number" ? value + Number(context.get("other")) : value)
            },
          },
        ],
      ],
    })

    expect(registry.apply("data.lr", 1, "post", noDispatch)).toBe(8)
    expect(registry.apply("model.lr", 2, "post", noDispatch)).toBe(9)
    expect(seen).toEqual([
      ["data.lr", "post"],
      ["model.lr", "post"],
    ])
  })

  it("skips rules rejected by the filter", () => {
    const registry = new ProcessingRegistry({ pre: [["a", double], ["a", increment]] })

    const result = registry.apply("a", 1, "pre", {
      ...noDispatch,
      filter: (rule) => rule.action.kind === "transform" && rule.action.name !== "double",
    })

    expect(result).toBe(2)
  })

  it("wraps errors thrown by a transform", () => {
    const registry = new ProcessingRegistry({
      post: [
        [
          "a",
          function explode() {
            throw new Error("kaboom")
          },
        ],
      ],
    })

    let caught: unknown
    try {
      registry.apply("a", 1, "post", noDispatch)
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(ProcessingError)
    expect(caught).toMatchObject({
      message: "ERROR while post-processing 'a' with 'explode': kaboom",
      context: { path: "a", phase: "post", function: "explode" },
    })
  })

  it("rejects transforms that return nothing or non-plain data", () => {
    const registry = new ProcessingRegistry({
      pre: [
        ["nothing", () => JSON.parse("{}").missing],
        ["date", () => Reflect.construct(Date, [])],
      ],
    })

    expect(() => registry.apply("nothing", 1, "pre", noDispatch)).toThrow(ProcessingError)
    expect(() => registry.apply("date", 1, "pre", noDispatch)).toThrow("not plain data")
  })

  it("rejects transforms declaring more than one parameter", () => {
    const registry = new ProcessingRegistry()
    const twoArgs = Object.defineProperty((value: ParamValue) => value, "length", { value: 2 })

    expect(() => registry.register("pre", "a", twoArgs)).toThrow("must take exactly one argument, it declares 2")
  })

  it("only accepts built-in hooks for pre-processing", () => {
    const registry = new ProcessingRegistry()

    expect(() => registry.register("post", "a", builtin("grid"))).toThrow(ProcessingError)
  })

  it("reports patterns that match no path, once per phase", () => {
    const registry = new ProcessingRegistry({
      pre: [["*.lr", double], ["missing", double], ["missing", increment]],
      post: [["*.lr", double], ["other.**", double]],
    })

    expect(registry.unmatched(["data.lr"])).toEqual([
      { phase: "pre", pattern: "missing" },
      { phase: "post", pattern: "other.**" },
    ])
  })

  it("clones rule lists independently", () => {
    const registry = new ProcessingRegistry({ pre: [["a", double]] })
    const copy = registry.clone()
    copy.register("pre", "a", increment)

    expect(registry.rules("pre")).toHaveLength(1)
    expect(copy.rules("pre")).toHaveLength(2)
  })
})
