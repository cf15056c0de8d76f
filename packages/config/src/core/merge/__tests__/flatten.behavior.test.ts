import { StructureError } from "../../errors/errors"
import { replace, Tagged, tagged } from "../../tree/tags"
import { flatten, toParamValue } from "../flatten"

describe("flatten", () => {
  it("keeps untagged mappings whole", () => {
    expect(flatten({ a: 1, b: { c: 2 } })).toEqual([
      { kind: "leaf", path: "a", value: 1, replace: false },
      { kind: "leaf", path: "b", value: { c: 2 }, replace: false },
    ])
  })

  it("expands a mapping tagged with its own key into a node", () => {
    expect(flatten({ model: tagged("model", { lr: 0.1, "opt.name": "adam" }) })).toEqual([
      { kind: "node", path: "model" },
      { kind: "leaf", path: "model.lr", value: 0.1, replace: false },
      { kind: "leaf", path: "model.opt.name", value: "adam", replace: false },
    ])
  })

  it("accepts the last segment of a dotted key as the tag", () => {
    expect(flatten({ "a.b": tagged("b", { x: 1 }) }, "root")).toEqual([
      { kind: "node", path: "root.a.b" },
      { kind: "leaf", path: "root.a.b.x", value: 1, replace: false },
    ])
  })

  it("marks replacements and hooks", () => {
    expect(flatten({ lr: replace([1, 2]), sweep: tagged("grid", ["v"]) })).toEqual([
      { kind: "leaf", path: "lr", value: [1, 2], replace: true },
      { kind: "leaf", path: "sweep", value: ["v"], replace: false, hook: "grid" },
    ])
  })

  it("rejects mismatched, unknown and stacked tags", () => {
    expect(() => flatten({ model: tagged("other", { a: 1 }) })).toThrow(
      "Tag '!other' does not match the parameter name 'model'",
    )
    expect(() => flatten({ lr: tagged("fancy", 1) })).toThrow(StructureError)
    expect(() => flatten({ lr: tagged("replace", tagged("grid", [])) })).toThrow("carries more than one tag")
  })
})

describe("toParamValue", () => {
  it("strips source values down to plain data", () => {
    expect(toParamValue({ a: [1, { b: null }] }, "x")).toEqual({ a: [1, { b: null }] })
  })

  it("rejects tags nested inside a value", () => {
    expect(() => toParamValue([new Tagged("model", {})], "x")).toThrow("Unexpected tag '!model' inside the value of 'x'")
  })
})
