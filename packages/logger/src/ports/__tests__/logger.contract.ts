import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ config: "main" })
      const child = parent.child({ source: "experiment.yaml" })

      child.info("merged")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        config: "main",
        source: "experiment.yaml",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "config" })
      const child = parent.child({ module: "merge" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.module).toBe("merge")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ config: "main" })
      const child = parent.child({ phase: "post" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ config: "main" })
      expect(logs[0]?.payload).not.toHaveProperty("phase")
      expect(logs[1]?.payload).toMatchObject({ config: "main", phase: "post" })

      clear()
    })

    it("per-call meta merges with context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const scoped = logger.child({ config: "main" })
      scoped.warn("ignored pattern", { path: "*.lr", matches: [] })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ config: "main", path: "*.lr", matches: [] })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })
  })
}
