import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ serializer: "events" })
      const child = parent.child({ operation: "loads" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.message).toBe("hello")
      expect(logs[0]?.context).toEqual({ serializer: "events", operation: "loads" })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ codec: "uuid" })
      const child = parent.child({ codec: "dt" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.context.codec).toBe("dt")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ serializer: "events" })
      const child = parent.child({ format: "json" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.context).toEqual({ serializer: "events" })
      expect(logs[1]?.context).toEqual({ serializer: "events", format: "json" })
    })

    it("per-call meta is merged into the entry", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ serializer: "events" }).debug("registry built", { codecs: ["dt"] })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ serializer: "events", codecs: ["dt"] })
    })

    it("a logger bound to a serializer tags registry lines with the codec", () => {
      const { logger, read } = h.make({ level: "trace", serializer: "events" })

      logger.child({ operation: "register" }).warn("codec replaced", { codec: "dt" })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]).toMatchObject({
        level: "warn",
        message: "codec replaced",
        context: { serializer: "events", operation: "register", codec: "dt" },
      })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })

    it("clear() empties the captured lines", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      logger.info("one")
      clear()

      expect(read()).toEqual([])
    })
  })
}
