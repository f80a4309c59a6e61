import { Writable } from "node:stream"
import {
  type CapturedLog,
  contextOf,
  type LoggerHarness,
} from "../../../ports/__tests__/logger-harness"
import type { LogLevelName } from "../../../ports/log-level"
import type { Logger } from "../../../ports/logger"
import { PinoLogger } from "../pino-logger"

const levelNames = new Map<number, LogLevelName>([
  [10, "trace"],
  [20, "debug"],
  [30, "info"],
  [40, "warn"],
  [50, "error"],
  [60, "fatal"],
])

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function capture(line: string): CapturedLog {
  const parsed: unknown = JSON.parse(line)
  const payload = isRecord(parsed) ? parsed : {}

  return {
    level: levelNames.get(Number(payload.level)) ?? "info",
    message: typeof payload.msg === "string" ? payload.msg : "",
    context: contextOf(payload),
    payload,
  }
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const captured: CapturedLog[] = []

      const destination = new Writable({
        write(chunk: Buffer, _encoding, cb) {
          captured.push(capture(chunk.toString()))
          cb()
        },
      })

      const base: Logger = new PinoLogger({ destination }, { level: opts?.level ?? "trace" })

      return {
        logger: opts?.serializer === undefined ? base : base.child({ serializer: opts.serializer }),
        read: () => [...captured],
        clear: () => {
          captured.length = 0
        },
      }
    },
  }
}
