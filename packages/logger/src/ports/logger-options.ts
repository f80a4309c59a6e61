import type { LogLevelName } from "./log-level"

/**
 * Logger policy. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit; "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Structured JSON is emitted
   * when false.
   */
  prettify?: boolean
}
