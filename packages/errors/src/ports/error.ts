export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error: registry names, tree paths, offending
 * kinds. Values should stay JSON-safe so the error can travel in a log line.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for failures caused by the input (an unknown tag, a malformed
   * string), `false` for misuse of the library itself (a broken codec table,
   * an invalid configuration).
   *
   * @default true
   */
  readonly isOperational: boolean

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON.stringify-safe error shape for logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
