export type SerializerOperation = "register" | "dumps" | "loads"

export type LogContext = {
  /** Label of the serializer instance emitting the line */
  serializer: string
  operation: SerializerOperation

  /** Codec name involved, when the line is about a single codec */
  codec: string
  /** Text format name, e.g. "json" */
  format: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
