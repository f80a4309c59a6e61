import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

/** Discards every line; keeps the context bound through `child()`. */
export class NullLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  readonly context: Readonly<LogContextPatch>

  constructor(context: LogContextPatch = {}) {
    this.context = Object.freeze({ ...context })
  }

  trace(_message: string, _meta?: LogMeta<TContext>): void {}

  debug(_message: string, _meta?: LogMeta<TContext>): void {}

  info(_message: string, _meta?: LogMeta<TContext>): void {}

  warn(_message: string, _meta?: LogMeta<TContext>): void {}

  error(_message: string, _meta?: LogMeta<TContext>): void {}

  fatal(_message: string, _meta?: LogMeta<TContext>): void {}

  child<U extends LogContextPatch>(context: U): NullLogger<TContext & U> {
    return new NullLogger<TContext & U>({ ...this.context, ...context })
  }
}

export function createNullLogger<TContext extends LogContext = LogContext>(
  context: LogContextPatch = {},
): Logger<TContext> {
  return new NullLogger<TContext>(context)
}
