import { BaseError, type ErrorContext } from "@tagtree/errors"

export type ConfigErrorCode = "invalid_config"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string, context?: ErrorContext): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      context: { details, ...context },
      isOperational: false,
    })
  }
}
