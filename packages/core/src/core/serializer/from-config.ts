import { type IConfig, type SerializerConfig, toSerializerOptions } from "@tagtree/config"
import { createPinoLogger, type PinoLoggerDeps } from "@tagtree/logger"
import type { Codec } from "../../ports/codec"
import type { TextFormat } from "../../ports/text-format"
import { createSerializer, type TreeSerializer } from "./tree-serializer"

export type SerializerFromConfigOptions = {
  codecs?: Iterable<Codec>
  format?: TextFormat
  name?: string
  /** Passed to the pino adapter, e.g. a destination stream */
  loggerDeps?: PinoLoggerDeps
}

/**
 * Composition root for applications: wire convention from loaded
 * configuration, pino logging at the configured level.
 *
 * @example
 * ```ts
 * const config = await loadSerializerConfig({
 *   sources: [new EnvSource(), new JsonSource({ file: "tagtree.json", required: false })],
 * })
 * const serializer = createSerializerFromConfig(config, { codecs: defaultCodecs })
 * ```
 */
export function createSerializerFromConfig(
  config: IConfig<SerializerConfig>,
  opts: SerializerFromConfigOptions = {},
): TreeSerializer {
  const { LOG_LEVEL, LOG_PRETTY } = config.value
  const logger = createPinoLogger(opts.loggerDeps, { level: LOG_LEVEL, prettify: LOG_PRETTY })

  return createSerializer({
    ...(opts.codecs !== undefined && { codecs: opts.codecs }),
    ...(opts.format !== undefined && { format: opts.format }),
    ...(opts.name !== undefined && { name: opts.name }),
    options: toSerializerOptions(config.value),
    logger,
  })
}
