import { logLevelNames } from "@tagtree/logger"
import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { ConfigError } from "./config-error"
import { loadConfig } from "./load"

export const duplicatePolicies = ["error", "overwrite"] as const

export type DuplicatePolicy = (typeof duplicatePolicies)[number]

export const DEFAULT_MAX_DEPTH = 512

const marker = z
  .string()
  .regex(/^[^\w:]$/, "must be exactly one character that is not a letter, digit, '_' or ':'")

/**
 * Wire convention and walk limits of a serializer instance.
 *
 * The type key defaults to the tag marker followed by "t" and must start
 * with the tag marker: user keys starting with a marker are always escaped,
 * so they can never be mistaken for it.
 */
export const serializerOptionsSchema = z
  .object({
    tagMarker: marker.default("$"),
    escapeMarker: marker.default("/"),
    typeKey: z.string().min(1).optional(),
    valueKey: z.string().min(1).default("v"),
    maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
    duplicates: z.enum(duplicatePolicies).default("error"),
  })
  .transform(({ typeKey, ...rest }) => ({
    ...rest,
    typeKey: typeKey ?? `${rest.tagMarker}t`,
  }))
  .refine((o) => o.tagMarker !== o.escapeMarker, {
    message: "tagMarker and escapeMarker must differ",
    path: ["escapeMarker"],
  })
  .refine((o) => o.typeKey.startsWith(o.tagMarker), {
    message: "typeKey must start with tagMarker",
    path: ["typeKey"],
  })
  .refine((o) => o.typeKey !== o.valueKey, {
    message: "typeKey and valueKey must differ",
    path: ["valueKey"],
  })

export type SerializerOptionsInput = z.input<typeof serializerOptionsSchema>
export type SerializerOptions = Readonly<z.output<typeof serializerOptionsSchema>>

export function resolveSerializerOptions(
  input: SerializerOptionsInput = {},
): SerializerOptions {
  const result = serializerOptionsSchema.safeParse(input)

  if (!result.success) {
    throw ConfigError.invalid(z.prettifyError(result.error))
  }

  return Object.freeze(result.data)
}

/**
 * Flat, environment-style keys as they appear in `TAGTREE_*` variables,
 * `.env` files and JSON config files.
 */
export const serializerConfigSchema = z.object({
  TAG_MARKER: z.string().optional(),
  ESCAPE_MARKER: z.string().optional(),
  TYPE_KEY: z.string().optional(),
  VALUE_KEY: z.string().optional(),
  MAX_DEPTH: z.coerce.number().int().positive().optional(),
  DUPLICATES: z.enum(duplicatePolicies).optional(),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type SerializerConfig = z.output<typeof serializerConfigSchema>

export function toSerializerOptions(config: SerializerConfig): SerializerOptionsInput {
  return {
    ...(config.TAG_MARKER !== undefined && { tagMarker: config.TAG_MARKER }),
    ...(config.ESCAPE_MARKER !== undefined && { escapeMarker: config.ESCAPE_MARKER }),
    ...(config.TYPE_KEY !== undefined && { typeKey: config.TYPE_KEY }),
    ...(config.VALUE_KEY !== undefined && { valueKey: config.VALUE_KEY }),
    ...(config.MAX_DEPTH !== undefined && { maxDepth: config.MAX_DEPTH }),
    ...(config.DUPLICATES !== undefined && { duplicates: config.DUPLICATES }),
  }
}

export type LoadSerializerConfigOptions = {
  /** Defaults to `[new EnvSource()]`, i.e. `TAGTREE_*` variables */
  sources?: readonly ConfigSource[]
}

/**
 * Loads serializer configuration and checks that the wire convention it
 * describes is usable, so a bad marker fails at startup rather than on the
 * first `dumps`.
 */
export async function loadSerializerConfig(
  opts: LoadSerializerConfigOptions = {},
): Promise<IConfig<SerializerConfig>> {
  const config = await loadConfig({
    schema: serializerConfigSchema,
    sources: opts.sources ?? [new EnvSource()],
  })

  resolveSerializerOptions(toSerializerOptions(config.value))

  return config
}
