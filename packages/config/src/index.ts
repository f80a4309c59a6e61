export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { DEFAULT_ENV_PREFIX, EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export type { FileSourceOptions } from "./adapters/file/read-config-file"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { ConfigError, type ConfigErrorCode } from "./core/config-error"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export {
  DEFAULT_MAX_DEPTH,
  type DuplicatePolicy,
  duplicatePolicies,
  type LoadSerializerConfigOptions,
  loadSerializerConfig,
  resolveSerializerOptions,
  type SerializerConfig,
  serializerConfigSchema,
  type SerializerOptions,
  type SerializerOptionsInput,
  serializerOptionsSchema,
  toSerializerOptions,
} from "./core/serializer-config"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
