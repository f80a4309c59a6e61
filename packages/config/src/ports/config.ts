/**
 * Validated configuration with provenance.
 *
 * @typeParam T - Shape of the configuration, inferred from a zod schema.
 *
 * @example
 * ```ts
 * const config = await loadSerializerConfig({
 *   sources: [new JsonSource({ file: "tagtree.json", required: false }), new EnvSource()],
 * })
 *
 * config.get("MAX_DEPTH")     // 128
 * config.explain("MAX_DEPTH") // "env:TAGTREE_"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object (frozen) */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`, or
   * "default" when the value comes from the schema.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value, deduplicated. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema. Usually a typo
   * such as `TAGTREE_MAXDEPTH`.
   */
  unknownKeys(): string[]
}
