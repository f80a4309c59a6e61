/**
 * A source of raw configuration values.
 *
 * Sources only load; they do not validate, coerce or merge. They are applied
 * in order and later sources override earlier ones. A key whose value is
 * `undefined` counts as not provided.
 */
export interface ConfigSource {
  /**
   * Human-readable name used for provenance, e.g. "env:TAGTREE_",
   * "json:tagtree.json".
   */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
