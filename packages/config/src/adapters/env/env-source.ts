import type { ConfigSource } from "../../ports/source"
import { stripPrefix } from "../dotenv/dotenv-source"

export const DEFAULT_ENV_PREFIX = "TAGTREE_"

export type EnvSourceOptions = {
  /**
   * Only variables starting with this prefix are read, with the prefix
   * removed. Pass `""` to read the whole environment.
   *
   * @default "TAGTREE_"
   */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    return stripPrefix(this.env, this.prefix)
  }
}
