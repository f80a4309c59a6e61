import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readConfigFile } from "../file/read-config-file"

export type DotenvSourceOptions = FileSourceOptions & {
  /**
   * Only keys starting with this prefix are kept, with the prefix removed,
   * so a shared `.env` can hold `TAGTREE_MAX_DEPTH=64` next to other settings.
   */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const values = await readConfigFile(this.opts, parse)

    return stripPrefix(values, this.opts.prefix)
  }
}

export function stripPrefix(
  values: Record<string, unknown>,
  prefix: string | undefined,
): Record<string, unknown> {
  if (!prefix) return { ...values }

  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) out[key.slice(prefix.length)] = value
  }

  return out
}
