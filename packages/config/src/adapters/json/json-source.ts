import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readConfigFile } from "../file/read-config-file"

export type JsonSourceOptions = FileSourceOptions

function parseJsonObject(content: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(content)

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new TypeError("JSON config file must contain an object at the top level")
  }

  return { ...parsed }
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    return readConfigFile(this.opts, parseJsonObject)
  }
}
