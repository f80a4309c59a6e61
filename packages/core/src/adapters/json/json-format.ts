import type { Primitive } from "../../ports/primitive"
import type { TextFormat } from "../../ports/text-format"

export type JsonFormatOptions = {
  /** Indentation passed to JSON.stringify. Default: compact output */
  space?: number | string
}

export class JsonTextFormat implements TextFormat {
  readonly name = "json"

  public constructor(private readonly opts: JsonFormatOptions = {}) {}

  encode(tree: Primitive): string {
    return JSON.stringify(tree, undefined, this.opts.space)
  }

  decode(text: string): Primitive {
    return JSON.parse(text)
  }
}

export function createJsonFormat(opts: JsonFormatOptions = {}): TextFormat {
  return new JsonTextFormat(opts)
}
