export type ParsedTag = Readonly<{
  name: string
  /** `undefined` when the tag carries no `:` segment */
  body: string | undefined
}>

function escapeRegExp(source: string): string {
  return source.replaceAll(/[.*+?^${}()|[\]\\]/g, String.raw`\$&`)
}

/**
 * String-level half of the wire convention: tagged scalars
 * (`$name`, `$name:body`) and escaped user strings (`/...`).
 */
export class TagSyntax {
  private readonly pattern: RegExp

  constructor(
    readonly tagMarker: string,
    readonly escapeMarker: string,
  ) {
    this.pattern = new RegExp(String.raw`^${escapeRegExp(tagMarker)}(\w+)(?::([\s\S]*))?$`)
  }

  needsEscape(value: string): boolean {
    return value.startsWith(this.tagMarker) || value.startsWith(this.escapeMarker)
  }

  escape(value: string): string {
    return this.escapeMarker + value
  }

  isEscaped(value: string): boolean {
    return value.startsWith(this.escapeMarker)
  }

  unescape(value: string): string {
    return value.slice(this.escapeMarker.length)
  }

  isTagged(value: string): boolean {
    return value.startsWith(this.tagMarker)
  }

  format(name: string, body?: string): string {
    return body === undefined ? this.tagMarker + name : `${this.tagMarker}${name}:${body}`
  }

  /** `undefined` when `value` does not match the tag pattern. */
  parse(value: string): ParsedTag | undefined {
    const match = this.pattern.exec(value)
    if (!match) return undefined

    const [, name = "", body] = match

    return { name, body }
  }
}
