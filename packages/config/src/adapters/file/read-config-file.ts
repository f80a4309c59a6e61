import fs from "node:fs/promises"
import path from "node:path"

export type FileSourceOptions = {
  /**
   * Path to the file, absolute or relative to `cwd`.
   *
   * @example "tagtree.json", "./config/.env.serializer"
   */
  file: string

  /**
   * `true` throws when the file does not exist; `false` treats a missing
   * file as an empty source.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Reads and parses a config file. Returns `{}` for a missing optional file.
 */
export async function readConfigFile(
  opts: FileSourceOptions,
  parse: (content: string) => Record<string, unknown>,
): Promise<Record<string, unknown>> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  let content: string
  try {
    content = await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isMissingFile(err)) return {}
    throw err
  }

  return parse(content)
}
