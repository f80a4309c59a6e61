import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { JsonSource } from "../json-source"

describe("JsonSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "tagtree-json-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("keeps JSON types as written", async () => {
    await fs.writeFile(
      path.join(cwd, "tagtree.json"),
      JSON.stringify({ MAX_DEPTH: 64, LOG_PRETTY: false, TYPE_KEY: "$type" }),
    )

    const source = new JsonSource({ file: "tagtree.json", required: true, cwd })

    expect(await source.load()).toEqual({ MAX_DEPTH: 64, LOG_PRETTY: false, TYPE_KEY: "$type" })
  })

  it("rejects a file whose top level is not an object", async () => {
    await fs.writeFile(path.join(cwd, "tagtree.json"), "[1, 2]")

    const source = new JsonSource({ file: "tagtree.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow(
      "JSON config file must contain an object at the top level",
    )
  })

  it("propagates syntax errors", async () => {
    await fs.writeFile(path.join(cwd, "tagtree.json"), "{ MAX_DEPTH: 1 }")

    const source = new JsonSource({ file: "tagtree.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow(SyntaxError)
  })

  it("returns empty object when file missing and not required", async () => {
    const source = new JsonSource({ file: "missing.json", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("throws when file missing and required", async () => {
    const source = new JsonSource({ file: "missing.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow(/ENOENT/)
  })
})
