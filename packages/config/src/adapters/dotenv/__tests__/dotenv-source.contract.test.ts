import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { DotenvSource } from "../dotenv-source"

describeConfigSourceContract({
  name: "DotenvSource",
  setup: async (cwd) => {
    await fs.writeFile(path.join(cwd, ".env"), "TAG_MARKER='#'\nMAX_DEPTH=32\n")
  },
  make: (cwd) => new DotenvSource({ file: ".env", required: true, cwd }),
  expectedValue: () => ({ TAG_MARKER: "#", MAX_DEPTH: "32" }),
})
