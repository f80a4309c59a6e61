import type { Codec } from "@tagtree/core"
import { CodecPayloadError } from "../core/errors"

const DECIMAL = /^-?\d+$/

export const bigintCodec: Codec<bigint, string> = {
  name: "bigint",
  kind: BigInt,
  encode: (n) => n.toString(),
  decode: (text) => {
    if (typeof text !== "string") {
      throw CodecPayloadError.expected("bigint", "a decimal string", text)
    }
    if (!DECIMAL.test(text)) {
      throw CodecPayloadError.invalid("bigint", `"${text}" is not a decimal integer`)
    }

    return BigInt(text)
  },
}
