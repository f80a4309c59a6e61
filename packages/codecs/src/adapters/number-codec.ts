import type { Codec } from "@tagtree/core"
import { CodecPayloadError } from "../core/errors"

const special: Record<string, number> = {
  NaN: Number.NaN,
  Infinity: Number.POSITIVE_INFINITY,
  "-Infinity": Number.NEGATIVE_INFINITY,
}

/**
 * Non-integer numbers, including the ones JSON cannot carry (NaN, ±Infinity).
 * Integers never reach a codec and stay plain numbers.
 */
export const numberCodec: Codec<number, string> = {
  name: "num",
  kind: Number,
  encode: (n) => String(n),
  decode: (text) => {
    if (typeof text !== "string") throw CodecPayloadError.expected("num", "a numeric string", text)

    const value = Object.hasOwn(special, text) ? special[text] : Number(text)
    if (value === undefined || (Number.isNaN(value) && text !== "NaN") || text.trim() === "") {
      throw CodecPayloadError.invalid("num", `"${text}" is not a number`)
    }

    return value
  },
}
