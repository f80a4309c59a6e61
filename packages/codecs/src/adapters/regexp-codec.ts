import type { Codec } from "@tagtree/core"
import { CodecPayloadError } from "../core/errors"

export const regexpCodec: Codec<RegExp, [source: string, flags: string]> = {
  name: "re",
  kind: RegExp,
  encode: (re) => [re.source, re.flags],
  decode: (payload) => {
    if (!Array.isArray(payload) || payload.length !== 2) {
      throw CodecPayloadError.expected("re", "a [source, flags] pair", payload)
    }

    const [source, flags] = payload
    if (typeof source !== "string" || typeof flags !== "string") {
      throw CodecPayloadError.invalid("re", "source and flags must be strings")
    }

    try {
      return new RegExp(source, flags)
    } catch (err) {
      throw CodecPayloadError.invalid("re", err instanceof Error ? err.message : String(err))
    }
  },
}
