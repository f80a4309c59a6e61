import type { Codec } from "@tagtree/core"
import { CodecPayloadError } from "../core/errors"

/** Members are transformed like any other value, so they may be registered kinds. */
export const setCodec: Codec<Set<unknown>, unknown[]> = {
  name: "set",
  kind: Set,
  encode: (set) => [...set],
  decode: (members) => {
    if (!Array.isArray(members)) throw CodecPayloadError.expected("set", "an array", members)

    return new Set(members)
  },
}
