import type { Codec } from "@tagtree/core"
import { CodecPayloadError } from "../core/errors"

type Pair = [key: unknown, value: unknown]

function isPair(value: unknown): value is Pair {
  return Array.isArray(value) && value.length === 2
}

/**
 * Keys of any kind, in insertion order. Without this codec a Map is written
 * as a plain mapping and its keys must have a string form.
 */
export const mapCodec: Codec<Map<unknown, unknown>, Pair[]> = {
  name: "map",
  kind: Map,
  encode: (map) => [...map.entries()],
  decode: (pairs) => {
    if (!Array.isArray(pairs)) throw CodecPayloadError.expected("map", "an array of pairs", pairs)
    if (!pairs.every(isPair)) {
      throw CodecPayloadError.invalid("map", "every entry must be a [key, value] pair")
    }

    return new Map(pairs)
  },
}
