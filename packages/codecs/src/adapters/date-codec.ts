import type { Codec } from "@tagtree/core"
import { CodecPayloadError } from "../core/errors"

/** ISO-8601 in UTC, millisecond precision. Invalid dates cannot be encoded. */
export const dateCodec: Codec<Date, string> = {
  name: "dt",
  kind: Date,
  encode: (date) => date.toISOString(),
  decode: (text) => {
    if (typeof text !== "string") {
      throw CodecPayloadError.expected("dt", "an ISO-8601 string", text)
    }

    const date = new Date(text)
    if (Number.isNaN(date.getTime())) throw CodecPayloadError.invalid("dt", `invalid date "${text}"`)

    return date
  },
}
