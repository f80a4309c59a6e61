import type { Codec } from "@tagtree/core"
import { CodecPayloadError } from "../core/errors"
import { Uuid } from "../core/uuid"

export const uuidCodec: Codec<Uuid, string> = {
  name: "uuid",
  kind: Uuid,
  encode: (id) => id.toString(),
  decode: (text) => {
    if (typeof text !== "string") throw CodecPayloadError.expected("uuid", "a UUID string", text)

    return Uuid.parse(text)
  },
}
