import type { Codec } from "@tagtree/core"
import { CodecPayloadError } from "../core/errors"

export const urlCodec: Codec<URL, string> = {
  name: "url",
  kind: URL,
  encode: (url) => url.href,
  decode: (href) => {
    if (typeof href !== "string") {
      throw CodecPayloadError.expected("url", "an absolute URL string", href)
    }

    try {
      return new URL(href)
    } catch (err) {
      throw CodecPayloadError.invalid("url", err instanceof Error ? err.message : String(err))
    }
  },
}
