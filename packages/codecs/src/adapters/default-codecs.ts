import type { Codec } from "@tagtree/core"
import { bigintCodec } from "./bigint-codec"
import { dateCodec } from "./date-codec"
import { urlCodec } from "./url-codec"
import { uuidCodec } from "./uuid-codec"

/**
 * Codecs that change no behavior of plain JSON values. `setCodec`, `mapCodec`,
 * `regexpCodec` and `numberCodec` are opt-in.
 */
export const defaultCodecs: readonly Codec[] = Object.freeze([
  dateCodec,
  bigintCodec,
  urlCodec,
  uuidCodec,
])
