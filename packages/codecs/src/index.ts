export { bigintCodec } from "./adapters/bigint-codec"
export { dateCodec } from "./adapters/date-codec"
export { defaultCodecs } from "./adapters/default-codecs"
export { mapCodec } from "./adapters/map-codec"
export { numberCodec } from "./adapters/number-codec"
export { regexpCodec } from "./adapters/regexp-codec"
export { setCodec } from "./adapters/set-codec"
export { urlCodec } from "./adapters/url-codec"
export { uuidCodec } from "./adapters/uuid-codec"
export { CodecPayloadError, InvalidUuidError } from "./core/errors"
export { Uuid } from "./core/uuid"
