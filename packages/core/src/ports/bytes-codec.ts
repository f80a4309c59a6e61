/**
 * Bidirectional transformation between a value and bytes, the shape
 * byte-oriented key/value stores and caches expect from a codec.
 */
export interface BytesCodec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
