import type { BytesCodec } from "../../ports/bytes-codec"
import { TextDecodeError } from "../../core/errors"
import type { TreeSerializer } from "../../core/serializer/tree-serializer"

/**
 * UTF-8 bridge from a serializer to the bytes-in, bytes-out codec shape of
 * caches and key/value stores.
 *
 * Without a guard the decoded value is returned as `unknown`. With one, a
 * value failing the guard throws TextDecodeError ("unexpected_shape").
 *
 * @example
 * ```ts
 * const codec = createBytesCodec(serializer, isSession, "Session")
 * await store.set(key, codec.encode(session))
 * ```
 */
export function createBytesCodec(serializer: TreeSerializer): BytesCodec<unknown>
export function createBytesCodec<T>(
  serializer: TreeSerializer,
  guard: (value: unknown) => value is T,
  expected?: string,
): BytesCodec<T>
export function createBytesCodec<T>(
  serializer: TreeSerializer,
  guard?: (value: unknown) => value is T,
  expected = "a value accepted by the guard",
): BytesCodec<unknown> | BytesCodec<T> {
  const encoder = new TextEncoder()
  const decoder = new TextDecoder("utf-8", { fatal: true })

  const encode = (value: unknown): Uint8Array => encoder.encode(serializer.dumps(value))

  const loads = (bytes: Uint8Array): unknown => {
    let text: string
    try {
      text = decoder.decode(bytes)
    } catch (err) {
      throw TextDecodeError.wrap("utf-8", err)
    }

    return serializer.loads(text)
  }

  if (!guard) return { encode, decode: loads }

  return {
    encode,
    decode(bytes: Uint8Array): T {
      const value = loads(bytes)
      if (!guard(value)) throw TextDecodeError.unexpectedShape(expected, value)

      return value
    },
  }
}
