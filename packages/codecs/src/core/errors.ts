import { BaseError } from "@tagtree/errors"

export class CodecPayloadError extends BaseError<"invalid_payload"> {
  static expected(codec: string, expected: string, actual: unknown): CodecPayloadError {
    const got = actual === null ? "null" : Array.isArray(actual) ? "array" : typeof actual

    return new CodecPayloadError(`Codec '${codec}' expected ${expected}, got ${got}`, {
      code: "invalid_payload",
      context: { codec, expected, got },
    })
  }

  static invalid(codec: string, reason: string): CodecPayloadError {
    return new CodecPayloadError(`Codec '${codec}' cannot decode its payload: ${reason}`, {
      code: "invalid_payload",
      context: { codec, reason },
    })
  }
}

export class InvalidUuidError extends BaseError<"invalid_uuid"> {
  static forText(text: string): InvalidUuidError {
    return new InvalidUuidError(`Not a UUID: ${JSON.stringify(text)}`, {
      code: "invalid_uuid",
      context: { text },
    })
  }

  static forBytes(length: number): InvalidUuidError {
    return new InvalidUuidError(`A UUID is 16 bytes, got ${length}`, {
      code: "invalid_uuid",
      context: { length },
    })
  }
}
