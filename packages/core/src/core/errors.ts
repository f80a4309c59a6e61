import { BaseError, type ErrorContext } from "@tagtree/errors"
import type { PathSegment } from "../ports/primitive"
import { constructorOf } from "./transform/kind"

/**
 * Formats a tree path as a JSON Pointer (RFC 6901), "" being the root.
 */
export function formatPath(path: readonly PathSegment[]): string {
  return path
    .map((segment) => `/${String(segment).replaceAll("~", "~0").replaceAll("/", "~1")}`)
    .join("")
}

function at(path: readonly PathSegment[]): string {
  return path.length === 0 ? "" : ` at "${formatPath(path)}"`
}

export function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (typeof value !== "object") return typeof value

  const ctor = constructorOf(value)

  return typeof ctor === "function" && ctor.name ? ctor.name : "object"
}

export class UnknownCodecError extends BaseError<"unknown_codec"> {
  static forName(name: string, path: readonly PathSegment[] = []): UnknownCodecError {
    return new UnknownCodecError(`No codec registered under name '${name}'${at(path)}`, {
      code: "unknown_codec",
      context: { name, path: [...path] },
    })
  }
}

export class MalformedTagError extends BaseError<"malformed_tag"> {
  static forString(value: string, path: readonly PathSegment[]): MalformedTagError {
    return new MalformedTagError(`Malformed tag ${JSON.stringify(value)}${at(path)}`, {
      code: "malformed_tag",
      context: { value, path: [...path] },
    })
  }

  static forCompound(reason: string, path: readonly PathSegment[]): MalformedTagError {
    return new MalformedTagError(`Malformed tagged object${at(path)}: ${reason}`, {
      code: "malformed_tag",
      context: { reason, path: [...path] },
    })
  }
}

export type DuplicateRegistrationCode = "duplicate_name" | "duplicate_kind"

export class DuplicateRegistrationError extends BaseError<DuplicateRegistrationCode> {
  static forName(name: string): DuplicateRegistrationError {
    return new DuplicateRegistrationError(`A codec named '${name}' is already registered`, {
      code: "duplicate_name",
      context: { name },
      isOperational: false,
    })
  }

  static forKind(kind: string, name: string, existing: string): DuplicateRegistrationError {
    return new DuplicateRegistrationError(
      `Codec '${name}' handles kind ${kind}, already handled by codec '${existing}'`,
      {
        code: "duplicate_kind",
        context: { kind, name, existing },
        isOperational: false,
      },
    )
  }
}

export class InvalidCodecError extends BaseError<"invalid_codec"> {
  static because(reason: string, context: ErrorContext): InvalidCodecError {
    return new InvalidCodecError(`Invalid codec: ${reason}`, {
      code: "invalid_codec",
      context,
      isOperational: false,
    })
  }
}

export class UnsupportedValueError extends BaseError<"unsupported_value"> {
  static forValue(value: unknown, path: readonly PathSegment[]): UnsupportedValueError {
    const type = describeValue(value)

    return new UnsupportedValueError(
      `Cannot convert a value of type ${type} to a primitive tree${at(path)}; ` +
        "register a codec for it",
      {
        code: "unsupported_value",
        context: { type, path: [...path] },
      },
    )
  }
}

export class UnsupportedKeyError extends BaseError<"unsupported_key"> {
  static forKey(key: unknown, path: readonly PathSegment[]): UnsupportedKeyError {
    const type = describeValue(key)

    return new UnsupportedKeyError(`Cannot use a key of type ${type} in a mapping${at(path)}`, {
      code: "unsupported_key",
      context: { type, path: [...path] },
    })
  }

  /** Two keys of one Map share a string form, e.g. `1` and `"1"`. */
  static duplicate(encodedKey: string, path: readonly PathSegment[]): UnsupportedKeyError {
    return new UnsupportedKeyError(
      `Two keys of a mapping both encode to ${JSON.stringify(encodedKey)}${at(path)}`,
      {
        code: "unsupported_key",
        context: { key: encodedKey, path: [...path] },
      },
    )
  }

  static nonStringCodec(name: string, path: readonly PathSegment[]): UnsupportedKeyError {
    return new UnsupportedKeyError(
      `Codec '${name}' does not encode to a string and cannot be used for mapping keys${at(path)}`,
      {
        code: "unsupported_key",
        context: { codec: name, path: [...path] },
        isOperational: false,
      },
    )
  }
}

export class DepthLimitError extends BaseError<"depth_limit"> {
  static exceeded(maxDepth: number, path: readonly PathSegment[]): DepthLimitError {
    return new DepthLimitError(
      `Nesting deeper than ${maxDepth} levels${at(path)}; cyclic values are not supported`,
      {
        code: "depth_limit",
        context: { maxDepth, path: [...path] },
      },
    )
  }
}

export type TextDecodeErrorCode = "text_decode" | "unexpected_shape"

export class TextDecodeError extends BaseError<TextDecodeErrorCode> {
  static wrap(format: string, cause: unknown): TextDecodeError {
    const reason = cause instanceof Error ? cause.message : String(cause)

    return new TextDecodeError(`Could not decode ${format} text: ${reason}`, {
      code: "text_decode",
      context: { format },
      cause,
    })
  }

  static unexpectedShape(expected: string, actual: unknown): TextDecodeError {
    const type = describeValue(actual)

    return new TextDecodeError(`Decoded a value of type ${type}, expected ${expected}`, {
      code: "unexpected_shape",
      context: { expected, type },
    })
  }
}
