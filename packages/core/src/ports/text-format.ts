import type { Primitive } from "./primitive"

/**
 * The underlying text serializer, treated as an opaque pair of functions.
 *
 * Formats never see application kinds: the serializer hands them primitive
 * trees and expects primitive trees back.
 */
export interface TextFormat {
  /** Short identifier used in logs and errors, e.g. "json" */
  readonly name: string

  encode(tree: Primitive): string

  /**
   * @throws whatever the format throws on malformed text; the serializer
   * wraps it in a TextDecodeError.
   */
  decode(text: string): Primitive
}
