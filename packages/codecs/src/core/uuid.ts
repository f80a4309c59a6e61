import { randomUUID } from "node:crypto"
import { parse, stringify, validate, v7, version } from "uuid"
import { InvalidUuidError } from "./errors"

/**
 * Immutable UUID value. Two instances are equal when their bytes are.
 */
export class Uuid {
  private readonly bytes: Uint8Array

  constructor(bytes: Uint8Array) {
    if (bytes.length !== 16) throw InvalidUuidError.forBytes(bytes.length)

    this.bytes = Uint8Array.from(bytes)
    Object.freeze(this)
  }

  /**
   * Accepts any letter case; `toString()` is always lowercase.
   *
   * @throws InvalidUuidError
   */
  static parse(text: string): Uuid {
    if (!validate(text)) throw InvalidUuidError.forText(text)

    return new Uuid(parse(text))
  }

  static v4(): Uuid {
    return Uuid.parse(randomUUID())
  }

  /** Time-ordered: later values sort after earlier ones. */
  static v7(): Uuid {
    return Uuid.parse(v7())
  }

  get version(): number {
    return version(this.toString())
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes)
  }

  equals(other: Uuid): boolean {
    return this.bytes.every((byte, i) => byte === other.bytes[i])
  }

  toString(): string {
    return stringify(this.bytes)
  }

  toJSON(): string {
    return this.toString()
  }
}
