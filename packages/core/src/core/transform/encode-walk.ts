import type { KindEntry } from "../../ports/codec"
import type { Primitive, PrimitiveObject } from "../../ports/primitive"
import { UnsupportedKeyError, UnsupportedValueError } from "../errors"
import { isPlainObject, runtimeKindOf } from "./kind"
import type { Walk } from "./walk"

/**
 * Rewrites an application value into a primitive tree, top-down.
 *
 * Order matters: plain objects and arrays first, then integers (never looked
 * up, so a `Number` codec only sees non-integers), then registered kinds,
 * then unregistered Maps, then scalars.
 */
export function encodeValue(walk: Walk, value: unknown, depth = 0): Primitive {
  walk.enter(depth)

  if (isPlainObject(value)) return encodeEntries(walk, Object.entries(value), depth)

  if (Array.isArray(value)) {
    return Array.from(value, (item: unknown, index) =>
      walk.within(index, () => encodeValue(walk, item, depth + 1)),
    )
  }

  if (typeof value === "number" && Number.isInteger(value)) return value

  const entry = walk.registry.lookupByKind(runtimeKindOf(value))
  if (entry) return encodeTagged(walk, entry, value, depth)

  if (value instanceof Map) return encodeEntries(walk, value.entries(), depth)

  if (typeof value === "string") {
    return walk.syntax.needsEscape(value) ? walk.syntax.escape(value) : value
  }

  if (typeof value === "number" || typeof value === "boolean" || value === null) {
    return value
  }

  throw UnsupportedValueError.forValue(value, walk.path)
}

function encodeTagged(walk: Walk, entry: KindEntry, value: unknown, depth: number): Primitive {
  const encoded = entry.encode(value)
  if (encoded === undefined || encoded === null) return walk.syntax.format(entry.name)

  const payload = walk.within(walk.payloadSegment(entry.name), () =>
    encodeValue(walk, encoded, depth + 1),
  )

  if (typeof payload === "string") return walk.syntax.format(entry.name, payload)

  return {
    [walk.options.typeKey]: entry.name,
    [walk.options.valueKey]: payload,
  }
}

function encodeEntries(
  walk: Walk,
  entries: Iterable<readonly [unknown, unknown]>,
  depth: number,
): PrimitiveObject {
  const out: Array<[string, Primitive]> = []
  const seen = new Set<string>()

  for (const [key, value] of entries) {
    if (value === undefined) continue

    const encodedKey = encodeKey(walk, key, depth)
    if (seen.has(encodedKey)) throw UnsupportedKeyError.duplicate(encodedKey, walk.path)
    seen.add(encodedKey)

    const segment = typeof key === "string" ? key : encodedKey

    out.push([encodedKey, walk.within(segment, () => encodeValue(walk, value, depth + 1))])
  }

  return Object.fromEntries(out)
}

/**
 * Mapping keys must end up as strings: strings are escaped like values,
 * registered kinds must encode to a tagged scalar, other scalars are
 * stringified.
 */
export function encodeKey(walk: Walk, key: unknown, depth: number): string {
  if (typeof key === "string") {
    return walk.syntax.needsEscape(key) ? walk.syntax.escape(key) : key
  }

  if (typeof key === "number" && Number.isInteger(key)) return String(key)

  const entry = walk.registry.lookupByKind(runtimeKindOf(key))
  if (entry) {
    const encoded = encodeTagged(walk, entry, key, depth)
    if (typeof encoded !== "string") {
      throw UnsupportedKeyError.nonStringCodec(entry.name, walk.path)
    }

    return encoded
  }

  if (typeof key === "number" || typeof key === "boolean" || key === null) {
    return String(key)
  }

  throw UnsupportedKeyError.forKey(key, walk.path)
}
