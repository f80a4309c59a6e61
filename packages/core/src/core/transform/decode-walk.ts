import type { Primitive } from "../../ports/primitive"
import { MalformedTagError, UnknownCodecError } from "../errors"
import type { Walk } from "./walk"

/**
 * Rebuilds application values from a primitive tree, top-down. Tagged
 * compounds are recognized by an own type-key property; every other object
 * is a mapping.
 */
export function decodeValue(walk: Walk, tree: Primitive, depth = 0): unknown {
  walk.enter(depth)

  if (typeof tree === "string") return decodeString(walk, tree, depth)

  if (Array.isArray(tree)) {
    return tree.map((item, index) => walk.within(index, () => decodeValue(walk, item, depth + 1)))
  }

  if (tree !== null && typeof tree === "object") {
    return Object.hasOwn(tree, walk.options.typeKey)
      ? decodeCompound(walk, tree, depth)
      : decodeEntries(walk, tree, depth)
  }

  return tree
}

/** Also the inverse key rule: keys are escaped and tagged exactly like strings. */
export function decodeString(walk: Walk, value: string, depth: number): unknown {
  const { syntax } = walk

  if (syntax.isEscaped(value)) return syntax.unescape(value)
  if (!syntax.isTagged(value)) return value

  const tag = syntax.parse(value)
  if (!tag) throw MalformedTagError.forString(value, walk.path)

  const decode = walk.registry.findDecoder(tag.name)
  if (!decode) throw UnknownCodecError.forName(tag.name, walk.path)

  const { body } = tag
  if (body === undefined) return decode(undefined)

  const payload = walk.within(walk.payloadSegment(tag.name), () =>
    decodeValue(walk, body, depth + 1),
  )

  return decode(payload)
}

function decodeCompound(walk: Walk, tree: { [key: string]: Primitive }, depth: number): unknown {
  const { typeKey, valueKey } = walk.options
  const name = tree[typeKey]
  const raw = tree[valueKey]

  if (typeof name !== "string") {
    throw MalformedTagError.forCompound(`"${typeKey}" must hold a codec name`, walk.path)
  }
  if (raw === undefined) {
    throw MalformedTagError.forCompound(`"${valueKey}" is missing`, walk.path)
  }

  const decode = walk.registry.findDecoder(name)
  if (!decode) throw UnknownCodecError.forName(name, walk.path)

  const payload = walk.within(walk.payloadSegment(name), () => decodeValue(walk, raw, depth + 1))

  return decode(payload)
}

function decodeEntries(
  walk: Walk,
  tree: { [key: string]: Primitive },
  depth: number,
): Record<string, unknown> | Map<unknown, unknown> {
  const entries = Object.entries(tree).map(([key, value]): [unknown, unknown] =>
    walk.within(key, () => [
      decodeString(walk, key, depth + 1),
      decodeValue(walk, value, depth + 1),
    ]),
  )

  if (entries.every((entry): entry is [string, unknown] => typeof entry[0] === "string")) {
    return Object.fromEntries(entries)
  }

  return new Map(entries)
}
