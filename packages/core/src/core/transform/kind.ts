import type { Kind } from "../../ports/codec"

export function constructorOf(value: object): unknown {
  const proto: unknown = Object.getPrototypeOf(value)
  if (proto === null || typeof proto !== "object") return undefined

  return Object.hasOwn(proto, "constructor") ? Reflect.get(proto, "constructor") : undefined
}

/**
 * Exact runtime kind used for codec lookup. `undefined` for values that have
 * none (`null`, `undefined`, functions, objects without a prototype).
 */
export function runtimeKindOf(value: unknown): unknown {
  switch (typeof value) {
    case "bigint":
      return BigInt
    case "number":
      return Number
    case "string":
      return String
    case "boolean":
      return Boolean
    case "symbol":
      return Symbol
    case "object":
      return value === null ? undefined : constructorOf(value)
    default:
      return undefined
  }
}

/** Objects created by a literal, `Object.create(null)` or `JSON.parse`. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === null || proto === Object.prototype
}

export function kindLabel(kind: Kind): string {
  return kind.name || "<anonymous>"
}
