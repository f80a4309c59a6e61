/**
 * Runtime identity of a value: its exact constructor for objects, or the
 * wrapper function (`BigInt`, `Number`, `String`, `Boolean`, `Symbol`) for
 * primitives.
 */
export type Kind<T = unknown> =
  | (abstract new (...args: never[]) => T)
  | ((...args: never[]) => T)

/**
 * A named, bidirectional conversion between one application kind and a
 * fragment of primitive tree.
 *
 * @remarks
 * - `name` travels on the wire and must match `/^\w+$/`.
 * - Kinds are matched exactly: a subclass instance does not use its base
 *   class' codec.
 * - `encode` may return any value the serializer can walk, including other
 *   registered kinds; it is transformed recursively. Returning `undefined`
 *   or `null` marks a value that carries no payload, and `decode` then
 *   receives `undefined`.
 * - `name` must not turn the bare tag into the serializer's type key
 *   (`t` under the default `$t`).
 * - Codecs should be pure: the serializer may call them from any walk.
 *
 * @example
 * ```ts
 * const pointCodec: Codec<Point, [number, number]> = {
 *   name: "point",
 *   kind: Point,
 *   encode: (p) => [p.x, p.y],
 *   decode: (xy) => (xy ? new Point(xy[0], xy[1]) : new Point(0, 0)),
 * }
 * ```
 */
export interface Codec<T = unknown, P = unknown> {
  readonly name: string
  readonly kind: Kind<T>
  encode(value: T): P | null | undefined
  decode(primitive: P | undefined): T
}

export type KindEntry = Readonly<{
  name: string
  encode: (value: unknown) => unknown
}>

export type DecodeFn = (primitive: unknown) => unknown
