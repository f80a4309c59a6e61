export type PrimitiveScalar = string | number | boolean | null

export type PrimitiveObject = { [key: string]: Primitive }

/**
 * The value shape a text format understands natively: string-keyed objects,
 * arrays, strings, numbers, booleans and null.
 */
export type Primitive = PrimitiveScalar | Primitive[] | PrimitiveObject

/** Location of a value inside a tree: object keys and array indices from the root. */
export type PathSegment = string | number
