import type { PathSegment } from "../../ports/primitive"
import type { CodecRegistry } from "../registry/codec-registry"
import { DepthLimitError } from "../errors"
import type { TagSyntax } from "./tag-syntax"

export type WalkOptions = Readonly<{
  typeKey: string
  valueKey: string
  maxDepth: number
}>

/**
 * State of a single toPrimitive/fromPrimitive call. `path` is the location
 * currently being visited and is copied into any error raised there.
 */
export class Walk {
  readonly path: PathSegment[] = []

  constructor(
    readonly registry: CodecRegistry,
    readonly syntax: TagSyntax,
    readonly options: WalkOptions,
  ) {}

  /** Path segment for a codec payload, e.g. "$dt" */
  payloadSegment(name: string): string {
    return this.syntax.tagMarker + name
  }

  enter(depth: number): void {
    if (depth > this.options.maxDepth) {
      throw DepthLimitError.exceeded(this.options.maxDepth, this.path)
    }
  }

  within<T>(segment: PathSegment, fn: () => T): T {
    this.path.push(segment)
    try {
      return fn()
    } finally {
      this.path.pop()
    }
  }
}
