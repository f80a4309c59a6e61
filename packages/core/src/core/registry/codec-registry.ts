import type { DuplicatePolicy } from "@tagtree/config"
import { createNullLogger, type Logger } from "@tagtree/logger"
import type { Codec, DecodeFn, Kind, KindEntry } from "../../ports/codec"
import { DuplicateRegistrationError, InvalidCodecError, UnknownCodecError } from "../errors"
import { kindLabel } from "../transform/kind"

const CODEC_NAME = /^\w+$/

export type CodecRegistryOptions = {
  /** What a clashing name or kind does. Default: "error" */
  duplicates?: DuplicatePolicy
  logger?: Logger
}

/**
 * Read-only lookup structure built once from an ordered codec list: one index
 * by kind for encoding, one by name for decoding.
 */
export interface CodecRegistry {
  readonly size: number

  lookupByKind(kind: unknown): KindEntry | undefined

  /** @throws UnknownCodecError */
  lookupByName(name: string): DecodeFn

  findDecoder(name: string): DecodeFn | undefined
  hasName(name: string): boolean

  /** Registered names in registration order */
  names(): readonly string[]
}

type NameEntry = Readonly<{ kind: Kind; decode: DecodeFn }>

class FrozenCodecRegistry implements CodecRegistry {
  constructor(
    private readonly byKind: ReadonlyMap<unknown, KindEntry>,
    private readonly byName: ReadonlyMap<string, NameEntry>,
  ) {
    Object.freeze(this)
  }

  get size(): number {
    return this.byName.size
  }

  lookupByKind(kind: unknown): KindEntry | undefined {
    return this.byKind.get(kind)
  }

  lookupByName(name: string): DecodeFn {
    const decode = this.findDecoder(name)
    if (!decode) throw UnknownCodecError.forName(name)

    return decode
  }

  findDecoder(name: string): DecodeFn | undefined {
    return this.byName.get(name)?.decode
  }

  hasName(name: string): boolean {
    return this.byName.has(name)
  }

  names(): readonly string[] {
    return Object.freeze([...this.byName.keys()])
  }
}

function validate(codec: Codec): void {
  if (typeof codec.name !== "string" || !CODEC_NAME.test(codec.name)) {
    throw InvalidCodecError.because("name must match /^\\w+$/", { name: String(codec.name) })
  }

  if (typeof codec.kind !== "function") {
    throw InvalidCodecError.because("kind must be a constructor or function", {
      name: codec.name,
    })
  }

  if (typeof codec.encode !== "function" || typeof codec.decode !== "function") {
    throw InvalidCodecError.because("encode and decode must be functions", { name: codec.name })
  }
}

/**
 * Builds a frozen registry. Codecs are indexed in order, so under the
 * "overwrite" policy the later codec wins for the name or kind it shares.
 *
 * @throws InvalidCodecError for malformed codecs
 * @throws DuplicateRegistrationError under the "error" policy
 */
export function createCodecRegistry(
  codecs: Iterable<Codec>,
  options: CodecRegistryOptions = {},
): CodecRegistry {
  const duplicates = options.duplicates ?? "error"
  const logger = (options.logger ?? createNullLogger()).child({ operation: "register" })

  const byKind = new Map<unknown, KindEntry>()
  const byName = new Map<string, NameEntry>()

  for (const codec of codecs) {
    validate(codec)

    const { name, kind } = codec
    const sameName = byName.get(name)
    const sameKind = byKind.get(kind)

    if (duplicates === "error") {
      if (sameName) throw DuplicateRegistrationError.forName(name)
      if (sameKind) {
        throw DuplicateRegistrationError.forKind(kindLabel(kind), name, sameKind.name)
      }
    } else {
      if (sameName) {
        logger.warn("codec name registered twice; later codec wins", { codec: name })
      }
      if (sameKind) {
        logger.warn("codec kind registered twice; later codec wins", {
          codec: name,
          kind: kindLabel(kind),
          replaced: sameKind.name,
        })
      }
    }

    byKind.set(
      kind,
      Object.freeze({ name, encode: (value: unknown) => codec.encode(value) }),
    )
    byName.set(
      name,
      Object.freeze({ kind, decode: (primitive: unknown) => codec.decode(primitive) }),
    )
  }

  logger.debug("codec registry built", { codecs: [...byName.keys()] })

  return new FrozenCodecRegistry(byKind, byName)
}
