import {
  resolveSerializerOptions,
  type SerializerOptions,
  type SerializerOptionsInput,
} from "@tagtree/config"
import { isAppError } from "@tagtree/errors"
import { createNullLogger, type Logger } from "@tagtree/logger"
import { JsonTextFormat } from "../../adapters/json/json-format"
import type { Codec } from "../../ports/codec"
import type { Primitive } from "../../ports/primitive"
import type { TextFormat } from "../../ports/text-format"
import { InvalidCodecError, TextDecodeError } from "../errors"
import { type CodecRegistry, createCodecRegistry } from "../registry/codec-registry"
import { decodeValue } from "../transform/decode-walk"
import { encodeValue } from "../transform/encode-walk"
import { TagSyntax } from "../transform/tag-syntax"
import { Walk } from "../transform/walk"

/**
 * Bidirectional tree transformer bound to one registry, one text format and
 * one wire convention. Stateless between calls and safe to share.
 */
export class TreeSerializer {
  private readonly syntax: TagSyntax

  public constructor(
    readonly registry: CodecRegistry,
    readonly format: TextFormat,
    readonly options: SerializerOptions,
    private readonly logger: Logger,
  ) {
    this.syntax = new TagSyntax(options.tagMarker, options.escapeMarker)
  }

  /**
   * @throws UnsupportedValueError, UnsupportedKeyError, DepthLimitError
   */
  toPrimitive(value: unknown): Primitive {
    return encodeValue(this.walk(), value)
  }

  /**
   * @throws MalformedTagError, UnknownCodecError, DepthLimitError
   */
  fromPrimitive(tree: Primitive): unknown {
    return decodeValue(this.walk(), tree)
  }

  dumps(value: unknown): string {
    const text = this.format.encode(this.toPrimitive(value))

    this.logger.trace("dumps", { operation: "dumps", format: this.format.name, chars: text.length })

    return text
  }

  /**
   * @throws TextDecodeError when the format rejects `text`; errors from the
   * tree walk propagate as they are
   */
  loads(text: string): unknown {
    this.logger.trace("loads", { operation: "loads", format: this.format.name, chars: text.length })

    return this.fromPrimitive(this.parse(text))
  }

  private parse(text: string): Primitive {
    try {
      return this.format.decode(text)
    } catch (err) {
      if (isAppError(err)) throw err
      throw TextDecodeError.wrap(this.format.name, err)
    }
  }

  private walk(): Walk {
    return new Walk(this.registry, this.syntax, this.options)
  }
}

export type CreateSerializerOptions = {
  /** Registered in order; see `createCodecRegistry` for clashes */
  codecs?: Iterable<Codec>
  /** Default: JSON */
  format?: TextFormat
  /** Wire convention and limits, validated like loaded configuration */
  options?: SerializerOptionsInput
  logger?: Logger
  /** Label carried by every log line of this instance. Default: "default" */
  name?: string
}

/**
 * @throws ConfigError for invalid options
 * @throws InvalidCodecError, DuplicateRegistrationError while building the registry,
 * or when a codec's bare tag would read as the type key
 */
export function createSerializer(opts: CreateSerializerOptions = {}): TreeSerializer {
  const options = resolveSerializerOptions(opts.options)
  const logger = (opts.logger ?? createNullLogger()).child({ serializer: opts.name ?? "default" })
  const registry = createCodecRegistry(opts.codecs ?? [], {
    duplicates: options.duplicates,
    logger,
  })

  const reserved = options.typeKey.slice(options.tagMarker.length)
  if (registry.hasName(reserved)) {
    throw InvalidCodecError.because(`name '${reserved}' collides with the type key`, {
      name: reserved,
      typeKey: options.typeKey,
    })
  }

  return new TreeSerializer(registry, opts.format ?? new JsonTextFormat(), options, logger)
}
