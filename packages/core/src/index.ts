export { createBytesCodec } from "./adapters/bytes/bytes-codec"
export {
  createJsonFormat,
  type JsonFormatOptions,
  JsonTextFormat,
} from "./adapters/json/json-format"
export {
  DepthLimitError,
  DuplicateRegistrationError,
  type DuplicateRegistrationCode,
  formatPath,
  InvalidCodecError,
  MalformedTagError,
  TextDecodeError,
  type TextDecodeErrorCode,
  UnknownCodecError,
  UnsupportedKeyError,
  UnsupportedValueError,
} from "./core/errors"
export {
  type CodecRegistry,
  type CodecRegistryOptions,
  createCodecRegistry,
} from "./core/registry/codec-registry"
export {
  createSerializerFromConfig,
  type SerializerFromConfigOptions,
} from "./core/serializer/from-config"
export {
  type CreateSerializerOptions,
  createSerializer,
  TreeSerializer,
} from "./core/serializer/tree-serializer"
export { isPlainObject, runtimeKindOf } from "./core/transform/kind"
export type { ParsedTag } from "./core/transform/tag-syntax"
export { TagSyntax } from "./core/transform/tag-syntax"
export type { BytesCodec } from "./ports/bytes-codec"
export type { Codec, DecodeFn, Kind, KindEntry } from "./ports/codec"
export type { PathSegment, Primitive, PrimitiveObject, PrimitiveScalar } from "./ports/primitive"
export type { TextFormat } from "./ports/text-format"
