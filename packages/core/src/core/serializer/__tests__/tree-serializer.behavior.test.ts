import { ConfigError } from "@tagtree/config"
import type { Logger } from "@tagtree/logger"
import type { MockProxy } from "vitest-mock-extended"
import type { Primitive } from "../../../ports/primitive"
import type { TextFormat } from "../../../ports/text-format"
import type { Codec } from "../../../ports/codec"
import {
  MyType,
  myTypeCodec,
  Nothing,
  nothingCodec,
  Point,
  testCodecs,
  Version,
  versionCodec,
} from "../../../tests/utils/codecs"
import { type LogSink, mockLogger } from "../../../tests/utils/mock-logger"
import {
  DepthLimitError,
  MalformedTagError,
  TextDecodeError,
  UnknownCodecError,
  UnsupportedValueError,
} from "../../errors"
import { createSerializer } from "../tree-serializer"

function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error("expected a throw")
}

describe("TreeSerializer behavior", () => {
  const serializer = createSerializer({ codecs: testCodecs })

  describe("unsupported values", () => {
    it("rejects an unregistered class instance", () => {
      class Widget {}
      const err = thrownBy(() => serializer.toPrimitive({ parts: [new Widget()] }))

      expect(err).toBeInstanceOf(UnsupportedValueError)
      expect(err).toMatchObject({
        code: "unsupported_value",
        context: { type: "Widget", path: ["parts", 0] },
      })
    })

    it("rejects a subclass of a registered kind", () => {
      class Point3 extends Point {}

      expect(() => serializer.toPrimitive(new Point3(1, 2))).toThrow(UnsupportedValueError)
    })

    it.each([
      ["undefined", undefined],
      ["function", () => 1],
      ["symbol", Symbol("s")],
      ["bigint", 10n],
    ])("rejects a top-level %s", (type, value) => {
      expect(() => serializer.toPrimitive(value)).toThrow(
        expect.objectContaining({ context: { type, path: [] } }),
      )
    })

    it("rejects holes and undefined elements in arrays", () => {
      expect(() => serializer.toPrimitive([1, undefined])).toThrow(
        expect.objectContaining({ context: { type: "undefined", path: [1] } }),
      )
      expect(() => serializer.toPrimitive(new Array(2))).toThrow(UnsupportedValueError)
    })
  })

  describe("malformed input", () => {
    it("rejects a tag that does not match the pattern", () => {
      const err = thrownBy(() => serializer.fromPrimitive({ a: "$bad-tag" }))

      expect(err).toBeInstanceOf(MalformedTagError)
      expect(err).toMatchObject({ context: { value: "$bad-tag", path: ["a"] } })
    })

    it("rejects a compound whose name is not a string", () => {
      expect(() => serializer.fromPrimitive({ $t: 5, v: 1 })).toThrow(
        'Malformed tagged object: "$t" must hold a codec name',
      )
    })

    it("rejects a compound without a value", () => {
      expect(() => serializer.fromPrimitive({ $t: "point" })).toThrow(
        'Malformed tagged object: "v" is missing',
      )
    })

    it("rejects unknown names in scalars and compounds", () => {
      expect(() => serializer.fromPrimitive("$money:12")).toThrow(UnknownCodecError)
      expect(() => serializer.fromPrimitive({ $t: "money", v: 12 })).toThrow(UnknownCodecError)
    })

    it("reports a failure inside a payload with the codec segment", () => {
      const err = thrownBy(() => serializer.fromPrimitive({ $t: "mytype", v: ["$nope"] }))

      expect(err).toMatchObject({
        code: "unknown_codec",
        message: `No codec registered under name 'nope' at "/$mytype/0"`,
        context: { name: "nope", path: ["$mytype", 0] },
      })
    })

    it("applies the tag rules to keys", () => {
      expect(() => serializer.fromPrimitive({ "$nope:1": true })).toThrow(UnknownCodecError)
      expect(serializer.fromPrimitive({ "/$a": true })).toEqual({ $a: true })
    })

    it("rejects text after a bare tag name instead of ignoring it", () => {
      expect(() => serializer.fromPrimitive("$nothing-extra")).toThrow(
        'Malformed tag "$nothing-extra"',
      )
      expect(() => serializer.fromPrimitive({ "$nothing-extra": 1 })).toThrow(MalformedTagError)
    })

    it("lets errors from codec decode propagate", () => {
      expect(() => serializer.fromPrimitive("$mytype")).toThrow("mytype needs a payload")
    })
  })

  describe("depth limit", () => {
    const shallow = createSerializer({ codecs: testCodecs, options: { maxDepth: 3 } })

    it("allows values nested exactly maxDepth levels", () => {
      expect(shallow.toPrimitive([[[1]]])).toEqual([[[1]]])
      expect(shallow.fromPrimitive([[[1]]])).toEqual([[[1]]])
    })

    it("rejects one level deeper", () => {
      const err = thrownBy(() => shallow.toPrimitive([[[[1]]]]))

      expect(err).toBeInstanceOf(DepthLimitError)
      expect(err).toMatchObject({ context: { maxDepth: 3, path: [0, 0, 0, 0] } })
      expect(() => shallow.fromPrimitive([[[[1]]]])).toThrow(DepthLimitError)
    })

    it("counts codec payloads as a level", () => {
      const tight = createSerializer({ codecs: testCodecs, options: { maxDepth: 1 } })

      const enough = createSerializer({ codecs: testCodecs, options: { maxDepth: 2 } })

      expect(() => tight.toPrimitive(new Point(1, 2))).toThrow(DepthLimitError)
      expect(enough.toPrimitive(new Point(1, 2))).toEqual({ $t: "point", v: [1, 2] })
    })

    it("ends a cycle with DepthLimitError", () => {
      const cyclic: Record<string, unknown> = {}
      cyclic.self = cyclic

      expect(() => serializer.toPrimitive(cyclic)).toThrow(DepthLimitError)
    })
  })

  describe("wire convention", () => {
    const custom = createSerializer({
      codecs: [myTypeCodec, versionCodec],
      options: { tagMarker: "#", escapeMarker: "~", valueKey: "value" },
    })

    it("derives the type key from the tag marker", () => {
      expect(custom.dumps(new MyType("a", 1.5, []))).toBe('{"#t":"mytype","value":["a",1.5,[]]}')
      expect(custom.options.typeKey).toBe("#t")
    })

    it("escapes with the configured markers only", () => {
      expect(custom.toPrimitive(["#x", "~y", "$z", "/w"])).toEqual(["~#x", "~~y", "$z", "/w"])
      expect(custom.toPrimitive(new Version("1"))).toBe("#ver:1")
    })

    it("rejects a codec whose bare tag would read as the type key", () => {
      const typeLike: Codec<Nothing, undefined> = { ...nothingCodec, name: "t" }

      expect(() => createSerializer({ codecs: [typeLike] })).toThrow(
        expect.objectContaining({
          code: "invalid_codec",
          context: { name: "t", typeKey: "$t" },
        }),
      )
    })

    it("accepts the same codec once the type key differs", () => {
      const typeLike: Codec<Nothing, undefined> = { ...nothingCodec, name: "t" }
      const renamed = createSerializer({ codecs: [typeLike], options: { typeKey: "$type" } })
      const tree = renamed.toPrimitive(new Map([[new Nothing(), 1]]))

      expect(tree).toEqual({ $t: 1 })
      expect(renamed.fromPrimitive(tree)).toEqual(new Map([[new Nothing(), 1]]))
    })

    it("rejects an unusable convention", () => {
      expect(() => createSerializer({ options: { tagMarker: "$", escapeMarker: "$" } })).toThrow(
        ConfigError,
      )
      expect(() => createSerializer({ options: { typeKey: "type" } })).toThrow(
        "typeKey must start with tagMarker",
      )
    })
  })

  describe("text decoding", () => {
    it("wraps a format failure in TextDecodeError", () => {
      const err = thrownBy(() => serializer.loads("{oops"))

      expect(err).toBeInstanceOf(TextDecodeError)
      expect(err).toMatchObject({ code: "text_decode", context: { format: "json" } })
      expect(err).toHaveProperty("cause", expect.any(SyntaxError))
    })

    it("rethrows errors the format already classified", () => {
      const failure = MalformedTagError.forString("$", [])
      const format: TextFormat = {
        name: "strict",
        encode: (tree: Primitive) => JSON.stringify(tree),
        decode: () => {
          throw failure
        },
      }

      expect(() => createSerializer({ format }).loads("x")).toThrow(failure)
    })

    it("does not wrap errors raised by the tree walk", () => {
      expect(() => serializer.loads('"$nope"')).toThrow(UnknownCodecError)
    })
  })

  describe("logging", () => {
    let logger: Logger
    let sink: MockProxy<LogSink>

    beforeEach(() => {
      ;({ logger, sink } = mockLogger())
    })

    it("labels the instance", () => {
      createSerializer({ logger, name: "events" })

      expect(sink.child).toHaveBeenCalledWith({ serializer: "events" })
    })

    it("traces dumps and loads sizes", () => {
      const s = createSerializer({ logger })

      s.loads(s.dumps({ a: 1 }))

      expect(sink.child).toHaveBeenCalledWith({ serializer: "default" })
      expect(sink.trace).toHaveBeenCalledWith("dumps", {
        operation: "dumps",
        format: "json",
        chars: 7,
      })
      expect(sink.trace).toHaveBeenCalledWith("loads", {
        operation: "loads",
        format: "json",
        chars: 7,
      })
    })
  })
})
