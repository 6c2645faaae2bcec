import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { builtinInfo, formatTypeInfo } from "../../src/core/type-info.js"
import { decodeDescriptor } from "../../src/shell/type-info-codec.js"

describe("decodeDescriptor", () => {
  it.effect("reads bare type names", () =>
    Effect.gen(function*(_) {
      const info = yield* _(decodeDescriptor(" integer "))
      expect(info).toEqual(builtinInfo("integer"))
    }))

  it.effect("reads unknown names as descriptors without a type", () =>
    Effect.gen(function*(_) {
      const info = yield* _(decodeDescriptor("Widget"))
      expect(info.name).toBe("Widget")
      expect(info.type).toBe(null)
    }))

  it.effect("reads nested descriptors", () =>
    Effect.gen(function*(_) {
      const info = yield* _(decodeDescriptor("{\"type\": \"tuple\", \"nested\": [\"integer\", \"...\"]}"))
      expect(formatTypeInfo(info)).toBe("tuple[integer, ...]")
      expect(info.nested?.[1]?.type).toEqual({ kind: "ellipsis" })
    }))

  it.effect("reads unions and literals", () =>
    Effect.gen(function*(_) {
      const union = yield* _(decodeDescriptor("{\"union\": [\"integer\", \"none\"]}"))
      expect(union.isUnion).toBe(true)
      expect(formatTypeInfo(union)).toBe("integer | none")
      const literal = yield* _(decodeDescriptor("{\"literal\": [\"a\", 1, null]}"))
      expect(formatTypeInfo(literal)).toBe("Literal['a', 1, None]")
    }))

  it.effect("reads enums", () =>
    Effect.gen(function*(_) {
      const info = yield* _(
        decodeDescriptor("{\"enum\": \"Color\", \"members\": [{\"name\": \"RED\", \"value\": 1}]}")
      )
      expect(info.type).toEqual({ kind: "enum", name: "Color", members: { RED: 1 } })
    }))

  it.effect("reads records with optional fields", () =>
    Effect.gen(function*(_) {
      const info = yield* _(
        decodeDescriptor(
          "{\"record\": \"Point\", \"fields\": [" +
            "{\"name\": \"x\", \"type\": \"integer\"}, {\"name\": \"y\", \"type\": \"integer\", \"required\": false}]}"
        )
      )
      expect(info.record?.fields.map(([name]) => name)).toEqual(["x", "y"])
      expect([...(info.record?.required ?? [])]).toEqual(["x"])
    }))

  it.effect("reads a JSON string as a type name", () =>
    Effect.gen(function*(_) {
      const info = yield* _(decodeDescriptor("\"float\""))
      expect(info).toEqual(builtinInfo("float"))
    }))

  it.effect("fails on malformed descriptors", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeDescriptor("{\"type\": 5}")))
      expect(error._tag).toBe("DescriptorError")
      const broken = yield* _(Effect.flip(decodeDescriptor("{\"type\"")))
      expect(broken._tag).toBe("DescriptorError")
    }))
})
