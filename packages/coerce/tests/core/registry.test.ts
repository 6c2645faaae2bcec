import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"

import { makeCustomConverters } from "../../src/core/converters/custom.js"
import { ValueError } from "../../src/core/errors.js"
import { converterFor } from "../../src/core/registry.js"
import type { TypeInfo } from "../../src/core/type-info.js"
import { builtinInfo, classInfo, recordInfo, unionInfo, unknownInfo } from "../../src/core/type-info.js"
import { convertError, convertOk } from "./converter-helpers.js"

class Celsius {
  constructor(readonly degrees: number) {}
}

class Widget {}

class Numbers extends Array<number> {}

const celsiusConverters = makeCustomConverters([
  {
    type: { kind: "class", name: "Celsius", ctor: Celsius },
    name: "temperature",
    valueKinds: ["string"],
    convert: (value) => {
      if (typeof value === "string" && value.endsWith("C")) {
        return new Celsius(Number(value.slice(0, -1)))
      }
      throw new ValueError({ message: "Expected degrees like '21C'." })
    }
  }
])

const validationMessage = (info: TypeInfo): string | null =>
  Either.match(converterFor(info).validate(), {
    onLeft: (error) => error.message,
    onRight: () => null
  })

describe("custom converters", () => {
  const celsius = classInfo(Celsius)

  it("converts with the registered function", () => {
    expect(convertOk(celsius, "21C", { custom: celsiusConverters })).toEqual(new Celsius(21))
  })

  it("reports the message of a thrown ValueError", () => {
    expect(convertError(celsius, "hot", { custom: celsiusConverters })).toBe(
      "Argument 'hot' cannot be converted to temperature: Expected degrees like '21C'."
    )
  })

  it("drops the message of other thrown errors", () => {
    const failing = makeCustomConverters([
      {
        type: { kind: "class", name: "Celsius", ctor: Celsius },
        name: "temperature",
        valueKinds: [],
        convert: () => {
          throw new Error("internal")
        }
      }
    ])
    expect(convertError(celsius, "hot", { custom: failing })).toBe("Argument 'hot' cannot be converted to temperature.")
  })

  it("refuses value kinds it does not accept", () => {
    expect(convertError(celsius, 21, { custom: celsiusConverters })).toBe(
      "Argument '21' (integer) cannot be converted to temperature."
    )
  })

  it("returns instances unchanged", () => {
    const value = new Celsius(5)
    expect(convertOk(celsius, value, { custom: celsiusConverters })).toBe(value)
  })

  it("takes priority over built-in converters", () => {
    const length = makeCustomConverters([
      {
        type: { kind: "builtin", name: "integer" },
        name: "length",
        valueKinds: [],
        convert: (value) => String(value).length
      }
    ])
    expect(convertOk(builtinInfo("integer"), "abc", { custom: length })).toBe(3)
  })
})

describe("converterFor", () => {
  it("finds converters for native classes exactly", () => {
    expect(converterFor(classInfo(Date)).kind).toBe("datetime")
    expect(converterFor(classInfo(Number)).kind).toBe("float")
    expect(converterFor(classInfo(Map)).kind).toBe("dict")
  })

  it("falls back to the converter of a native base class", () => {
    const converter = converterFor(classInfo(Numbers))
    expect(converter.kind).toBe("list")
    expect(converter.typeName).toBe("list")
  })

  it("builds one nested converter per parameter", () => {
    const converter = converterFor(builtinInfo("dict", [builtinInfo("string"), builtinInfo("integer")]))
    expect(converter.nested.kind).toBe("positional")
    if (converter.nested.kind === "positional") {
      expect(converter.nested.converters.map((nested) => nested.kind)).toEqual(["string", "integer"])
    }
  })

  it("keeps record fields by name", () => {
    const converter = converterFor(recordInfo("Point", [["x", builtinInfo("integer")]]))
    expect(converter.kind).toBe("typeddict")
    expect(converter.nested.kind).toBe("fields")
    if (converter.nested.kind === "fields") {
      expect([...converter.nested.converters.keys()]).toEqual(["x"])
    }
  })
})

describe("unrecognized types", () => {
  it("passes values through", () => {
    const converter = converterFor(unknownInfo("Gadget"))
    expect(converter.isUnknown).toBe(true)
    expect(Either.getOrThrow(converter.convert("x"))).toBe("x")
    expect(Either.getOrThrow(converter.convert(5))).toBe(5)
  })

  it("fails validation with the type name", () => {
    expect(validationMessage(unknownInfo("Gadget"))).toBe("Unrecognized type 'Gadget'.")
    expect(validationMessage(classInfo(Widget))).toBe("Unrecognized type 'Widget'.")
  })

  it("fails validation of containers with unrecognized items", () => {
    expect(validationMessage(builtinInfo("list", [classInfo(Widget)]))).toBe("Unrecognized type 'Widget'.")
    expect(validationMessage(unionInfo([builtinInfo("integer"), unknownInfo("Gadget")]))).toBe(
      "Unrecognized type 'Gadget'."
    )
  })

  it("validates recognized types", () => {
    expect(validationMessage(builtinInfo("list", [builtinInfo("integer")]))).toBe(null)
  })
})
