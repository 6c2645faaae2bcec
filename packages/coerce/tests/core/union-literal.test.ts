import { describe, expect, it } from "@effect/vitest"

import { converterFor } from "../../src/core/registry.js"
import { builtinInfo, literalInfo, unionInfo, unknownInfo } from "../../src/core/type-info.js"
import { convertError, convertOk } from "./converter-helpers.js"

describe("union", () => {
  const optionalInteger = unionInfo([builtinInfo("integer"), builtinInfo("none")])

  it("names the members in order", () => {
    expect(converterFor(optionalInteger).typeName).toBe("integer or None")
  })

  it("uses the first member that converts", () => {
    expect(convertOk(optionalInteger, "5")).toBe(5)
    expect(convertOk(optionalInteger, "None")).toBe(null)
  })

  it("returns values some member already accepts", () => {
    expect(convertOk(optionalInteger, null)).toBe(null)
    expect(convertOk(optionalInteger, 7)).toBe(7)
  })

  it("fails without detail when no member converts", () => {
    expect(convertError(optionalInteger, "x")).toBe("Argument 'x' cannot be converted to integer or None.")
  })

  it("passes values through when an unrecognized member remains", () => {
    const withWidget = unionInfo([builtinInfo("integer"), unknownInfo("Widget")])
    expect(convertOk(withWidget, "x")).toBe("x")
    expect(convertOk(withWidget, "3")).toBe(3)
    expect(converterFor(withWidget).typeName).toBe("integer or Widget")
  })

  it("lists three members with commas", () => {
    const three = unionInfo([builtinInfo("integer"), builtinInfo("float"), builtinInfo("none")])
    expect(converterFor(three).typeName).toBe("integer, float or None")
  })
})

describe("literal", () => {
  const onOff = literalInfo(["on", "off"])

  it("names the allowed constants", () => {
    expect(converterFor(onOff).typeName).toBe("'on' or 'off'")
  })

  it("matches text loosely", () => {
    expect(convertOk(onOff, "ON")).toBe("on")
    expect(convertOk(onOff, "off")).toBe("off")
  })

  it("converts text to the type of each constant", () => {
    expect(convertOk(literalInfo([1, 2]), "2")).toBe(2)
    expect(convertOk(literalInfo([true]), "yes")).toBe(true)
    expect(convertOk(literalInfo([null]), "NONE")).toBe(null)
  })

  it("refuses values that match no constant", () => {
    expect(convertError(onOff, "x")).toBe("Argument 'x' cannot be converted to 'on' or 'off'.")
    expect(convertError(literalInfo([1, 2]), "3")).toBe("Argument '3' cannot be converted to 1 or 2.")
  })

  it("compares runtime types as well as values", () => {
    expect(convertError(onOff, 1)).toBe("Argument '1' (integer) cannot be converted to 'on' or 'off'.")
    expect(convertError(literalInfo([true]), 1)).toBe("Argument '1' (integer) cannot be converted to True.")
  })

  it("refuses values that match several constants loosely", () => {
    expect(convertError(literalInfo(["a-b", "ab"]), "AB")).toBe(
      "Argument 'AB' cannot be converted to 'a-b' or 'ab': No unique match found."
    )
  })

  it("prefers an exact match", () => {
    expect(convertOk(literalInfo(["a-b", "ab"]), "ab")).toBe("ab")
  })
})
