import { describe, expect, it } from "@effect/vitest"

import { enumInfo } from "../../src/core/type-info.js"
import { convertError, convertOk } from "./converter-helpers.js"

enum Color {
  RED = 1,
  GREEN = 2,
  DARK_BLUE = 3
}

enum Mode {
  Fast = "fast",
  Slow = "slow"
}

const color = enumInfo("Color", Color)
const mode = enumInfo("Mode", Mode)

describe("enum", () => {
  it("finds members by exact name", () => {
    expect(convertOk(color, "GREEN")).toBe(Color.GREEN)
  })

  it("ignores case, underscores and hyphens", () => {
    expect(convertOk(color, "dark-blue")).toBe(Color.DARK_BLUE)
    expect(convertOk(mode, "FAST")).toBe(Mode.Fast)
  })

  it("finds numeric members by value", () => {
    expect(convertOk(color, "2")).toBe(Color.GREEN)
    expect(convertOk(color, 3)).toBe(Color.DARK_BLUE)
  })

  it("lists the members when nothing matches", () => {
    expect(convertError(color, "9")).toBe(
      "Argument '9' cannot be converted to Color: " +
        "Color does not have member '9'. Available: 'DARK_BLUE (3)', 'GREEN (2)' and 'RED (1)'"
    )
    expect(convertError(mode, "medium")).toBe(
      "Argument 'medium' cannot be converted to Mode: Mode does not have member 'medium'. Available: 'Fast' and 'Slow'"
    )
  })

  it("lists the values when an integer does not match", () => {
    expect(convertError(color, 5)).toBe(
      "Argument '5' (integer) cannot be converted to Color: Color does not have value '5'. Available: '1', '2' and '3'"
    )
  })

  it("refuses names matching several members", () => {
    const flag = enumInfo("Flag", { A_B: "x", AB: "y" })
    expect(convertError(flag, "ab")).toBe(
      "Argument 'ab' cannot be converted to Flag: Flag has multiple members matching 'ab'. Available: 'AB' and 'A_B'"
    )
  })

  it("refuses integers for enums with text values", () => {
    expect(convertError(mode, 1)).toBe("Argument '1' (integer) cannot be converted to Mode.")
  })
})
