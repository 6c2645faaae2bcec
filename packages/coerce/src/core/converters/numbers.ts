import { BigDecimal, Either, Option } from "effect"

import type { Attempt, ConverterDefinition } from "../converter.js"
import { declaredInstanceCheck, defineConverter, makeConverter } from "../converter.js"
import { type ValueError, valueError } from "../errors.js"
import { normalizeInteger } from "../runtime.js"
import { stripNumberSeparators } from "../text.js"

const losesPrecision = (): ValueError => valueError("Conversion would lose precision.")

type BasedDigits = {
  readonly negative: boolean
  readonly digits: string
  readonly base: 2 | 8 | 10 | 16
}

const prefixes: ReadonlyArray<readonly [string, 2 | 8 | 16]> = [["0x", 16], ["0o", 8], ["0b", 2]]

const digitPatterns: Readonly<Record<2 | 8 | 10 | 16, RegExp>> = {
  2: /^[01]+$/u,
  8: /^[0-7]+$/u,
  10: /^\d+$/u,
  16: /^[\da-f]+$/u
}

const splitBase = (text: string): BasedDigits => {
  const lower = text.toLowerCase()
  for (const [prefix, base] of prefixes) {
    const parts = lower.split(prefix)
    const [sign, digits] = parts
    if (parts.length === 2 && sign !== undefined && digits !== undefined && ["", "-", "+"].includes(sign)) {
      return { negative: sign === "-", digits, base }
    }
  }
  const negative = lower.startsWith("-")
  return { negative, digits: /^[+-]/u.test(lower) ? lower.slice(1) : lower, base: 10 }
}

const radixLiteral: Readonly<Record<2 | 8 | 10 | 16, string>> = { 2: "0b", 8: "0o", 10: "", 16: "0x" }

const parseInteger = ({ base, digits, negative }: BasedDigits): bigint | null => {
  if (!digitPatterns[base].test(digits)) {
    return null
  }
  const magnitude = BigInt(`${radixLiteral[base]}${digits}`)
  return negative ? -magnitude : magnitude
}

// Whole decimals such as "1.0" or "1e3" are integers; anything with a fraction is not.
const parseWholeDecimal = (text: string): Attempt => {
  const parsed: Option.Option<BigDecimal.BigDecimal> = text === "" ? Option.none() : BigDecimal.fromString(text)
  return Option.match(parsed, {
    onNone: () => Either.left(valueError()),
    onSome: (decimal) => {
      const normalized = BigDecimal.normalize(decimal)
      return normalized.scale > 0
        ? Either.left(losesPrecision())
        : Either.right(normalizeInteger(normalized.value * 10n ** BigInt(-normalized.scale)))
    }
  })
}

// CHANGE: parse integers written in base 2, 8, 10 or 16
// FORMAT THEOREM: "0x10" -> 16, "-0b11" -> -3, "1 000" -> 1000, "1.0" -> 1, "1.5" -> Left
// PURITY: CORE
// INVARIANT: results within the safe integer range are numbers, larger ones bigints
// COMPLEXITY: O(n)/O(n)
export const convertIntegerText = (value: string): Attempt => {
  const text = stripNumberSeparators(value)
  const based = splitBase(text)
  const parsed = parseInteger(based)
  if (parsed !== null) {
    return Either.right(normalizeInteger(parsed))
  }
  return based.base === 10 ? parseWholeDecimal(text) : Either.left(valueError())
}

const convertIntegralNumber = (value: unknown): Attempt => {
  if (typeof value === "number" && Number.isInteger(value)) {
    return Either.right(value)
  }
  return Either.left(losesPrecision())
}

export const integerConverter: ConverterDefinition = defineConverter({
  kind: "integer",
  builtin: "integer",
  handles: () => false,
  build: (info) =>
    makeConverter(info, {
      kind: "integer",
      ownName: "integer",
      valueKinds: ["string", "float"],
      noConversionNeeded: declaredInstanceCheck(info, "integer"),
      convertText: convertIntegerText,
      convertOther: convertIntegralNumber
    })
})

const floatPattern = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?|inf(?:inity)?|nan)$/iu

const convertFloatText = (value: string): Attempt => {
  const text = stripNumberSeparators(value).toLowerCase()
  if (!floatPattern.test(text)) {
    return Either.left(valueError())
  }
  if (text.endsWith("nan")) {
    return Either.right(Number.NaN)
  }
  if (text.includes("inf")) {
    return Either.right(text.startsWith("-") ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY)
  }
  return Either.right(Number(text))
}

export const floatConverter: ConverterDefinition = defineConverter({
  kind: "float",
  builtin: "float",
  natives: [Number],
  build: (info) =>
    makeConverter(info, {
      kind: "float",
      ownName: "float",
      valueKinds: ["string", "integer", "float"],
      noConversionNeeded: declaredInstanceCheck(info, "float", [Number]),
      convertText: convertFloatText,
      convertOther: (value) =>
        typeof value === "number" || typeof value === "bigint" ? Either.right(Number(value)) : Either.left(valueError())
    })
})

const parseDecimal = (text: string): Attempt => {
  const parsed: Option.Option<BigDecimal.BigDecimal> = text === "" ? Option.none() : BigDecimal.fromString(text)
  return Option.match(parsed, {
    onNone: () => Either.left(valueError()),
    onSome: (decimal) => Either.right(decimal)
  })
}

export const decimalConverter: ConverterDefinition = defineConverter({
  kind: "decimal",
  builtin: "decimal",
  handles: () => false,
  build: (info) =>
    makeConverter(info, {
      kind: "decimal",
      ownName: "decimal",
      valueKinds: ["string", "integer", "float"],
      noConversionNeeded: BigDecimal.isBigDecimal,
      convertText: (value) => parseDecimal(stripNumberSeparators(value)),
      convertOther: (value) =>
        typeof value === "bigint"
          ? Either.right(BigDecimal.fromBigInt(value))
          : typeof value === "number" && Number.isFinite(value)
          ? parseDecimal(`${value}`)
          : Either.left(valueError())
    })
})
