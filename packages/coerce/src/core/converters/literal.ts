import { Either } from "effect"

import type { Attempt, ConverterDefinition, TypeConverter } from "../converter.js"
import { defineConverter, makeConverter } from "../converter.js"
import { valueError } from "../errors.js"
import { classifyValue } from "../runtime.js"
import { equalsNormalized, seqToString } from "../text.js"
import type { BuiltinName, LiteralConstant, TypeInfo } from "../type-info.js"
import { builtinInfo } from "../type-info.js"

type LiteralMember = {
  readonly constant: LiteralConstant
  readonly converter: TypeConverter
}

const constantType = (value: LiteralConstant): BuiltinName => {
  if (value === null) {
    return "none"
  }
  if (typeof value === "boolean") {
    return "boolean"
  }
  if (typeof value === "string") {
    return "string"
  }
  return typeof value === "bigint" || Number.isInteger(value) ? "integer" : "float"
}

const isExactly = (value: unknown, constant: LiteralConstant): boolean =>
  value === constant && typeof value === typeof constant

const sameValue = (value: unknown, constant: LiteralConstant): boolean => {
  if (value === constant) {
    return true
  }
  if (typeof constant === "string") {
    return typeof value === "string" && equalsNormalized(value, constant, ["_", "-"])
  }
  if (
    (typeof value === "number" || typeof value === "bigint") &&
    (typeof constant === "number" || typeof constant === "bigint") &&
    classifyValue(value) === "integer" &&
    classifyValue(constant) === "integer"
  ) {
    return BigInt(value) === BigInt(constant)
  }
  return false
}

// Each constant is converted with the converter of its own runtime type.
const literalMembers = (info: TypeInfo, resolve: (info: TypeInfo) => TypeConverter): ReadonlyArray<LiteralMember> =>
  (info.nested ?? []).flatMap((member) => {
    const type = member.type
    if (type === null || type.kind !== "constant") {
      return []
    }
    const runtimeInfo: TypeInfo = { ...builtinInfo(constantType(type.value)), name: member.name }
    return [{ constant: type.value, converter: resolve(runtimeInfo) }]
  })

// CHANGE: match a value against the allowed literal constants
// FORMAT THEOREM: literal['on', 'off']("ON") = 'on'
// PURITY: CORE
// INVARIANT: an exact match wins immediately; several loose matches fail with "No unique match found."
// COMPLEXITY: O(k)/O(k) where k = constants
const matchLiteral = (members: ReadonlyArray<LiteralMember>, value: unknown): Attempt => {
  const matches: Array<LiteralConstant> = []
  for (const { constant, converter } of members) {
    if (isExactly(value, constant)) {
      return Either.right(constant)
    }
    const converted = converter.convert(value)
    if (Either.isRight(converted) && sameValue(converted.right, constant)) {
      matches.push(constant)
    }
  }
  const [match] = matches
  if (match !== undefined && matches.length === 1) {
    return Either.right(match)
  }
  return Either.left(matches.length > 1 ? valueError("No unique match found.") : valueError())
}

export const literalConverter: ConverterDefinition = defineConverter({
  kind: "literal",
  builtin: "literal",
  handles: () => false,
  build: (info, context) => {
    const members = literalMembers(info, context.resolve)
    const convert = (value: unknown): Attempt => matchLiteral(members, value)
    return makeConverter(info, {
      kind: "literal",
      nested: { kind: "positional", converters: members.map((member) => member.converter) },
      typeName: seqToString((info.nested ?? []).map((member) => member.name), { quote: "", lastSeparator: " or " }),
      valueKinds: "any",
      noConversionNeeded: (value) => members.some((member) => isExactly(value, member.constant)),
      convertText: convert,
      convertOther: convert
    })
  }
})
