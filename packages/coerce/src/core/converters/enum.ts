import { Either } from "effect"

import type { Attempt, ConverterDefinition } from "../converter.js"
import { defineConverter, makeConverter } from "../converter.js"
import { type ValueError, valueError } from "../errors.js"
import { enumMemberNames, instanceOfType } from "../runtime.js"
import { equalsNormalized, seqToString, sortedStrings } from "../text.js"
import type { EnumMembers, TypeInfo } from "../type-info.js"

type EnumTable = {
  readonly name: string
  // member names sorted alphabetically
  readonly names: ReadonlyArray<string>
  readonly members: EnumMembers
  readonly numeric: boolean
}

const memberValue = (table: EnumTable, name: string): string | number | undefined => table.members[name]

const integerText = /^[+-]?\d+(?:_\d+)*$/u

const findByValue = (table: EnumTable, value: number): Either.Either<string | number, ValueError> => {
  const found = table.names.find((name) => memberValue(table, name) === value)
  if (found !== undefined) {
    return Either.right(value)
  }
  const values = table.names
    .flatMap((name) => {
      const member = memberValue(table, name)
      return typeof member === "number" ? [member] : []
    })
    .sort((left, right) => left - right)
  return Either.left(
    valueError(
      `${table.name} does not have value '${value}'. Available: ${seqToString(values.map((member) => `${member}`))}`
    )
  )
}

const describeMembers = (table: EnumTable): ReadonlyArray<string> =>
  table.numeric ? table.names.map((name) => `${name} (${memberValue(table, name)})`) : table.names

// CHANGE: resolve enum members from names, loosely written names or integer values
// FORMAT THEOREM: Color("red") = Color.RED; Color("2") = Color.GREEN when GREEN = 2
// PURITY: CORE
// INVARIANT: exact names win over normalized matches; several normalized matches fail
// COMPLEXITY: O(m)/O(m) where m = members
const convertName = (table: EnumTable, value: string): Attempt => {
  const exact = table.names.includes(value) ? memberValue(table, value) : undefined
  if (exact !== undefined) {
    return Either.right(exact)
  }
  const matches = table.names.filter((name) => equalsNormalized(name, value, ["_", "-"]))
  const [match] = matches
  if (match !== undefined && matches.length === 1) {
    return Either.right(memberValue(table, match))
  }
  if (matches.length > 1) {
    return Either.left(
      valueError(`${table.name} has multiple members matching '${value}'. Available: ${seqToString(matches)}`)
    )
  }
  const trimmed = value.trim()
  if (table.numeric && integerText.test(trimmed)) {
    const byValue = findByValue(table, Number(trimmed.replaceAll("_", "")))
    if (Either.isRight(byValue)) {
      return byValue
    }
  }
  return Either.left(
    valueError(`${table.name} does not have member '${value}'. Available: ${seqToString(describeMembers(table))}`)
  )
}

const enumTable = (info: TypeInfo): EnumTable => {
  const type = info.type
  const members: EnumMembers = type !== null && type.kind === "enum" ? type.members : {}
  const names = sortedStrings(enumMemberNames(members))
  const numeric = names.length > 0 && names.every((name) => typeof members[name] === "number")
  return { name: info.name, names, members, numeric }
}

export const enumConverter: ConverterDefinition = defineConverter({
  kind: "enum",
  builtin: null,
  handles: (info) => info.type?.kind === "enum",
  build: (info) => {
    const table = enumTable(info)
    const type = info.type
    return makeConverter(info, {
      kind: "enum",
      valueKinds: table.numeric ? ["string", "integer"] : ["string"],
      noConversionNeeded: (value) => type !== null && instanceOfType(type, value),
      convertText: (value) => convertName(table, value),
      convertOther: (value) =>
        typeof value === "number" || typeof value === "bigint"
          ? findByValue(table, Number(value))
          : Either.left(valueError())
    })
  }
})
