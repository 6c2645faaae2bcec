import { Either } from "effect"

import type { Attempt, ConverterDefinition } from "../converter.js"
import { defineConverter, describeType, makeConverter, nestedConverters, positionalNested } from "../converter.js"
import { valueError } from "../errors.js"
import { seqToString } from "../text.js"

// CHANGE: try union members in declaration order
// FORMAT THEOREM: union[integer, none]("5") = 5; union[integer, none]("None") = null
// PURITY: CORE
// INVARIANT: when every known member fails and some member is unknown, the value passes through unchanged
// COMPLEXITY: O(k * member)/O(1)
export const unionConverter: ConverterDefinition = defineConverter({
  kind: "union",
  builtin: "union",
  handles: (info) => info.isUnion,
  build: (info, context) => {
    const nested = positionalNested(info, context)
    const members = nestedConverters(nested)
    const convertMember = (value: unknown): Attempt => {
      let unknownMember = false
      for (const member of members) {
        if (member.isUnknown) {
          unknownMember = true
          continue
        }
        const converted = member.convert(value)
        if (Either.isRight(converted)) {
          return Either.right(converted.right)
        }
      }
      return unknownMember ? Either.right(value) : Either.left(valueError())
    }
    return makeConverter(info, {
      kind: "union",
      nested,
      typeName: members.length === 0
        ? describeType(info, nested)
        : seqToString(members.map((member) => member.typeName), { quote: "", lastSeparator: " or " }),
      valueKinds: "any",
      noConversionNeeded: (value) => members.some((member) => member.noConversionNeeded(value)),
      convertText: convertMember,
      convertOther: convertMember
    })
  }
})
