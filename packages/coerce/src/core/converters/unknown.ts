import { Either } from "effect"

import type { TypeConverter } from "../converter.js"
import { makeConverter } from "../converter.js"
import { unrecognizedType } from "../errors.js"
import { instanceOfType } from "../runtime.js"
import type { TypeInfo } from "../type-info.js"
import { formatTypeInfo } from "../type-info.js"

// Stands in for types no converter recognizes: values pass through, validation fails.
export const unknownConverter = (info: TypeInfo): TypeConverter => {
  const typeName = formatTypeInfo(info)
  const type = info.type
  return makeConverter(info, {
    kind: "unknown",
    typeName,
    isUnknown: true,
    valueKinds: "any",
    noConversionNeeded: (value) => type !== null && instanceOfType(type, value),
    convertText: Either.right,
    convertOther: Either.right,
    validate: () => Either.left(unrecognizedType(typeName))
  })
}
