import { Either } from "effect"

import type { ConverterContext, TypeConverter } from "../converter.js"
import { makeConverter, positionalNested } from "../converter.js"
import { ValueError, valueError } from "../errors.js"
import type { ValueKind } from "../runtime.js"
import { instanceOfType } from "../runtime.js"
import type { TypeInfo, TypeRef } from "../type-info.js"
import { sameTypeRef } from "../type-info.js"

/**
 * User supplied conversion for one exact type.
 *
 * `convert` may throw a {@link ValueError} to explain the failure; any other
 * thrown value is reported without detail. An empty `valueKinds` accepts
 * every value.
 */
export type ConverterInfo = {
  readonly type: TypeRef
  readonly name: string
  readonly valueKinds: ReadonlyArray<ValueKind>
  readonly convert: (value: unknown) => unknown
}

export interface CustomConverters {
  readonly get: (type: TypeRef) => ConverterInfo | null
}

export const makeCustomConverters = (infos: ReadonlyArray<ConverterInfo>): CustomConverters => ({
  get: (type) => infos.find((info) => sameTypeRef(info.type, type)) ?? null
})

export const noCustomConverters: CustomConverters = makeCustomConverters([])

// CHANGE: adapt a user supplied conversion function to the converter contract
// FORMAT THEOREM: convert(v) = Right(f(v)) | Left(ValueError thrown by f) | Left(no detail)
// PURITY: CORE
// EFFECT: runs the user function, thrown errors are captured
// INVARIANT: nested converters are built without custom converters
// COMPLEXITY: O(f)/O(f)
export const customConverter = (
  info: TypeInfo,
  converterInfo: ConverterInfo,
  context: ConverterContext
): TypeConverter => {
  const type = info.type
  const convert = (value: unknown) =>
    Either.try({
      try: () => converterInfo.convert(value),
      catch: (error) => (error instanceof ValueError ? error : valueError())
    })
  return makeConverter(info, {
    kind: "custom",
    nested: positionalNested(info, context),
    typeName: converterInfo.name,
    valueKinds: converterInfo.valueKinds.length === 0 ? "any" : converterInfo.valueKinds,
    noConversionNeeded: (value) => type !== null && instanceOfType(type, value),
    convertText: convert,
    convertOther: convert
  })
}
