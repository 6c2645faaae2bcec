import { Data } from "effect"

import { formatValue, typeNameOf } from "./runtime.js"
import { capitalizeLowerCase } from "./text.js"

// Value-level failure raised inside a converter. An empty message means "no detail".
export class ValueError extends Data.TaggedError("ValueError")<{
  readonly message: string
}> {}

export class ConversionError extends Data.TaggedError("ConversionError")<{
  readonly message: string
  readonly kind: string
  readonly argument: string | null
  readonly value: unknown
  readonly typeName: string
}> {}

export class UnrecognizedTypeError extends Data.TaggedError("UnrecognizedTypeError")<{
  readonly message: string
  readonly typeName: string
}> {}

export const valueError = (message = ""): ValueError => new ValueError({ message })

export type FailureContext = {
  readonly value: unknown
  readonly argument: string | null
  readonly kind: string
  readonly typeName: string
}

// CHANGE: build the uniform conversion failure message
// FORMAT THEOREM: message = "<Kind> '<name>' got value '<value>' (<type>) that cannot be converted to <T><ending>"
// PURITY: CORE
// INVARIANT: runtime type is omitted for string values; ending is ": detail" or "."
// COMPLEXITY: O(|value|)/O(|value|)
export const conversionError = (
  context: FailureContext,
  detail: ValueError | null = null
): ConversionError => {
  const typeSuffix = typeof context.value === "string" ? "" : ` (${typeNameOf(context.value)})`
  const shown = formatValue(context.value)
  const label = capitalizeLowerCase(context.kind)
  const ending = detail !== null && detail.message !== "" ? `: ${detail.message}` : "."
  const cannotBeConverted = `cannot be converted to ${context.typeName}${ending}`
  const message = context.argument === null
    ? `${label} '${shown}'${typeSuffix} ${cannotBeConverted}`
    : `${label} '${context.argument}' got value '${shown}'${typeSuffix} that ${cannotBeConverted}`
  return new ConversionError({
    message,
    kind: label,
    argument: context.argument,
    value: context.value,
    typeName: context.typeName
  })
}

export const unrecognizedType = (typeName: string): UnrecognizedTypeError =>
  new UnrecognizedTypeError({ message: `Unrecognized type '${typeName}'.`, typeName })
