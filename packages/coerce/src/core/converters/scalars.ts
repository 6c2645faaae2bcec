import { normalize as normalizePath } from "node:path"
import { fileURLToPath } from "node:url"

import { Duration, Either } from "effect"

import { FilePath } from "../brand.js"
import type { Attempt, ConverterDefinition } from "../converter.js"
import { declaredInstanceCheck, defineConverter, makeConverter } from "../converter.js"
import { type ValueError, valueError } from "../errors.js"
import { formatValue } from "../runtime.js"
import { hasTimeOfDay, parseDateTime, parseDuration } from "../temporal.js"
import { titleCase } from "../text.js"

export const anyConverter: ConverterDefinition = defineConverter({
  kind: "any",
  builtin: "any",
  handles: () => false,
  build: (info) =>
    makeConverter(info, {
      kind: "any",
      ownName: "Any",
      valueKinds: "any",
      noConversionNeeded: () => true,
      convertText: Either.right
    })
})

export const stringConverter: ConverterDefinition = defineConverter({
  kind: "string",
  builtin: "string",
  natives: [String],
  build: (info) =>
    makeConverter(info, {
      kind: "string",
      ownName: "string",
      valueKinds: "any",
      noConversionNeeded: declaredInstanceCheck(info, "string", [String]),
      convertText: Either.right,
      convertOther: (value) => Either.right(formatValue(value))
    })
})

// CHANGE: map true/false words to booleans
// FORMAT THEOREM: "yes" -> true, "OFF" -> false, "none" -> null, "maybe" -> "maybe"
// PURITY: CORE
// INVARIANT: unrecognized text is returned unchanged; non-text values are never converted
// COMPLEXITY: O(n)/O(n)
export const booleanConverter: ConverterDefinition = defineConverter({
  kind: "boolean",
  builtin: "boolean",
  natives: [Boolean],
  build: (info, context) =>
    makeConverter(info, {
      kind: "boolean",
      ownName: "boolean",
      valueKinds: ["string", "integer", "float", "none"],
      noConversionNeeded: declaredInstanceCheck(info, "boolean", [Boolean]),
      convertOther: Either.right,
      convertText: (value) => {
        const normalized = titleCase(value)
        if (normalized === "None") {
          return Either.right(null)
        }
        const vocabulary = context.vocabulary()
        if (vocabulary.trueStrings.has(normalized)) {
          return Either.right(true)
        }
        if (vocabulary.falseStrings.has(normalized)) {
          return Either.right(false)
        }
        return Either.right(value)
      }
    })
})

const encodeLatin1 = (value: string): Either.Either<Uint8Array, ValueError> => {
  const characters = Array.from(value)
  const position = characters.findIndex((character) => (character.codePointAt(0) ?? 0) > 0xff)
  const invalid = characters[position]
  if (invalid !== undefined) {
    return Either.left(valueError(`Character '${invalid}' at position ${position} cannot be mapped to a byte.`))
  }
  return Either.right(Uint8Array.from(characters, (character) => character.codePointAt(0) ?? 0))
}

const copyBytes = (value: unknown): Attempt =>
  value instanceof Uint8Array ? Either.right(Uint8Array.from(value)) : Either.left(valueError())

export const bytearrayConverter: ConverterDefinition = defineConverter({
  kind: "bytearray",
  builtin: "bytearray",
  natives: [Buffer],
  build: (info) =>
    makeConverter(info, {
      kind: "bytearray",
      ownName: "bytearray",
      valueKinds: ["string", "bytes"],
      noConversionNeeded: declaredInstanceCheck(info, "bytearray", [Buffer]),
      convertText: (value) => Either.map(encodeLatin1(value), (bytes) => Buffer.from(bytes)),
      convertOther: (value) => (value instanceof Uint8Array ? Either.right(Buffer.from(value)) : Either.left(valueError()))
    })
})

export const bytesConverter: ConverterDefinition = defineConverter({
  kind: "bytes",
  builtin: "bytes",
  natives: [Uint8Array],
  build: (info) =>
    makeConverter(info, {
      kind: "bytes",
      ownName: "bytes",
      valueKinds: ["string", "bytearray"],
      noConversionNeeded: declaredInstanceCheck(info, "bytes", [Uint8Array]),
      convertText: encodeLatin1,
      convertOther: copyBytes
    })
})

const epochOrText = (value: unknown): string | number | null =>
  typeof value === "string" || typeof value === "number"
    ? value
    : typeof value === "bigint"
    ? Number(value)
    : null

const convertDateTime = (value: unknown): Attempt => {
  const input = epochOrText(value)
  return input === null ? Either.left(valueError()) : parseDateTime(input)
}

export const datetimeConverter: ConverterDefinition = defineConverter({
  kind: "datetime",
  builtin: "datetime",
  natives: [Date],
  build: (info) =>
    makeConverter(info, {
      kind: "datetime",
      ownName: "datetime",
      valueKinds: ["string", "integer", "float"],
      noConversionNeeded: declaredInstanceCheck(info, "datetime", [Date]),
      convertText: convertDateTime,
      convertOther: convertDateTime
    })
})

export const dateConverter: ConverterDefinition = defineConverter({
  kind: "date",
  builtin: "date",
  handles: () => false,
  build: (info) =>
    makeConverter(info, {
      kind: "date",
      ownName: "date",
      valueKinds: ["string"],
      noConversionNeeded: declaredInstanceCheck(info, "date"),
      convertText: (value) =>
        Either.flatMap(parseDateTime(value), (date) =>
          hasTimeOfDay(date)
            ? Either.left(valueError("Value is datetime, not date."))
            : Either.right(date))
    })
})

const convertDuration = (value: unknown): Attempt => {
  const input = epochOrText(value)
  return input === null ? Either.left(valueError()) : parseDuration(input)
}

export const durationConverter: ConverterDefinition = defineConverter({
  kind: "duration",
  builtin: "duration",
  handles: () => false,
  build: (info) =>
    makeConverter(info, {
      kind: "duration",
      ownName: "duration",
      valueKinds: ["string", "integer", "float"],
      noConversionNeeded: Duration.isDuration,
      convertText: convertDuration,
      convertOther: convertDuration
    })
})

const trailingSeparator = /(?<=[^/\\])[/\\]+$/u

// Normalized like a file system path: duplicate separators and "." segments removed.
export const toFilePath = (value: string): FilePath => FilePath(normalizePath(value).replace(trailingSeparator, ""))

export const pathConverter: ConverterDefinition = defineConverter({
  kind: "path",
  builtin: "path",
  natives: [URL],
  build: (info) =>
    makeConverter(info, {
      kind: "path",
      ownName: "path",
      valueKinds: ["string", "url"],
      convertText: (value) => Either.right(toFilePath(value)),
      convertOther: (value) =>
        value instanceof URL
          ? Either.try({
            try: () => toFilePath(fileURLToPath(value)),
            catch: (error) => valueError(error instanceof Error ? error.message : "")
          })
          : Either.left(valueError())
    })
})

export const noneConverter: ConverterDefinition = defineConverter({
  kind: "none",
  builtin: "none",
  handles: () => false,
  build: (info) =>
    makeConverter(info, {
      kind: "none",
      ownName: "None",
      valueKinds: ["string"],
      noConversionNeeded: declaredInstanceCheck(info, "none"),
      convertText: (value) => (value.toUpperCase() === "NONE" ? Either.right(null) : Either.left(valueError()))
    })
})
