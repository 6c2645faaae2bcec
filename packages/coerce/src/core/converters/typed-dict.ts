import { Either } from "effect"

import type { Attempt, ConverterDefinition, TypeConverter } from "../converter.js"
import { asDetail, defineConverter, makeConverter } from "../converter.js"
import { type ValueError, valueError } from "../errors.js"
import { evaluateContainer, toRuntime } from "../literal-eval.js"
import { formatValue, isPlainObject } from "../runtime.js"
import { plural, seqToString, sortedStrings } from "../text.js"
import { convertEach } from "./containers.js"

type Entry = readonly [unknown, unknown]

const entriesOf = (value: unknown): ReadonlyArray<Entry> | null => {
  if (value instanceof Map) {
    return [...value.entries()]
  }
  if (typeof value === "object" && value !== null && isPlainObject(value)) {
    return Object.entries(value)
  }
  return null
}

const notAllowedMessage = (notAllowed: ReadonlyArray<string>, available: ReadonlyArray<string>): string => {
  const error = `Item${plural(notAllowed.length)} ${seqToString(sortedStrings(notAllowed))} not allowed.`
  return available.length === 0
    ? error
    : `${error} Available item${plural(available.length)}: ${seqToString(sortedStrings(available))}`
}

const missingMessage = (missing: ReadonlyArray<string>): string =>
  `Required item${plural(missing.length)} ${seqToString(sortedStrings(missing))} missing.`

const fieldConverter = (fields: ReadonlyMap<string, TypeConverter>, key: unknown): TypeConverter | null =>
  typeof key === "string" ? fields.get(key) ?? null : null

// CHANGE: convert record values with a fixed set of known and required keys
// FORMAT THEOREM: Point("{'x': '1'}") = { x: 1 } when x is an integer field
// PURITY: CORE
// INVARIANT: fields convert in key order first, then unknown keys are reported, then missing required keys
// COMPLEXITY: O(n log n)/O(n)
const convertRecord = (
  fields: ReadonlyMap<string, TypeConverter>,
  required: ReadonlySet<string>,
  entries: ReadonlyArray<Entry>
): Either.Either<Record<string, unknown>, ValueError> => {
  const known = entries.flatMap(([key, item]) => {
    const converter = fieldConverter(fields, key)
    return converter === null ? [] : [{ name: formatValue(key), item, converter }]
  })
  const converted = convertEach(known, ({ converter, item, name }) =>
    converter.isUnknown
      ? Either.right([name, item] as const)
      : Either.map(Either.mapLeft(converter.convert(item, name, "Item"), asDetail), (value) => [name, value] as const))
  return Either.flatMap(converted, (pairs) => {
    const notAllowed = entries.flatMap(([key]) => (fieldConverter(fields, key) === null ? [formatValue(key)] : []))
    const present = new Set(entries.flatMap(([key]) => (typeof key === "string" ? [key] : [])))
    if (notAllowed.length > 0) {
      const available = [...fields.keys()].filter((key) => !present.has(key))
      return Either.left(valueError(notAllowedMessage(notAllowed, available)))
    }
    const missing = [...required].filter((key) => !present.has(key))
    return missing.length > 0
      ? Either.left(valueError(missingMessage(missing)))
      : Either.right(Object.fromEntries(pairs))
  })
}

const recordReady = (
  fields: ReadonlyMap<string, TypeConverter>,
  required: ReadonlySet<string>,
  value: unknown
): boolean => {
  if (typeof value !== "object" || value === null || !isPlainObject(value)) {
    return false
  }
  const entries = Object.entries(value)
  const keys = new Set(entries.map(([key]) => key))
  return entries.every(([key, item]) => fields.get(key)?.noConversionNeeded(item) ?? false) &&
    [...required].every((key) => keys.has(key))
}

export const typedDictConverter: ConverterDefinition = defineConverter({
  kind: "typeddict",
  builtin: null,
  handles: (info) => info.record !== null,
  build: (info, context) => {
    const schema = info.record ?? { fields: [], required: new Set<string>() }
    const fields: ReadonlyMap<string, TypeConverter> = new Map(
      schema.fields.map(([name, field]) => [name, context.resolve(field)] as const)
    )
    const convertMapping = (value: unknown): Attempt => {
      const entries = entriesOf(value)
      return entries === null ? Either.left(valueError()) : convertRecord(fields, schema.required, entries)
    }
    return makeConverter(info, {
      kind: "typeddict",
      nested: { kind: "fields", converters: fields },
      valueKinds: ["string", "dictionary", "object"],
      noConversionNeeded: (value) => recordReady(fields, schema.required, value),
      convertText: (value) => Either.flatMap(Either.map(evaluateContainer(value, "dict"), toRuntime), convertMapping),
      convertOther: convertMapping
    })
  }
})
