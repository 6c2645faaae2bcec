import { BigDecimal, Duration, Match } from "effect"

import type { BuiltinName, TypeRef } from "./type-info.js"
import { formatConstant } from "./type-info.js"

export type ValueKind =
  | "string"
  | "boolean"
  | "integer"
  | "float"
  | "none"
  | "bytes"
  | "bytearray"
  | "list"
  | "tuple"
  | "set"
  | "dictionary"
  | "object"
  | "datetime"
  | "duration"
  | "decimal"
  | "url"
  | "other"

// Integers stay `number` inside the safe range and become `bigint` outside it.
export const normalizeInteger = (value: bigint): number | bigint =>
  value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value

export const isPlainObject = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

// CHANGE: classify runtime values into the kinds converters accept
// FORMAT THEOREM: forall v: classify(v) in ValueKind
// PURITY: CORE
// INVARIANT: frozen arrays are tuples, other arrays are lists; bigint is an integer
// COMPLEXITY: O(1)/O(1)
export const classifyValue = (value: unknown): ValueKind => {
  if (typeof value === "string") {
    return "string"
  }
  if (typeof value === "boolean") {
    return "boolean"
  }
  if (typeof value === "bigint") {
    return "integer"
  }
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "float"
  }
  if (value === null || value === undefined) {
    return "none"
  }
  if (typeof value !== "object") {
    return "other"
  }
  if (Buffer.isBuffer(value)) {
    return "bytearray"
  }
  if (value instanceof Uint8Array) {
    return "bytes"
  }
  if (Array.isArray(value)) {
    return Object.isFrozen(value) ? "tuple" : "list"
  }
  if (value instanceof Set) {
    return "set"
  }
  if (value instanceof Map) {
    return "dictionary"
  }
  if (value instanceof Date) {
    return "datetime"
  }
  if (value instanceof URL) {
    return "url"
  }
  if (Duration.isDuration(value)) {
    return "duration"
  }
  if (BigDecimal.isBigDecimal(value)) {
    return "decimal"
  }
  return isPlainObject(value) ? "object" : "other"
}

const kindNames: Readonly<Record<Exclude<ValueKind, "other">, string>> = {
  string: "string",
  boolean: "boolean",
  integer: "integer",
  float: "float",
  none: "None",
  bytes: "bytes",
  bytearray: "bytearray",
  list: "list",
  tuple: "tuple",
  set: "set",
  dictionary: "dictionary",
  object: "object",
  datetime: "datetime",
  duration: "duration",
  decimal: "decimal",
  url: "URL"
}

const constructorName = (value: object): string | null => {
  const prototype: unknown = Object.getPrototypeOf(value)
  if (
    typeof prototype === "object" &&
    prototype !== null &&
    "constructor" in prototype &&
    typeof prototype.constructor === "function" &&
    prototype.constructor.name !== ""
  ) {
    return prototype.constructor.name
  }
  return null
}

export const typeNameOf = (value: unknown): string => {
  const kind = classifyValue(value)
  if (kind !== "other") {
    return kindNames[kind]
  }
  if (typeof value === "object" && value !== null) {
    return constructorName(value) ?? "object"
  }
  return typeof value
}

const formatNumber = (value: number): string => {
  if (Number.isNaN(value)) {
    return "nan"
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf"
  }
  return `${value}`
}

const escapeByte = (byte: number): string => {
  if (byte === 0x5c) {
    return "\\\\"
  }
  if (byte === 0x27) {
    return "\\'"
  }
  if (byte === 0x0a) {
    return "\\n"
  }
  if (byte === 0x0d) {
    return "\\r"
  }
  if (byte === 0x09) {
    return "\\t"
  }
  if (byte >= 0x20 && byte < 0x7f) {
    return String.fromCodePoint(byte)
  }
  return `\\x${byte.toString(16).padStart(2, "0")}`
}

const formatBytes = (value: Uint8Array): string => `b'${Array.from(value, escapeByte).join("")}'`

const safeString = (value: object): string => {
  try {
    return String(value)
  } catch {
    return `<${constructorName(value) ?? "object"}>`
  }
}

const formatItems = (items: Iterable<unknown>): string => Array.from(items, reprValue).join(", ")

const formatEntries = (entries: Iterable<readonly [unknown, unknown]>): string =>
  Array.from(entries, ([key, item]) => `${reprValue(key)}: ${reprValue(item)}`).join(", ")

const formatObject = (value: object): string => {
  if (Array.isArray(value)) {
    if (!Object.isFrozen(value)) {
      return `[${formatItems(value)}]`
    }
    return value.length === 1 ? `(${formatItems(value)},)` : `(${formatItems(value)})`
  }
  if (value instanceof Uint8Array) {
    return formatBytes(value)
  }
  if (value instanceof Set) {
    return value.size === 0 ? "set()" : `{${formatItems(value)}}`
  }
  if (value instanceof Map) {
    return `{${formatEntries(value.entries())}}`
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString()
  }
  if (value instanceof URL) {
    return value.href
  }
  if (Duration.isDuration(value)) {
    return Duration.format(value)
  }
  if (BigDecimal.isBigDecimal(value)) {
    return BigDecimal.format(value)
  }
  if (isPlainObject(value)) {
    return `{${formatEntries(Object.entries(value))}}`
  }
  return safeString(value)
}

// CHANGE: render any value in the literal syntax the literal evaluator reads
// FORMAT THEOREM: forall c in Containers of literals: literalEval(repr(c)) = c
// PURITY: CORE
// INVARIANT: strings are quoted, booleans and null render as True/False/None
// COMPLEXITY: O(n)/O(n) where n = nested items
export const reprValue = (value: unknown): string => {
  if (
    typeof value === "string" ||
    typeof value === "boolean" ||
    typeof value === "bigint" ||
    value === null
  ) {
    return formatConstant(value)
  }
  if (typeof value === "number") {
    return formatNumber(value)
  }
  if (value === undefined) {
    return "None"
  }
  if (typeof value === "object") {
    return formatObject(value)
  }
  return typeof value === "symbol" ? value.toString() : `<${typeof value}>`
}

// Top-level strings are shown as is, everything else in literal syntax.
export const formatValue = (value: unknown): string => (typeof value === "string" ? value : reprValue(value))

// CHANGE: identify set members and mapping keys by value instead of by reference
// FORMAT THEOREM: key(1) = key(true) = key(1.0) = key(1n); key((1, 2)) = key(Object.freeze([1, 2]))
// PURITY: CORE
// INVARIANT: equal numbers share a key whatever their runtime type; tuples compare item by item
// COMPLEXITY: O(n)/O(n) where n = nested items
export const equalityKey = (value: unknown): string => {
  if (typeof value === "boolean") {
    return value ? "1" : "0"
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    return BigInt(value).toString()
  }
  if (typeof value === "bigint") {
    return value.toString()
  }
  if (Array.isArray(value) && Object.isFrozen(value)) {
    return `(${value.map(equalityKey).join(", ")})`
  }
  return reprValue(value)
}

// The first of several equal members is kept.
export const uniqueSet = <A>(items: Iterable<A>): Set<A> => {
  const members = new Map<string, A>()
  for (const item of items) {
    const key = equalityKey(item)
    if (!members.has(key)) {
      members.set(key, item)
    }
  }
  return new Set(members.values())
}

// Equal keys keep the first key and its position but take the last item.
export const uniqueMap = <K, V>(entries: Iterable<readonly [K, V]>): Map<K, V> => {
  const slots = new Map<string, readonly [K, V]>()
  for (const [key, item] of entries) {
    const id = equalityKey(key)
    const previous = slots.get(id)
    slots.set(id, [previous === undefined ? key : previous[0], item])
  }
  return new Map(slots.values())
}

const builtinPredicates: Readonly<Record<BuiltinName, (value: unknown) => boolean>> = {
  any: () => true,
  string: (value) => typeof value === "string",
  boolean: (value) => typeof value === "boolean",
  integer: (value) => classifyValue(value) === "integer",
  float: (value) => typeof value === "number",
  decimal: (value) => BigDecimal.isBigDecimal(value),
  bytes: (value) => classifyValue(value) === "bytes",
  bytearray: (value) => classifyValue(value) === "bytearray",
  datetime: (value) => value instanceof Date,
  date: (value) => value instanceof Date,
  duration: (value) => Duration.isDuration(value),
  path: () => false,
  none: (value) => value === null || value === undefined,
  list: (value) => classifyValue(value) === "list",
  tuple: (value) => classifyValue(value) === "tuple",
  set: (value) => value instanceof Set,
  frozenset: (value) => value instanceof Set,
  dict: (value) => value instanceof Map,
  union: () => false,
  literal: () => false
}

export const instanceOfBuiltin = (name: BuiltinName, value: unknown): boolean => builtinPredicates[name](value)

// Member names of an enum object, numeric reverse mappings excluded.
export const enumMemberNames = (members: Readonly<Record<string, string | number>>): ReadonlyArray<string> =>
  Object.keys(members).filter((key) => !/^-?\d+(?:\.\d+)?$/u.test(key))

export const enumMemberValues = (
  members: Readonly<Record<string, string | number>>
): ReadonlyArray<string | number> =>
  enumMemberNames(members).flatMap((name) => {
    const member = members[name]
    return member === undefined ? [] : [member]
  })

// CHANGE: check a value against a primary type reference
// FORMAT THEOREM: instanceOf(class C, v) <-> v instanceof C
// PURITY: CORE
// INVARIANT: record and ellipsis references never match directly
// COMPLEXITY: O(m)/O(1) where m = enum members
export const instanceOfType = (ref: TypeRef, value: unknown): boolean =>
  Match.value(ref).pipe(
    Match.when({ kind: "builtin" }, (builtin) => instanceOfBuiltin(builtin.name, value)),
    Match.when({ kind: "class" }, (declared) => value instanceof declared.ctor),
    Match.when({ kind: "enum" }, (declared) => enumMemberValues(declared.members).some((member) => member === value)),
    Match.when(
      { kind: "constant" },
      (constant) => constant.value === value && typeof constant.value === typeof value
    ),
    Match.when({ kind: "record" }, () => false),
    Match.when({ kind: "ellipsis" }, () => false),
    Match.exhaustive
  )
