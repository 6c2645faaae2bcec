import { Match } from "effect"

import { quoteString } from "./text.js"

export type BuiltinName =
  | "any"
  | "string"
  | "boolean"
  | "integer"
  | "float"
  | "decimal"
  | "bytes"
  | "bytearray"
  | "datetime"
  | "date"
  | "duration"
  | "path"
  | "none"
  | "list"
  | "tuple"
  | "set"
  | "frozenset"
  | "dict"
  | "union"
  | "literal"

export const builtinNames: ReadonlyArray<BuiltinName> = [
  "any",
  "string",
  "boolean",
  "integer",
  "float",
  "decimal",
  "bytes",
  "bytearray",
  "datetime",
  "date",
  "duration",
  "path",
  "none",
  "list",
  "tuple",
  "set",
  "frozenset",
  "dict",
  "union",
  "literal"
]

export const isBuiltinName = (name: string): name is BuiltinName => builtinNames.some((builtin) => builtin === name)

export type Constructor = abstract new(...args: Array<never>) => object

// Same shape as a TypeScript enum object, reverse mappings of numeric enums included.
export type EnumMembers = Readonly<Record<string, string | number>>

export type LiteralConstant = string | number | bigint | boolean | null

export type TypeRef =
  | { readonly kind: "builtin"; readonly name: BuiltinName }
  | { readonly kind: "enum"; readonly name: string; readonly members: EnumMembers }
  | { readonly kind: "class"; readonly name: string; readonly ctor: Constructor }
  | { readonly kind: "record"; readonly name: string }
  | { readonly kind: "constant"; readonly value: LiteralConstant }
  | { readonly kind: "ellipsis" }

export type RecordSchema = {
  readonly fields: ReadonlyArray<readonly [string, TypeInfo]>
  readonly required: ReadonlySet<string>
}

/**
 * Structural description of a declared type.
 *
 * `nested` holds generic parameters in declaration order; record types keep
 * their fields in `record` instead.
 */
export type TypeInfo = {
  readonly name: string
  readonly type: TypeRef | null
  readonly nested: ReadonlyArray<TypeInfo> | null
  readonly isUnion: boolean
  readonly record: RecordSchema | null
}

const makeInfo = (
  name: string,
  type: TypeRef | null,
  nested: ReadonlyArray<TypeInfo> | null = null
): TypeInfo => ({
  name,
  type,
  nested,
  isUnion: false,
  record: null
})

export const builtinInfo = (
  name: BuiltinName,
  nested: ReadonlyArray<TypeInfo> | null = null
): TypeInfo => makeInfo(name, { kind: "builtin", name }, nested)

export const unionInfo = (members: ReadonlyArray<TypeInfo>): TypeInfo => ({
  ...makeInfo("Union", { kind: "builtin", name: "union" }, members),
  isUnion: true
})

export const formatConstant = (value: LiteralConstant): string => {
  if (value === null) {
    return "None"
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False"
  }
  return typeof value === "string" ? quoteString(value) : `${value}`
}

export const constantInfo = (value: LiteralConstant): TypeInfo =>
  makeInfo(formatConstant(value), { kind: "constant", value })

export const literalInfo = (values: ReadonlyArray<LiteralConstant>): TypeInfo =>
  makeInfo("Literal", { kind: "builtin", name: "literal" }, values.map(constantInfo))

export const enumInfo = (name: string, members: EnumMembers): TypeInfo => makeInfo(name, { kind: "enum", name, members })

export const classInfo = (
  ctor: Constructor,
  nested: ReadonlyArray<TypeInfo> | null = null,
  name: string = ctor.name
): TypeInfo => makeInfo(name, { kind: "class", name, ctor }, nested)

export const recordInfo = (
  name: string,
  fields: ReadonlyArray<readonly [string, TypeInfo]>,
  required: Iterable<string> = fields.map(([field]) => field)
): TypeInfo => ({
  ...makeInfo(name, { kind: "record", name }),
  record: { fields, required: new Set(required) }
})

export const unknownInfo = (name: string): TypeInfo => makeInfo(name, null)

export const ellipsisInfo: TypeInfo = makeInfo("...", { kind: "ellipsis" })

// CHANGE: render a descriptor the way it was declared
// FORMAT THEOREM: format(list[integer]) = "list[integer]" ∧ format(union[a, b]) = "a | b"
// PURITY: CORE
// INVARIANT: nested descriptors are rendered in declaration order
// COMPLEXITY: O(n)/O(n) where n = descriptor nodes
export const formatTypeInfo = (info: TypeInfo): string => {
  if (info.isUnion && info.nested !== null) {
    return info.nested.map(formatTypeInfo).join(" | ")
  }
  if (info.nested === null || info.nested.length === 0) {
    return info.name
  }
  return `${info.name}[${info.nested.map(formatTypeInfo).join(", ")}]`
}

export const sameTypeRef = (left: TypeRef, right: TypeRef): boolean =>
  Match.value(left).pipe(
    Match.when({ kind: "builtin" }, (value) => right.kind === "builtin" && right.name === value.name),
    Match.when({ kind: "enum" }, (value) => right.kind === "enum" && right.members === value.members),
    Match.when({ kind: "class" }, (value) => right.kind === "class" && right.ctor === value.ctor),
    Match.when({ kind: "record" }, (value) => right.kind === "record" && right.name === value.name),
    Match.when(
      { kind: "constant" },
      (value) => right.kind === "constant" && right.value === value.value
    ),
    Match.when({ kind: "ellipsis" }, () => right.kind === "ellipsis"),
    Match.exhaustive
  )
