import * as S from "@effect/schema/Schema"
import { Data, Effect, pipe } from "effect"

import type { TypeInfo } from "../core/type-info.js"
import {
  builtinInfo,
  ellipsisInfo,
  enumInfo,
  isBuiltinName,
  literalInfo,
  recordInfo,
  unionInfo,
  unknownInfo
} from "../core/type-info.js"

export class DescriptorError extends Data.TaggedError("DescriptorError")<{
  readonly message: string
}> {}

export type DescriptorWire =
  | string
  | NestedWire
  | UnionWire
  | LiteralWire
  | EnumWire
  | RecordWire

export interface NestedWire {
  readonly type: string
  readonly nested?: ReadonlyArray<DescriptorWire>
}

export interface UnionWire {
  readonly union: ReadonlyArray<DescriptorWire>
}

export interface LiteralWire {
  readonly literal: ReadonlyArray<string | number | boolean | null>
}

export interface EnumMemberWire {
  readonly name: string
  readonly value: string | number
}

export interface EnumWire {
  readonly enum: string
  readonly members: ReadonlyArray<EnumMemberWire>
}

export interface FieldWire {
  readonly name: string
  readonly type: DescriptorWire
  readonly required?: boolean
}

export interface RecordWire {
  readonly record: string
  readonly fields: ReadonlyArray<FieldWire>
}

const descriptorSchema: S.Schema<DescriptorWire> = S.Union(
  S.String,
  S.Struct({
    type: S.String,
    nested: S.optionalWith(S.Array(S.suspend(() => descriptorSchema)), { exact: true })
  }),
  S.Struct({
    union: S.Array(S.suspend(() => descriptorSchema))
  }),
  S.Struct({
    literal: S.Array(S.Union(S.String, S.Number, S.Boolean, S.Null))
  }),
  S.Struct({
    enum: S.NonEmptyString,
    members: S.Array(S.Struct({ name: S.NonEmptyString, value: S.Union(S.String, S.Number) }))
  }),
  S.Struct({
    record: S.NonEmptyString,
    fields: S.Array(S.Struct({
      name: S.NonEmptyString,
      type: S.suspend(() => descriptorSchema),
      required: S.optionalWith(S.Boolean, { exact: true })
    }))
  })
)

const fromName = (name: string, nested: ReadonlyArray<TypeInfo> | null): TypeInfo => {
  if (name === "...") {
    return ellipsisInfo
  }
  if (name === "union" && nested !== null) {
    return unionInfo(nested)
  }
  return isBuiltinName(name) ? builtinInfo(name, nested) : unknownInfo(name)
}

// CHANGE: turn a decoded wire descriptor into a type descriptor
// FORMAT THEOREM: toTypeInfo({ type: "list", nested: ["integer"] }) = list[integer]
// PURITY: CORE
// INVARIANT: unknown type names become descriptors without a primary type
// COMPLEXITY: O(n)/O(n) where n = descriptor nodes
export const toTypeInfo = (wire: DescriptorWire): TypeInfo => {
  if (typeof wire === "string") {
    return fromName(wire, null)
  }
  if ("type" in wire) {
    return fromName(wire.type, wire.nested === undefined ? null : wire.nested.map(toTypeInfo))
  }
  if ("union" in wire) {
    return unionInfo(wire.union.map(toTypeInfo))
  }
  if ("literal" in wire) {
    return literalInfo(wire.literal)
  }
  if ("enum" in wire) {
    return enumInfo(wire.enum, Object.fromEntries(wire.members.map((member) => [member.name, member.value])))
  }
  return recordInfo(
    wire.record,
    wire.fields.map((field) => [field.name, toTypeInfo(field.type)] as const),
    wire.fields.filter((field) => field.required ?? true).map((field) => field.name)
  )
}

const isJson = (text: string): boolean => text.startsWith("{") || text.startsWith("\"")

// CHANGE: decode a descriptor given either as a bare type name or as JSON
// FORMAT THEOREM: decode("integer") = integer; decode('{"union": ["integer", "none"]}') = integer | none
// PURITY: SHELL
// EFFECT: Effect<TypeInfo, DescriptorError>
// INVARIANT: malformed JSON and schema mismatches fail with DescriptorError
// COMPLEXITY: O(n)/O(n)
export const decodeDescriptor = (text: string): Effect.Effect<TypeInfo, DescriptorError> => {
  const trimmed = text.trim()
  if (!isJson(trimmed)) {
    return Effect.succeed(fromName(trimmed, null))
  }
  return pipe(
    S.decodeUnknown(S.parseJson(descriptorSchema))(trimmed),
    Effect.map(toTypeInfo),
    Effect.mapError((error) => new DescriptorError({ message: error.message }))
  )
}
