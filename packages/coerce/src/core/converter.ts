import { Either } from "effect"

import type { ConversionError, UnrecognizedTypeError, ValueError } from "./errors.js"
import { conversionError, valueError } from "./errors.js"
import type { ValueKind } from "./runtime.js"
import { classifyValue, instanceOfBuiltin } from "./runtime.js"
import type { BuiltinName, Constructor, TypeInfo } from "./type-info.js"
import { formatTypeInfo } from "./type-info.js"
import type { VocabularyProvider } from "./vocabulary.js"

export type ConverterKind =
  | "enum"
  | "any"
  | "string"
  | "boolean"
  | "integer"
  | "float"
  | "decimal"
  | "bytearray"
  | "bytes"
  | "datetime"
  | "date"
  | "duration"
  | "path"
  | "none"
  | "list"
  | "tuple"
  | "typeddict"
  | "dict"
  | "set"
  | "frozenset"
  | "union"
  | "literal"
  | "custom"
  | "unknown"

// "any" accepts every runtime value.
export type AcceptedKinds = "any" | ReadonlyArray<ValueKind>

export type NestedConverters =
  | { readonly kind: "none" }
  | { readonly kind: "positional"; readonly converters: ReadonlyArray<TypeConverter> }
  | { readonly kind: "fields"; readonly converters: ReadonlyMap<string, TypeConverter> }

export type Attempt = Either.Either<unknown, ValueError>
export type Conversion = Either.Either<unknown, ConversionError>
export type Validation = Either.Either<void, UnrecognizedTypeError>

/**
 * Converter built for one node of a type descriptor.
 *
 * Nested converters mirror `typeInfo.nested` (or the record fields) and are
 * fixed once the converter exists.
 */
export interface TypeConverter {
  readonly kind: ConverterKind
  readonly typeInfo: TypeInfo
  readonly typeName: string
  readonly nested: NestedConverters
  readonly valueKinds: AcceptedKinds
  readonly isUnknown: boolean
  readonly noConversionNeeded: (value: unknown) => boolean
  readonly convert: (value: unknown, name?: string | null, kind?: string) => Conversion
  readonly validate: () => Validation
}

export type ConverterContext = {
  readonly resolve: (info: TypeInfo) => TypeConverter
  readonly vocabulary: VocabularyProvider
}

export type ConverterHooks = {
  readonly kind: ConverterKind
  readonly valueKinds: AcceptedKinds
  readonly nested?: NestedConverters
  // Name used when the type has no nested converters.
  readonly ownName?: string
  readonly typeName?: string
  readonly isUnknown?: boolean
  readonly noConversionNeeded?: (value: unknown) => boolean
  readonly convertText: (value: string) => Attempt
  readonly convertOther?: (value: unknown) => Attempt
  readonly validate?: () => Validation
}

export const noNested: NestedConverters = { kind: "none" }

export const positionalNested = (info: TypeInfo, context: ConverterContext): NestedConverters =>
  info.nested === null || info.nested.length === 0
    ? noNested
    : { kind: "positional", converters: info.nested.map(context.resolve) }

export const nestedConverters = (nested: NestedConverters): ReadonlyArray<TypeConverter> => {
  if (nested.kind === "none") {
    return []
  }
  return nested.kind === "positional" ? nested.converters : [...nested.converters.values()]
}

export const describeType = (info: TypeInfo, nested: NestedConverters, ownName?: string): string =>
  ownName !== undefined && nested.kind === "none" ? ownName : formatTypeInfo(info)

export const validateAll = (converters: Iterable<TypeConverter>): Validation => {
  for (const converter of converters) {
    const validation = converter.validate()
    if (Either.isLeft(validation)) {
      return validation
    }
  }
  return Either.right(undefined)
}

// CHANGE: default "already the declared type" check
// FORMAT THEOREM: check(class C)(v) <-> v instanceof C; check(builtin b)(v) <-> predicate_b(v)
// PURITY: CORE
// INVARIANT: native constructors are checked through the builtin predicate
// COMPLEXITY: O(1)/O(1)
export const declaredInstanceCheck = (
  info: TypeInfo,
  builtin: BuiltinName,
  natives: ReadonlyArray<Constructor> = []
) =>
(value: unknown): boolean => {
  const type = info.type
  if (type !== null && type.kind === "class" && !natives.includes(type.ctor)) {
    return value instanceof type.ctor
  }
  return instanceOfBuiltin(builtin, value)
}

// A failed nested conversion becomes the detail of the enclosing one.
export const asDetail = (error: ConversionError): ValueError => valueError(error.message)

// CHANGE: shared conversion algorithm every converter variant runs
// FORMAT THEOREM: convert(v) = v if noConversionNeeded(v); Left if kind(v) not accepted; hook(v) otherwise
// PURITY: CORE
// EFFECT: none, failures are values
// INVARIANT: every failure is reported as ConversionError with the converter's type name
// COMPLEXITY: O(hook)/O(hook)
export const makeConverter = (info: TypeInfo, hooks: ConverterHooks): TypeConverter => {
  const nested = hooks.nested ?? noNested
  const typeName = hooks.typeName ?? describeType(info, nested, hooks.ownName)
  const noConversionNeeded = hooks.noConversionNeeded ?? (() => false)
  const valueKinds = hooks.valueKinds
  const convertOther = hooks.convertOther ?? (() => Either.left(valueError()))
  const accepts = (value: unknown): boolean => valueKinds === "any" || valueKinds.includes(classifyValue(value))

  const convert = (value: unknown, name: string | null = null, kind = "Argument"): Conversion => {
    if (noConversionNeeded(value)) {
      return Either.right(value)
    }
    const context = { value, argument: name, kind, typeName }
    if (!accepts(value)) {
      return Either.left(conversionError(context))
    }
    const attempt = typeof value === "string" ? hooks.convertText(value) : convertOther(value)
    return Either.mapLeft(attempt, (detail) => conversionError(context, detail))
  }

  return {
    kind: hooks.kind,
    typeInfo: info,
    typeName,
    nested,
    valueKinds,
    isUnknown: hooks.isUnknown ?? false,
    noConversionNeeded,
    convert,
    validate: hooks.validate ?? (() => validateAll(nestedConverters(nested)))
  }
}

/**
 * Registry entry for one converter variant.
 *
 * `builtin` and `natives` drive exact lookup; `handles` is the structural
 * fallback tried in registration order.
 */
export type ConverterDefinition = {
  readonly kind: ConverterKind
  readonly builtin: BuiltinName | null
  readonly natives: ReadonlyArray<Constructor>
  readonly handles: (info: TypeInfo) => boolean
  readonly build: (info: TypeInfo, context: ConverterContext) => TypeConverter
}

// Declared class is one of the natives or extends one of them.
export const extendsNative = (natives: ReadonlyArray<Constructor>) => (info: TypeInfo): boolean => {
  const type = info.type
  return type !== null && type.kind === "class" &&
    natives.some((native) => native === type.ctor || native.isPrototypeOf(type.ctor))
}

export const defineConverter = (definition: {
  readonly kind: ConverterKind
  readonly builtin: BuiltinName | null
  readonly natives?: ReadonlyArray<Constructor>
  readonly handles?: (info: TypeInfo) => boolean
  readonly build: (info: TypeInfo, context: ConverterContext) => TypeConverter
}): ConverterDefinition => {
  const natives = definition.natives ?? []
  return {
    kind: definition.kind,
    builtin: definition.builtin,
    natives,
    handles: definition.handles ?? extendsNative(natives),
    build: definition.build
  }
}
