export type { ArgumentOutcome, ArgumentSpec, ArgumentValues, PreparedArgument, PrepareOptions } from "./app/arguments.js"
export { convertArguments, prepareArguments } from "./app/arguments.js"
export type { FilePath } from "./core/brand.js"
export type {
  AcceptedKinds,
  Conversion,
  ConverterKind,
  NestedConverters,
  TypeConverter,
  Validation
} from "./core/converter.js"
export type { ConverterInfo, CustomConverters } from "./core/converters/custom.js"
export { makeCustomConverters, noCustomConverters } from "./core/converters/custom.js"
export { ConversionError, UnrecognizedTypeError, ValueError, valueError } from "./core/errors.js"
export type { LiteralNode } from "./core/literal-eval.js"
export { parseLiteral, toRuntime } from "./core/literal-eval.js"
export { converterDefinitions, converterFor } from "./core/registry.js"
export type { ValueKind } from "./core/runtime.js"
export { classifyValue, formatValue, reprValue } from "./core/runtime.js"
export type { BuiltinName, Constructor, EnumMembers, LiteralConstant, TypeInfo, TypeRef } from "./core/type-info.js"
export {
  builtinInfo,
  classInfo,
  constantInfo,
  ellipsisInfo,
  enumInfo,
  formatTypeInfo,
  literalInfo,
  recordInfo,
  unionInfo,
  unknownInfo
} from "./core/type-info.js"
export type { LanguageWords, Vocabulary, VocabularyProvider } from "./core/vocabulary.js"
export { defaultVocabulary, english, makeVocabulary } from "./core/vocabulary.js"
export type { DescriptorWire } from "./shell/type-info-codec.js"
export { decodeDescriptor, DescriptorError, toTypeInfo } from "./shell/type-info-codec.js"
