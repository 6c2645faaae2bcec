import type { ConverterContext, ConverterDefinition, TypeConverter } from "./converter.js"
import { dictConverter, frozensetConverter, listConverter, setConverter, tupleConverter } from "./converters/containers.js"
import type { CustomConverters } from "./converters/custom.js"
import { customConverter, noCustomConverters } from "./converters/custom.js"
import { enumConverter } from "./converters/enum.js"
import { literalConverter } from "./converters/literal.js"
import { decimalConverter, floatConverter, integerConverter } from "./converters/numbers.js"
import {
  anyConverter,
  booleanConverter,
  bytearrayConverter,
  bytesConverter,
  dateConverter,
  datetimeConverter,
  durationConverter,
  noneConverter,
  pathConverter,
  stringConverter
} from "./converters/scalars.js"
import { typedDictConverter } from "./converters/typed-dict.js"
import { unionConverter } from "./converters/union.js"
import { unknownConverter } from "./converters/unknown.js"
import type { TypeInfo, TypeRef } from "./type-info.js"
import type { VocabularyProvider } from "./vocabulary.js"
import { defaultVocabulary, memoizeVocabulary } from "./vocabulary.js"

// Registration order is the order of the structural fallback.
export const converterDefinitions: ReadonlyArray<ConverterDefinition> = [
  enumConverter,
  anyConverter,
  stringConverter,
  booleanConverter,
  integerConverter,
  floatConverter,
  decimalConverter,
  bytearrayConverter,
  bytesConverter,
  datetimeConverter,
  dateConverter,
  durationConverter,
  pathConverter,
  noneConverter,
  listConverter,
  tupleConverter,
  typedDictConverter,
  dictConverter,
  setConverter,
  frozensetConverter,
  unionConverter,
  literalConverter
]

const exactDefinition = (type: TypeRef): ConverterDefinition | undefined => {
  if (type.kind === "builtin") {
    return converterDefinitions.find((definition) => definition.builtin === type.name)
  }
  if (type.kind === "class") {
    return converterDefinitions.find((definition) => definition.natives.includes(type.ctor))
  }
  return undefined
}

const resolveConverter = (
  info: TypeInfo,
  custom: CustomConverters,
  context: ConverterContext
): TypeConverter => {
  const type = info.type
  if (type === null) {
    return unknownConverter(info)
  }
  const converterInfo = custom.get(type)
  if (converterInfo !== null) {
    return customConverter(info, converterInfo, makeContext(noCustomConverters, context.vocabulary))
  }
  const definition = exactDefinition(type) ?? converterDefinitions.find((candidate) => candidate.handles(info))
  return definition === undefined ? unknownConverter(info) : definition.build(info, context)
}

const makeContext = (custom: CustomConverters, vocabulary: VocabularyProvider): ConverterContext => {
  const context: ConverterContext = {
    resolve: (info) => resolveConverter(info, custom, context),
    vocabulary
  }
  return context
}

// CHANGE: build the converter tree for a type descriptor
// FORMAT THEOREM: converterFor(info) mirrors info: one converter per descriptor node
// PURITY: CORE
// INVARIANT: custom converters take priority; exact lookup precedes the structural fallback
// COMPLEXITY: O(n * d)/O(n) where n = descriptor nodes, d = definitions
export const converterFor = (
  info: TypeInfo,
  custom: CustomConverters = noCustomConverters,
  vocabulary: VocabularyProvider = defaultVocabulary
): TypeConverter => makeContext(custom, memoizeVocabulary(vocabulary)).resolve(info)
