import { Either } from "effect"

import type { CustomConverters } from "../../src/core/converters/custom.js"
import { noCustomConverters } from "../../src/core/converters/custom.js"
import { converterFor } from "../../src/core/registry.js"
import type { TypeInfo } from "../../src/core/type-info.js"
import type { VocabularyProvider } from "../../src/core/vocabulary.js"
import { defaultVocabulary } from "../../src/core/vocabulary.js"

export type ConvertOptions = {
  readonly name?: string
  readonly custom?: CustomConverters
  readonly vocabulary?: VocabularyProvider
}

const convert = (info: TypeInfo, value: unknown, options: ConvertOptions) =>
  converterFor(info, options.custom ?? noCustomConverters, options.vocabulary ?? defaultVocabulary)
    .convert(value, options.name ?? null)

export const convertOk = (info: TypeInfo, value: unknown, options: ConvertOptions = {}): unknown =>
  Either.getOrThrowWith(convert(info, value, options), (error) => new Error(error.message))

export const convertError = (info: TypeInfo, value: unknown, options: ConvertOptions = {}): string =>
  Either.match(convert(info, value, options), {
    onLeft: (error) => error.message,
    onRight: (converted) => {
      throw new Error(`Expected a failure, got ${String(converted)}`)
    }
  })
