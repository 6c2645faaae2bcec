import { Effect, Either, pipe } from "effect"

import type { TypeConverter } from "../core/converter.js"
import type { CustomConverters } from "../core/converters/custom.js"
import type { ConversionError, UnrecognizedTypeError } from "../core/errors.js"
import { converterFor } from "../core/registry.js"
import type { TypeInfo } from "../core/type-info.js"
import type { VocabularyProvider } from "../core/vocabulary.js"
import { memoizeVocabulary } from "../core/vocabulary.js"

export type ArgumentSpec = {
  readonly name: string
  readonly type: TypeInfo
}

export type PreparedArgument = {
  readonly name: string
  readonly converter: TypeConverter
}

export type ArgumentOutcome =
  | { readonly kind: "converted"; readonly name: string; readonly value: unknown }
  | { readonly kind: "failed"; readonly name: string; readonly error: ConversionError }
  | { readonly kind: "missing"; readonly name: string }

export type ArgumentValues = ReadonlyMap<string, unknown>

export type PrepareOptions = {
  readonly custom?: CustomConverters
  readonly vocabulary?: VocabularyProvider
}

// CHANGE: build and validate one converter per declared argument
// FORMAT THEOREM: forall specs: prepare(specs) = Right(converters) <-> forall c: validate(c) = Right
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<PreparedArgument>, UnrecognizedTypeError>
// INVARIANT: an unrecognized type stops preparation before any value is converted
// COMPLEXITY: O(n)/O(n) where n = descriptor nodes
export const prepareArguments = (
  specs: ReadonlyArray<ArgumentSpec>,
  options: PrepareOptions = {}
): Effect.Effect<ReadonlyArray<PreparedArgument>, UnrecognizedTypeError> =>
  Effect.gen(function*(_) {
    const vocabulary = options.vocabulary === undefined ? undefined : memoizeVocabulary(options.vocabulary)
    const prepared: Array<PreparedArgument> = []
    for (const spec of specs) {
      const converter = converterFor(spec.type, options.custom, vocabulary)
      yield* _(converter.validate())
      yield* _(Effect.logDebug(`Argument '${spec.name}' uses converter for ${converter.typeName}`))
      prepared.push({ name: spec.name, converter })
    }
    return prepared
  })

const convertOne = (argument: PreparedArgument, values: ArgumentValues): ArgumentOutcome => {
  if (!values.has(argument.name)) {
    return { kind: "missing", name: argument.name }
  }
  return Either.match(argument.converter.convert(values.get(argument.name), argument.name), {
    onLeft: (error): ArgumentOutcome => ({ kind: "failed", name: argument.name, error }),
    onRight: (value): ArgumentOutcome => ({ kind: "converted", name: argument.name, value })
  })
}

// CHANGE: convert every supplied value independently of the others
// FORMAT THEOREM: forall args: |convert(args, values)| = |args|
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<ArgumentOutcome>>
// INVARIANT: a failing argument never prevents the remaining ones from converting; extra values are ignored
// COMPLEXITY: O(n)/O(n)
export const convertArguments = (
  prepared: ReadonlyArray<PreparedArgument>,
  values: ArgumentValues
): Effect.Effect<ReadonlyArray<ArgumentOutcome>> =>
  Effect.forEach(prepared, (argument) =>
    pipe(
      Effect.sync(() => convertOne(argument, values)),
      Effect.tap((outcome) => Effect.logDebug(`Argument '${outcome.name}': ${outcome.kind}`))
    ))
