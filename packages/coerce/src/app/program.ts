import { Console, Data, Effect, Logger, Match, pipe } from "effect"

import { converterFor } from "../core/registry.js"
import { reprValue } from "../core/runtime.js"
import { readCliInput } from "../shell/cli.js"
import { type Config, loadConfig } from "../shell/config.js"
import { loadVocabulary } from "../shell/languages.js"
import { decodeDescriptor } from "../shell/type-info-codec.js"
import { type ArgumentOutcome, convertArguments, prepareArguments } from "./arguments.js"

export class ConversionFailedError extends Data.TaggedError("ConversionFailedError")<{
  readonly message: string
  readonly failed: number
}> {}

const report = (outcome: ArgumentOutcome): Effect.Effect<boolean> =>
  Match.value(outcome).pipe(
    Match.when({ kind: "converted" }, (converted) => pipe(Console.log(reprValue(converted.value)), Effect.as(true))),
    Match.when({ kind: "failed" }, (failed) => pipe(Effect.logError(failed.error.message), Effect.as(false))),
    Match.when({ kind: "missing" }, (missing) =>
      pipe(Effect.logError(`Argument '${missing.name}' is missing.`), Effect.as(false))),
    Match.exhaustive
  )

const run = (config: Config) =>
  Effect.gen(function*(_) {
    const input = yield* _(readCliInput)
    const vocabulary = yield* _(loadVocabulary(config))
    const type = yield* _(decodeDescriptor(input.descriptor))
    yield* _(converterFor(type, undefined, vocabulary).validate())
    const names = input.values.map((_value, index) => `${index + 1}`)
    const prepared = yield* _(
      prepareArguments(names.map((name) => ({ name, type })), { vocabulary })
    )
    yield* _(Effect.logDebug(`Converting ${input.values.length} value(s) to ${input.descriptor}`))
    const outcomes = yield* _(
      convertArguments(prepared, new Map(input.values.map((value, index) => [`${index + 1}`, value])))
    )
    const reported = yield* _(Effect.forEach(outcomes, report))
    const failed = reported.filter((ok) => !ok).length
    if (failed > 0) {
      yield* _(Effect.fail(
        new ConversionFailedError({
          message: `${failed} of ${outcomes.length} value(s) could not be converted.`,
          failed
        })
      ))
    }
  })

// CHANGE: compose the command line conversion program
// FORMAT THEOREM: forall argv = [type, v1..vn]: program prints convert(type, vi) for every convertible vi
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError | UsageError | LanguagesError | DescriptorError | UnrecognizedTypeError | ConversionFailedError, FileSystem | Path>
// INVARIANT: the type is validated before any value is read, even when no values are given
// INVARIANT: the configured log level applies to every log line of the run
// COMPLEXITY: O(n)/O(n)
export const program = pipe(
  loadConfig,
  Effect.flatMap((config) => pipe(run(config), Logger.withMinimumLogLevel(config.logLevel)))
)
