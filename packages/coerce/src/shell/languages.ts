import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import { Data, Effect, Either, pipe } from "effect"

import { seqToString } from "../core/text.js"
import type { LanguageWords, VocabularyProvider } from "../core/vocabulary.js"
import { defaultVocabulary, makeVocabulary } from "../core/vocabulary.js"
import type { Config } from "./config.js"

export class LanguagesError extends Data.TaggedError("LanguagesError")<{
  readonly message: string
}> {}

const languageSchema = S.Struct({
  code: S.NonEmptyString,
  name: S.NonEmptyString,
  trueStrings: S.Array(S.String),
  falseStrings: S.Array(S.String)
})

const languagesFileSchema = S.parseJson(S.Struct({
  languages: S.Array(languageSchema)
}))

export const decodeLanguages = (text: string): Effect.Effect<ReadonlyArray<LanguageWords>, LanguagesError> =>
  pipe(
    S.decodeUnknown(languagesFileSchema)(text),
    Effect.map((file) => file.languages),
    Effect.mapError((error) => new LanguagesError({ message: error.message }))
  )

// CHANGE: pick the configured languages from the known ones
// FORMAT THEOREM: select(all, ["fi"]) = [Finnish]; select(all, ["xx"]) = Left
// PURITY: CORE
// INVARIANT: selected languages keep the order of the requested codes
// COMPLEXITY: O(n * m)/O(n)
export const selectLanguages = (
  available: ReadonlyArray<LanguageWords>,
  codes: ReadonlyArray<string>
): Either.Either<ReadonlyArray<LanguageWords>, LanguagesError> => {
  const selected: Array<LanguageWords> = []
  for (const code of codes) {
    const language = available.find((candidate) => candidate.code === code)
    if (language === undefined) {
      return Either.left(
        new LanguagesError({
          message: `Unknown language '${code}'. Available: ${seqToString(available.map((candidate) => candidate.code))}`
        })
      )
    }
    selected.push(language)
  }
  return Either.right(selected)
}

const findLanguagesFile = (configured: string | null) =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    if (configured !== null) {
      return path.resolve(configured)
    }
    const modulePath = yield* _(path.fromFileUrl(new URL(import.meta.url)))
    const moduleDir = path.dirname(modulePath)
    const cwd = process.cwd()
    const candidates = [
      path.resolve(moduleDir, "../../data/languages.json"),
      path.resolve(cwd, "data/languages.json"),
      path.resolve(cwd, "packages/coerce/data/languages.json")
    ]
    for (const candidate of candidates) {
      const exists = yield* _(fs.exists(candidate))
      if (exists) {
        return candidate
      }
    }
    return yield* _(Effect.fail(new LanguagesError({ message: "Languages file data/languages.json not found." })))
  })

// CHANGE: read language word lists from the JSON data file
// FORMAT THEOREM: forall file: read(file) = decode(parseJson(contents(file)))
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<LanguageWords>, LanguagesError, FileSystem | Path>
// INVARIANT: platform and decoding failures are reported as LanguagesError
// COMPLEXITY: O(n)/O(n)
export const readLanguages = (configured: string | null) =>
  pipe(
    findLanguagesFile(configured),
    Effect.tap((file) => Effect.logDebug(`Reading languages from ${file}`)),
    Effect.flatMap((file) =>
      Effect.flatMap(FileSystem.FileSystem, (fs) =>
        pipe(
          fs.readFileString(file),
          Effect.mapError((error) => new LanguagesError({ message: error.message }))
        ))
    ),
    Effect.mapError((error) =>
      error instanceof LanguagesError ? error : new LanguagesError({ message: error.message })
    ),
    Effect.flatMap(decodeLanguages)
  )

/**
 * Builds the boolean vocabulary for the configured languages.
 * The languages file is only read when extra languages are requested.
 */
export const loadVocabulary = (
  config: Config
): Effect.Effect<VocabularyProvider, LanguagesError, FileSystem.FileSystem | Path.Path> =>
  config.languages.length === 0
    ? Effect.succeed<VocabularyProvider>(defaultVocabulary)
    : pipe(
      readLanguages(config.languagesFile),
      Effect.flatMap((available) => selectLanguages(available, config.languages)),
      Effect.tap((languages) =>
        Effect.logInfo(`Boolean words: English, ${languages.map((language) => language.name).join(", ")}`)
      ),
      Effect.map((languages): VocabularyProvider => () => makeVocabulary(languages))
    )
