import { titleCase } from "./text.js"

export type LanguageWords = {
  readonly code: string
  readonly name: string
  readonly trueStrings: ReadonlyArray<string>
  readonly falseStrings: ReadonlyArray<string>
}

export type Vocabulary = {
  readonly trueStrings: ReadonlySet<string>
  readonly falseStrings: ReadonlySet<string>
}

export type VocabularyProvider = () => Vocabulary

export const english: LanguageWords = {
  code: "en",
  name: "English",
  trueStrings: ["True", "Yes", "On"],
  falseStrings: ["False", "No", "Off"]
}

// CHANGE: merge true/false words of the given languages on top of English
// FORMAT THEOREM: forall l in languages, w in l.trueStrings: titleCase(w) in vocabulary.trueStrings
// PURITY: CORE
// INVARIANT: "1" is always true; "0" and "" are always false
// COMPLEXITY: O(n)/O(n) where n = total words
export const makeVocabulary = (languages: ReadonlyArray<LanguageWords> = []): Vocabulary => {
  const all = [english, ...languages.filter((language) => language.code !== english.code)]
  return {
    trueStrings: new Set(["1", ...all.flatMap((language) => language.trueStrings.map(titleCase))]),
    falseStrings: new Set(["0", "", ...all.flatMap((language) => language.falseStrings.map(titleCase))])
  }
}

export const defaultVocabulary: VocabularyProvider = () => makeVocabulary()

// Builds the vocabulary on first use and reuses it afterwards.
export const memoizeVocabulary = (provider: VocabularyProvider): VocabularyProvider => {
  let cached: Vocabulary | null = null
  return () => {
    if (cached === null) {
      cached = provider()
    }
    return cached
  }
}
