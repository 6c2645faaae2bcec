import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { convertArguments, prepareArguments } from "../../src/app/arguments.js"
import { builtinInfo, classInfo, unknownInfo } from "../../src/core/type-info.js"
import { makeVocabulary } from "../../src/core/vocabulary.js"

describe("prepareArguments", () => {
  it.effect("builds one converter per argument", () =>
    Effect.gen(function*(_) {
      const prepared = yield* _(
        prepareArguments([
          { name: "count", type: builtinInfo("integer") },
          { name: "when", type: classInfo(Date) }
        ])
      )
      expect(prepared.map((argument) => [argument.name, argument.converter.kind])).toEqual([
        ["count", "integer"],
        ["when", "datetime"]
      ])
    }))

  it.effect("stops at the first unrecognized type", () =>
    Effect.gen(function*(_) {
      const error = yield* _(
        Effect.flip(
          prepareArguments([
            { name: "count", type: builtinInfo("integer") },
            { name: "gadget", type: unknownInfo("Gadget") }
          ])
        )
      )
      expect(error._tag).toBe("UnrecognizedTypeError")
      expect(error.message).toBe("Unrecognized type 'Gadget'.")
    }))
})

describe("convertArguments", () => {
  const specs = [
    { name: "count", type: builtinInfo("integer") },
    { name: "flag", type: builtinInfo("boolean") }
  ]

  it.effect("converts every supplied value", () =>
    Effect.gen(function*(_) {
      const prepared = yield* _(prepareArguments(specs))
      const outcomes = yield* _(convertArguments(prepared, new Map([["count", "0x10"], ["flag", "no"]])))
      expect(outcomes).toEqual([
        { kind: "converted", name: "count", value: 16 },
        { kind: "converted", name: "flag", value: false }
      ])
    }))

  it.effect("keeps converting after a failure and reports missing values", () =>
    Effect.gen(function*(_) {
      const prepared = yield* _(prepareArguments(specs))
      const outcomes = yield* _(convertArguments(prepared, new Map([["count", "x"], ["extra", "1"]])))
      expect(outcomes.map((outcome) => outcome.kind)).toEqual(["failed", "missing"])
      const [failed] = outcomes
      expect(failed?.kind === "failed" ? failed.error.message : null).toBe(
        "Argument 'count' got value 'x' that cannot be converted to integer."
      )
    }))

  it.effect("uses the given vocabulary", () =>
    Effect.gen(function*(_) {
      const vocabulary = () =>
        makeVocabulary([{ code: "sv", name: "Swedish", trueStrings: ["Ja"], falseStrings: ["Nej"] }])
      const prepared = yield* _(prepareArguments([{ name: "flag", type: builtinInfo("boolean") }], { vocabulary }))
      const outcomes = yield* _(convertArguments(prepared, new Map([["flag", "nej"]])))
      expect(outcomes).toEqual([{ kind: "converted", name: "flag", value: false }])
    }))
})
