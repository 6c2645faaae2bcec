import { describe, expect, it } from "@effect/vitest"
import fc from "fast-check"
import { vi } from "vitest"

import {
  capitalizeLowerCase,
  equalsNormalized,
  normalize,
  quoteString,
  seqToString,
  titleCase
} from "../../src/core/text.js"
import { makeVocabulary, memoizeVocabulary } from "../../src/core/vocabulary.js"

describe("seqToString", () => {
  it("joins with commas and a final and", () => {
    expect(seqToString(["a", "b", "c"])).toBe("'a', 'b' and 'c'")
    expect(seqToString(["a"])).toBe("'a'")
    expect(seqToString([])).toBe("")
  })

  it("takes custom quotes and separators", () => {
    expect(seqToString(["integer", "None"], { quote: "", lastSeparator: " or " })).toBe("integer or None")
  })

  it("keeps every item", () => {
    fc.assert(
      fc.property(fc.array(fc.stringMatching(/^[a-z]+$/)), (items) => {
        const rendered = seqToString(items)
        for (const item of items) {
          expect(rendered).toContain(`'${item}'`)
        }
      })
    )
  })
})

describe("quoteString", () => {
  it("prefers single quotes", () => {
    expect(quoteString("abc")).toBe("'abc'")
    expect(quoteString("it's")).toBe("\"it's\"")
    expect(quoteString("'\"")).toBe("'\\'\"'")
  })

  it("escapes control characters", () => {
    expect(quoteString("a\nb\\")).toBe("'a\\nb\\\\'")
  })
})

describe("normalization", () => {
  it("drops case, whitespace and ignored characters", () => {
    expect(normalize("Dark Blue_x", ["_"])).toBe("darkbluex")
    expect(equalsNormalized("DARK_BLUE", "dark-blue", ["_", "-"])).toBe(true)
    expect(equalsNormalized("DARK_BLUE", "dark-blue")).toBe(false)
  })

  it("title-cases every word", () => {
    expect(titleCase("yES")).toBe("Yes")
    expect(titleCase("kyllä")).toBe("Kyllä")
    expect(titleCase("päällä pois")).toBe("Päällä Pois")
  })

  it("capitalizes only lower-case words", () => {
    expect(capitalizeLowerCase("item")).toBe("Item")
    expect(capitalizeLowerCase("Item")).toBe("Item")
    expect(capitalizeLowerCase("kEY")).toBe("kEY")
  })
})

describe("vocabulary", () => {
  it("always knows the English words", () => {
    const vocabulary = makeVocabulary()
    expect([...vocabulary.trueStrings]).toEqual(["1", "True", "Yes", "On"])
    expect([...vocabulary.falseStrings]).toEqual(["0", "", "False", "No", "Off"])
  })

  it("title-cases words of extra languages", () => {
    const vocabulary = makeVocabulary([{ code: "sv", name: "Swedish", trueStrings: ["ja"], falseStrings: ["NEJ"] }])
    expect(vocabulary.trueStrings.has("Ja")).toBe(true)
    expect(vocabulary.falseStrings.has("Nej")).toBe(true)
  })

  it("builds a memoized vocabulary once", () => {
    const provider = vi.fn(() => makeVocabulary())
    const memoized = memoizeVocabulary(provider)
    expect(memoized()).toBe(memoized())
    expect(provider).toHaveBeenCalledTimes(1)
  })
})
