export type SequenceFormat = {
  readonly quote?: string
  readonly separator?: string
  readonly lastSeparator?: string
}

// Quotes like the literal evaluator expects, so rendered strings read back unchanged.
export const quoteString = (value: string): string => {
  const escaped = value
    .replaceAll("\\", "\\\\")
    .replaceAll("\n", "\\n")
    .replaceAll("\r", "\\r")
    .replaceAll("\t", "\\t")
  return escaped.includes("'") && !escaped.includes("\"")
    ? `"${escaped}"`
    : `'${escaped.replaceAll("'", "\\'")}'`
}

export const plural = (count: number): string => (count === 1 ? "" : "s")

// CHANGE: render a list of items for error messages
// FORMAT THEOREM: seqToString([a, b, c]) = "'a', 'b' and 'c'"
// PURITY: CORE
// INVARIANT: item order is preserved
// COMPLEXITY: O(n)/O(n)
export const seqToString = (
  items: ReadonlyArray<string>,
  format: SequenceFormat = {}
): string => {
  const quote = format.quote ?? "'"
  const separator = format.separator ?? ", "
  const lastSeparator = format.lastSeparator ?? " and "
  const quoted = items.map((item) => `${quote}${item}${quote}`)
  const last = quoted.at(-1)
  if (last === undefined) {
    return ""
  }
  if (quoted.length === 1) {
    return last
  }
  return `${quoted.slice(0, -1).join(separator)}${lastSeparator}${last}`
}

export const sortedStrings = (items: Iterable<string>): ReadonlyArray<string> =>
  [...items].sort((left, right) => (left < right ? -1 : left > right ? 1 : 0))

/**
 * Lower-cases text and drops whitespace and the ignored characters.
 *
 * @pure true
 * @complexity O(n) time / O(n) space
 */
export const normalize = (text: string, ignore: ReadonlyArray<string> = []): string => {
  let normalized = text.toLowerCase().replaceAll(/\s+/gu, "")
  for (const character of ignore) {
    normalized = normalized.replaceAll(character, "")
  }
  return normalized
}

export const equalsNormalized = (
  left: string,
  right: string,
  ignore: ReadonlyArray<string> = []
): boolean => normalize(left, ignore) === normalize(right, ignore)

// Upper-cases the first letter of every run of letters and lower-cases the rest.
export const titleCase = (text: string): string =>
  text.replaceAll(
    /\p{L}+/gu,
    (word) => `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`
  )

export const capitalizeLowerCase = (text: string): string =>
  text === text.toLowerCase() && text !== text.toUpperCase()
    ? `${text.charAt(0).toUpperCase()}${text.slice(1)}`
    : text

export const stripNumberSeparators = (text: string): string => text.trim().replaceAll(" ", "").replaceAll("_", "")
