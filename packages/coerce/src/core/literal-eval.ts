import { Data, Either, Match } from "effect"

import { type ValueError, valueError } from "./errors.js"
import { normalizeInteger, uniqueMap, uniqueSet } from "./runtime.js"

export type LiteralNode =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "bytes"; readonly value: Uint8Array }
  | { readonly kind: "integer"; readonly value: bigint }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "none" }
  | { readonly kind: "list"; readonly items: ReadonlyArray<LiteralNode> }
  | { readonly kind: "tuple"; readonly items: ReadonlyArray<LiteralNode> }
  | { readonly kind: "set"; readonly items: ReadonlyArray<LiteralNode> }
  | { readonly kind: "dict"; readonly entries: ReadonlyArray<readonly [LiteralNode, LiteralNode]> }

export type ContainerKind = "list" | "tuple" | "set" | "dict"

class ParseFailure extends Data.TaggedError("ParseFailure")<{
  readonly message: string
}> {}

const invalid = (): ParseFailure => new ParseFailure({ message: "Invalid expression." })

type Token =
  | { readonly kind: "string"; readonly value: string; readonly bytes: boolean }
  | { readonly kind: "number"; readonly text: string }
  | { readonly kind: "name"; readonly text: string }
  | { readonly kind: "punct"; readonly text: string }
  | { readonly kind: "end" }

const whitespace = /[ \t\r\n\f\v]*/y
const stringStart = /([rRbBuU]{0,2})('''|"""|'|")/y
const numberToken =
  /(?:0[xX](?:_?[0-9a-fA-F])+|0[oO](?:_?[0-7])+|0[bB](?:_?[01])+|\d(?:_?\d)*\.(?:\d(?:_?\d)*)?(?:[eE][+-]?\d(?:_?\d)*)?|\.\d(?:_?\d)*(?:[eE][+-]?\d(?:_?\d)*)?|\d(?:_?\d)*(?:[eE][+-]?\d(?:_?\d)*)?)/y
const nameToken = /[A-Za-z_][A-Za-z0-9_]*/y
const punctuation = "[](){},:+-"

const matchAt = (pattern: RegExp, text: string, position: number): RegExpExecArray | null => {
  pattern.lastIndex = position
  return pattern.exec(text)
}

const simpleEscapes: Readonly<Record<string, string>> = {
  "\\": "\\",
  "'": "'",
  "\"": "\"",
  a: "\x07",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v"
}

const hexEscapeLengths: Readonly<Record<string, number>> = { x: 2, u: 4, U: 8 }

type Escape = { readonly text: string; readonly length: number }

// Reads the escape sequence starting after a backslash at `position`.
const readEscape = (body: string, position: number, bytes: boolean): Escape => {
  const marker = body.charAt(position)
  const simple = simpleEscapes[marker]
  if (simple !== undefined) {
    return { text: simple, length: 1 }
  }
  if (marker === "\n") {
    return { text: "", length: 1 }
  }
  const octal = /^[0-7]{1,3}/u.exec(body.slice(position))
  if (octal !== null) {
    return { text: String.fromCodePoint(Number.parseInt(octal[0], 8)), length: octal[0].length }
  }
  const hexLength = hexEscapeLengths[marker]
  if (hexLength !== undefined && !(bytes && marker !== "x")) {
    const digits = body.slice(position + 1, position + 1 + hexLength)
    const codePoint = Number.parseInt(digits, 16)
    if (!new RegExp(`^[0-9a-fA-F]{${hexLength}}$`, "u").test(digits) || codePoint > 0x10_ffff) {
      throw invalid()
    }
    return { text: String.fromCodePoint(codePoint), length: 1 + hexLength }
  }
  if (marker === "N" && !bytes) {
    throw invalid()
  }
  return { text: `\\${marker}`, length: 1 }
}

const decodeBody = (body: string, raw: boolean, bytes: boolean): string => {
  if (bytes && /[^\x00-\x7f]/u.test(body)) {
    throw invalid()
  }
  if (raw) {
    return body
  }
  let decoded = ""
  let position = 0
  while (position < body.length) {
    const character = body.charAt(position)
    if (character === "\\" && position + 1 < body.length) {
      const escape = readEscape(body, position + 1, bytes)
      decoded += escape.text
      position += 1 + escape.length
    } else {
      decoded += character
      position += 1
    }
  }
  return decoded
}

class Tokenizer {
  private position = 0

  constructor(private readonly text: string) {}

  next(): Token {
    this.skipWhitespace()
    if (this.position >= this.text.length) {
      return { kind: "end" }
    }
    const string = matchAt(stringStart, this.text, this.position)
    if (string !== null) {
      return this.readString(string[1] ?? "", string[2] ?? "", string[0].length)
    }
    const number = matchAt(numberToken, this.text, this.position)
    if (number !== null) {
      this.position += number[0].length
      if (/[A-Za-z0-9_.]/u.test(this.text.charAt(this.position))) {
        throw invalid()
      }
      return { kind: "number", text: number[0] }
    }
    const name = matchAt(nameToken, this.text, this.position)
    if (name !== null) {
      this.position += name[0].length
      return { kind: "name", text: name[0] }
    }
    const character = this.text.charAt(this.position)
    if (punctuation.includes(character)) {
      this.position += 1
      return { kind: "punct", text: character }
    }
    throw invalid()
  }

  private skipWhitespace(): void {
    const match = matchAt(whitespace, this.text, this.position)
    this.position += match === null ? 0 : match[0].length
  }

  private readString(prefix: string, quote: string, headLength: number): Token {
    const flags = prefix.toLowerCase()
    const raw = flags.includes("r")
    const bytes = flags.includes("b")
    if (flags.length === 2 && !(raw && bytes)) {
      throw invalid()
    }
    const start = this.position + headLength
    let position = start
    while (position < this.text.length) {
      const character = this.text.charAt(position)
      if (character === "\\") {
        position += 2
        continue
      }
      if (this.text.startsWith(quote, position)) {
        this.position = position + quote.length
        const body = this.text.slice(start, position)
        return { kind: "string", value: decodeBody(body, raw, bytes), bytes }
      }
      if (character === "\n" && quote.length === 1) {
        throw invalid()
      }
      position += 1
    }
    throw invalid()
  }
}

const parseNumber = (text: string, negative: boolean): LiteralNode => {
  const digits = text.replaceAll("_", "")
  const isRadix = /^0[xXoObB]/u.test(digits)
  if (isRadix || /^\d+$/u.test(digits)) {
    if (!isRadix && /^0\d/u.test(digits) && !/^0+$/u.test(digits)) {
      throw invalid()
    }
    const value = BigInt(digits)
    return { kind: "integer", value: negative ? -value : value }
  }
  const value = Number(digits)
  return { kind: "float", value: negative ? -value : value }
}

const hashableKinds: ReadonlyArray<LiteralNode["kind"]> = ["string", "bytes", "integer", "float", "boolean", "none", "tuple"]

const unhashableNames: Readonly<Record<string, string>> = { list: "list", set: "set", dict: "dict" }

const requireHashable = (node: LiteralNode): LiteralNode => {
  if (node.kind === "tuple") {
    node.items.forEach(requireHashable)
    return node
  }
  if (!hashableKinds.includes(node.kind)) {
    throw new ParseFailure({
      message: `Evaluating expression failed: unhashable type: '${unhashableNames[node.kind] ?? node.kind}'`
    })
  }
  return node
}

class Parser {
  private current: Token

  constructor(private readonly tokens: Tokenizer) {
    this.current = tokens.next()
  }

  parseExpression(): LiteralNode {
    const first = this.parseValue()
    if (!this.isPunct(",")) {
      this.expectEnd()
      return first
    }
    const items = [first]
    while (this.isPunct(",")) {
      this.advance()
      if (this.current.kind === "end") {
        break
      }
      items.push(this.parseValue())
    }
    this.expectEnd()
    return { kind: "tuple", items }
  }

  private advance(): void {
    this.current = this.tokens.next()
  }

  private isPunct(text: string): boolean {
    return this.current.kind === "punct" && this.current.text === text
  }

  private expectPunct(text: string): void {
    if (!this.isPunct(text)) {
      throw invalid()
    }
    this.advance()
  }

  private expectEnd(): void {
    if (this.current.kind !== "end") {
      throw invalid()
    }
  }

  private parseValue(): LiteralNode {
    const token = this.current
    return Match.value(token).pipe(
      Match.when({ kind: "string" }, (string) => this.parseStrings(string.bytes)),
      Match.when({ kind: "number" }, (number) => {
        this.advance()
        return parseNumber(number.text, false)
      }),
      Match.when({ kind: "name" }, (name) => {
        this.advance()
        return this.parseName(name.text)
      }),
      Match.when({ kind: "punct" }, (punct) => this.parsePunct(punct.text)),
      Match.when({ kind: "end" }, () => {
        throw invalid()
      }),
      Match.exhaustive
    )
  }

  // Adjacent string literals concatenate; mixing text and bytes is an error.
  private parseStrings(bytes: boolean): LiteralNode {
    let text = ""
    while (this.current.kind === "string") {
      if (this.current.bytes !== bytes) {
        throw invalid()
      }
      text += this.current.value
      this.advance()
    }
    if (bytes && /[^\x00-\xff]/u.test(text)) {
      throw invalid()
    }
    return bytes
      ? { kind: "bytes", value: Uint8Array.from(text, (character) => character.charCodeAt(0)) }
      : { kind: "string", value: text }
  }

  private parseName(name: string): LiteralNode {
    if (name === "True" || name === "False") {
      return { kind: "boolean", value: name === "True" }
    }
    if (name === "None") {
      return { kind: "none" }
    }
    throw invalid()
  }

  private parsePunct(text: string): LiteralNode {
    this.advance()
    if (text === "+" || text === "-") {
      return this.parseSigned(text === "-")
    }
    if (text === "[") {
      return { kind: "list", items: this.parseItems("]") }
    }
    if (text === "(") {
      return this.parseParenthesized()
    }
    if (text === "{") {
      return this.parseBraced()
    }
    throw invalid()
  }

  private parseSigned(negative: boolean): LiteralNode {
    const operand = this.current
    if (operand.kind === "number") {
      this.advance()
      return parseNumber(operand.text, negative)
    }
    throw invalid()
  }

  private parseItems(close: string): Array<LiteralNode> {
    const items: Array<LiteralNode> = []
    while (!this.isPunct(close)) {
      items.push(this.parseValue())
      if (!this.isPunct(",")) {
        break
      }
      this.advance()
    }
    this.expectPunct(close)
    return items
  }

  private parseParenthesized(): LiteralNode {
    if (this.isPunct(")")) {
      this.advance()
      return { kind: "tuple", items: [] }
    }
    const first = this.parseValue()
    if (this.isPunct(")")) {
      this.advance()
      return first
    }
    this.expectPunct(",")
    const rest = this.parseItems(")")
    return { kind: "tuple", items: [first, ...rest] }
  }

  private parseBraced(): LiteralNode {
    if (this.isPunct("}")) {
      this.advance()
      return { kind: "dict", entries: [] }
    }
    const first = this.parseValue()
    if (!this.isPunct(":")) {
      if (this.isPunct(",")) {
        this.advance()
        return { kind: "set", items: [first, ...this.parseItems("}")].map(requireHashable) }
      }
      this.expectPunct("}")
      return { kind: "set", items: [requireHashable(first)] }
    }
    const entries: Array<readonly [LiteralNode, LiteralNode]> = []
    let key = first
    for (;;) {
      this.expectPunct(":")
      entries.push([requireHashable(key), this.parseValue()])
      if (!this.isPunct(",")) {
        break
      }
      this.advance()
      if (this.isPunct("}")) {
        break
      }
      key = this.parseValue()
    }
    this.expectPunct("}")
    return { kind: "dict", entries }
  }
}

// CHANGE: evaluate the restricted literal syntax used for container values
// FORMAT THEOREM: parse("[1, 'a']") = list(integer 1, string 'a')
// PURITY: CORE
// INVARIANT: only literals are evaluated; names other than True/False/None are rejected
// COMPLEXITY: O(n)/O(n) where n = |text|
export const parseLiteral = (text: string): Either.Either<LiteralNode, ValueError> =>
  Either.try({
    try: () => new Parser(new Tokenizer(text)).parseExpression(),
    catch: (error) => valueError(error instanceof ParseFailure ? error.message : "Invalid expression.")
  })

const nodeKindNames: Readonly<Record<LiteralNode["kind"], string>> = {
  string: "string",
  bytes: "bytes",
  integer: "integer",
  float: "float",
  boolean: "boolean",
  none: "None",
  list: "list",
  tuple: "tuple",
  set: "set",
  dict: "dictionary"
}

/**
 * Converts a parsed literal into runtime values.
 *
 * Tuples become frozen arrays, sets become `Set`s and dictionaries `Map`s.
 * Equal members and keys collapse the way the literal syntax defines them: `{1, True}` has one member.
 * Integers stay `number` inside the safe range and become `bigint` outside it.
 */
export const toRuntime = (node: LiteralNode): unknown =>
  Match.value(node).pipe(
    Match.when({ kind: "string" }, (string) => string.value),
    Match.when({ kind: "bytes" }, (bytes) => bytes.value),
    Match.when({ kind: "integer" }, (integer) => normalizeInteger(integer.value)),
    Match.when({ kind: "float" }, (float) => float.value),
    Match.when({ kind: "boolean" }, (boolean) => boolean.value),
    Match.when({ kind: "none" }, () => null),
    Match.when({ kind: "list" }, (list) => list.items.map(toRuntime)),
    Match.when({ kind: "tuple" }, (tuple) => Object.freeze(tuple.items.map(toRuntime))),
    Match.when({ kind: "set" }, (set) => uniqueSet(set.items.map(toRuntime))),
    Match.when(
      { kind: "dict" },
      (dict) => uniqueMap(dict.entries.map(([key, item]) => [toRuntime(key), toRuntime(item)] as const))
    ),
    Match.exhaustive
  )

const expectedNodeKind: Readonly<Record<ContainerKind, LiteralNode["kind"]>> = {
  list: "list",
  tuple: "tuple",
  set: "set",
  dict: "dict"
}

// CHANGE: evaluate text and require a specific container kind
// FORMAT THEOREM: evaluate("(1,)", "list") = Left("Value is tuple, not list.")
// PURITY: CORE
// INVARIANT: "set()" is the only spelling of an empty set
// COMPLEXITY: O(n)/O(n)
export const evaluateContainer = (
  text: string,
  expected: ContainerKind
): Either.Either<LiteralNode, ValueError> => {
  if (expected === "set" && text === "set()") {
    return Either.right({ kind: "set", items: [] })
  }
  return Either.flatMap(parseLiteral(text), (node) =>
    node.kind === expectedNodeKind[expected]
      ? Either.right(node)
      : Either.left(valueError(`Value is ${nodeKindNames[node.kind]}, not ${expected}.`)))
}
