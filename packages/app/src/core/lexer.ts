import * as Either from "effect/Either"

import type { JsonSyntaxError, SyntaxErrorReason } from "./errors.js"
import { syntaxError } from "./errors.js"

// CHANGE: tokenize JSON text into positioned tokens
// WHY: the parser works on tokens and reports errors at token offsets
// FORMAT THEOREM: ∀s: tokenize(s) = Right(ts) → last(ts)._tag = "EOF" ∧ offsets strictly increase
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: string tokens hold decoded text; number tokens hold finite values
// COMPLEXITY: O(n), single pass without backtracking

type Keyword = "True" | "False" | "Null"

type Punctuation = "LBrace" | "RBrace" | "LBracket" | "RBracket" | "Colon" | "Comma"

export type Token =
  | { readonly _tag: Punctuation; readonly offset: number }
  | { readonly _tag: Keyword | "EOF"; readonly offset: number }
  | { readonly _tag: "String"; readonly offset: number; readonly value: string }
  | { readonly _tag: "Number"; readonly offset: number; readonly text: string; readonly value: number }

export type TokenTag = Token["_tag"]

export interface Lexer {
  readonly source: string
  /** Scan the next token; yields EOF repeatedly once the input is exhausted. */
  readonly next: () => Either.Either<Token, JsonSyntaxError>
}

const punctuation: Readonly<Record<string, Punctuation>> = {
  "{": "LBrace",
  "}": "RBrace",
  "[": "LBracket",
  "]": "RBracket",
  ":": "Colon",
  ",": "Comma"
}

const simpleEscapes: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const keywords: ReadonlyMap<string, Keyword> = new Map<string, Keyword>([
  ["true", "True"],
  ["false", "False"],
  ["null", "Null"]
])

const isWhitespace = (code: number): boolean => code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff

const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff

const HEX4 = /^[0-9a-fA-F]{4}$/

const readHex4 = (source: string, index: number): number | undefined => {
  const digits = source.slice(index, index + 4)
  return HEX4.test(digits) ? Number.parseInt(digits, 16) : undefined
}

/**
 * Describe a token for "found ..." diagnostics.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeToken = (token: Token): string => {
  switch (token._tag) {
    case "LBrace":
      return "'{'"
    case "RBrace":
      return "'}'"
    case "LBracket":
      return "'['"
    case "RBracket":
      return "']'"
    case "Colon":
      return "':'"
    case "Comma":
      return "','"
    case "True":
      return "'true'"
    case "False":
      return "'false'"
    case "Null":
      return "'null'"
    case "String":
      return "string"
    case "Number":
      return `number ${token.text}`
    case "EOF":
      return "end of input"
  }
}

interface Scanned<A> {
  readonly value: A
  readonly end: number
}

/**
 * Create a lexer over an immutable source.
 *
 * @param source - Complete JSON text.
 * @returns Lexer advancing a private cursor on each `next()` call.
 *
 * @pure false (the cursor is local to the returned lexer)
 * @invariant the first failure is returned; later calls are not meaningful
 * @complexity O(n) over all calls
 */
export const makeLexer = (source: string): Lexer => {
  // Sticky patterns carry lastIndex, so each lexer owns its own.
  const numberPattern = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y
  const numberRunPattern = /[-+.eE0-9]*/y
  const wordPattern = /[A-Za-z]+/y
  let offset = 0

  const fail = (at: number, reason: SyntaxErrorReason): Either.Either<never, JsonSyntaxError> =>
    Either.left(syntaxError(source, at, reason))

  const readEscape = (
    start: number,
    index: number
  ): Either.Either<Scanned<string>, JsonSyntaxError> => {
    const marker = source.charAt(index + 1)
    if (marker === "") {
      return fail(start, { _tag: "UnterminatedString" })
    }
    const simple = simpleEscapes[marker]
    if (simple !== undefined) {
      return Either.right({ value: simple, end: index + 2 })
    }
    if (marker !== "u") {
      return fail(index, { _tag: "InvalidEscape", character: marker })
    }
    const code = readHex4(source, index + 2)
    if (code === undefined) {
      return fail(index, { _tag: "InvalidUnicode", sequence: source.slice(index + 2, index + 6) })
    }
    const sequence = source.slice(index + 2, index + 6)
    if (isLowSurrogate(code)) {
      return fail(index, { _tag: "InvalidUnicode", sequence })
    }
    if (!isHighSurrogate(code)) {
      return Either.right({ value: String.fromCharCode(code), end: index + 6 })
    }
    const low = source.startsWith("\\u", index + 6) ? readHex4(source, index + 8) : undefined
    if (low === undefined || !isLowSurrogate(low)) {
      return fail(index, { _tag: "InvalidUnicode", sequence })
    }
    return Either.right({ value: String.fromCharCode(code, low), end: index + 12 })
  }

  const scanString = (start: number): Either.Either<Scanned<string>, JsonSyntaxError> => {
    let value = ""
    let chunkStart = start + 1
    let index = chunkStart
    while (index < source.length) {
      const code = source.charCodeAt(index)
      if (code === 0x22) {
        return Either.right({ value: value + source.slice(chunkStart, index), end: index + 1 })
      }
      if (code === 0x5c) {
        const escape = readEscape(start, index)
        if (Either.isLeft(escape)) {
          return escape
        }
        value += source.slice(chunkStart, index) + escape.right.value
        index = escape.right.end
        chunkStart = index
        continue
      }
      if (code < 0x20) {
        return fail(index, { _tag: "ControlCharacter", code })
      }
      index += 1
    }
    return fail(start, { _tag: "UnterminatedString" })
  }

  const scanNumber = (start: number): Either.Either<Token, JsonSyntaxError> => {
    numberPattern.lastIndex = start
    const match = numberPattern.exec(source)
    numberRunPattern.lastIndex = start
    const run = numberRunPattern.exec(source)?.[0] ?? ""
    const text = match?.[0]
    if (text === undefined || text.length !== run.length) {
      return fail(start, { _tag: "InvalidNumber", value: run.length > 0 ? run : source.charAt(start) })
    }
    const value = Number(text)
    if (!Number.isFinite(value)) {
      return fail(start, { _tag: "InvalidNumber", value: text })
    }
    offset = start + text.length
    return Either.right({ _tag: "Number", offset: start, text, value })
  }

  const scanKeyword = (start: number): Either.Either<Token, JsonSyntaxError> => {
    wordPattern.lastIndex = start
    const word = wordPattern.exec(source)?.[0] ?? ""
    const tag = keywords.get(word)
    if (tag === undefined) {
      return fail(start, { _tag: "InvalidLiteral", found: word })
    }
    offset = start + word.length
    return Either.right({ _tag: tag, offset: start })
  }

  const next = (): Either.Either<Token, JsonSyntaxError> => {
    while (offset < source.length && isWhitespace(source.charCodeAt(offset))) {
      offset += 1
    }
    const start = offset
    if (start >= source.length) {
      return Either.right({ _tag: "EOF", offset: start })
    }
    const char = source.charAt(start)
    const single = punctuation[char]
    if (single !== undefined) {
      offset = start + 1
      return Either.right({ _tag: single, offset: start })
    }
    if (char === "\"") {
      const scanned = scanString(start)
      if (Either.isLeft(scanned)) {
        return Either.left(scanned.left)
      }
      offset = scanned.right.end
      return Either.right({ _tag: "String", offset: start, value: scanned.right.value })
    }
    if (char === "-" || char === "." || (char >= "0" && char <= "9")) {
      return scanNumber(start)
    }
    if (char === "t" || char === "f" || char === "n") {
      return scanKeyword(start)
    }
    const codePoint = source.codePointAt(start) ?? source.charCodeAt(start)
    return fail(start, { _tag: "UnexpectedCharacter", character: String.fromCodePoint(codePoint) })
  }

  return { source, next }
}

/**
 * Tokenize a complete source, ending with EOF.
 *
 * @param source - JSON text.
 * @returns Either with every token or the first lexical error.
 *
 * @pure true
 * @complexity O(n)
 */
export const tokenize = (source: string): Either.Either<ReadonlyArray<Token>, JsonSyntaxError> => {
  const lexer = makeLexer(source)
  const tokens: Array<Token> = []
  for (;;) {
    const token = lexer.next()
    if (Either.isLeft(token)) {
      return Either.left(token.left)
    }
    tokens.push(token.right)
    if (token.right._tag === "EOF") {
      return Either.right(tokens)
    }
  }
}
