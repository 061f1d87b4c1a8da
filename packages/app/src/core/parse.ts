import * as Either from "effect/Either"

import type { JsonSyntaxError, SyntaxErrorReason } from "./errors.js"
import { syntaxError } from "./errors.js"
import type { Lexer, Token } from "./lexer.js"
import { describeToken, makeLexer } from "./lexer.js"
import type { Value } from "./value.js"
import { jsonArray, jsonBool, jsonNull, jsonNumber, jsonString } from "./value.js"

// CHANGE: build Value trees by recursive descent over the token stream
// WHY: enforce the full JSON grammar and stop at the first violation
// FORMAT THEOREM: ∀s: parse(s) = Right(v) → s = ws · text(v) · ws
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no partial tree escapes on failure; nesting never exceeds maxDepth
// COMPLEXITY: O(n) time, O(maxDepth) stack

export interface ParseOptions {
  /** Maximum container nesting; deeper input fails with DepthExceeded. */
  readonly maxDepth?: number
}

export const DEFAULT_MAX_DEPTH = 512

// Upper bound on a requested maxDepth.
export const MAX_DEPTH_LIMIT = 2048

/**
 * Normalize a requested nesting limit.
 *
 * @returns DEFAULT_MAX_DEPTH for non-finite or negative input, otherwise the floor capped at MAX_DEPTH_LIMIT.
 */
export const normalizeMaxDepth = (maxDepth: number | undefined): number =>
  maxDepth === undefined || !Number.isFinite(maxDepth) || maxDepth < 0
    ? DEFAULT_MAX_DEPTH
    : Math.min(Math.floor(maxDepth), MAX_DEPTH_LIMIT)

type Parsed<A> = Either.Either<A, JsonSyntaxError>

interface ParserState {
  readonly lexer: Lexer
  readonly maxDepth: number
  current: Token
}

const fail = (state: ParserState, offset: number, reason: SyntaxErrorReason): Parsed<never> =>
  Either.left(syntaxError(state.lexer.source, offset, reason))

// Re-read through a call so that narrowing does not survive advance().
const peek = (state: ParserState): Token => state.current

const advance = (state: ParserState): Parsed<Token> => {
  const previous = state.current
  const next = state.lexer.next()
  if (Either.isLeft(next)) {
    return Either.left(next.left)
  }
  state.current = next.right
  return Either.right(previous)
}

const unexpected = (state: ParserState, expected: string): Parsed<never> => {
  const token = peek(state)
  return token._tag === "EOF"
    ? fail(state, token.offset, { _tag: "UnexpectedEndOfInput", expected })
    : fail(state, token.offset, { _tag: "UnexpectedToken", expected, found: describeToken(token) })
}

const enter = (state: ParserState, depth: number): Parsed<number> =>
  depth + 1 > state.maxDepth
    ? fail(state, peek(state).offset, { _tag: "DepthExceeded", maxDepth: state.maxDepth })
    : Either.right(depth + 1)

const parseArray = (state: ParserState, depth: number): Parsed<Value> => {
  const entered = enter(state, depth)
  if (Either.isLeft(entered)) {
    return Either.left(entered.left)
  }
  const opened = advance(state)
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const items: Array<Value> = []
  if (peek(state)._tag === "RBracket") {
    const closed = advance(state)
    return Either.isLeft(closed) ? Either.left(closed.left) : Either.right(jsonArray(items))
  }
  for (;;) {
    const item = parseValue(state, entered.right)
    if (Either.isLeft(item)) {
      return item
    }
    items.push(item.right)
    const separator = peek(state)
    if (separator._tag === "RBracket") {
      const closed = advance(state)
      return Either.isLeft(closed) ? Either.left(closed.left) : Either.right(jsonArray(items))
    }
    if (separator._tag !== "Comma") {
      return unexpected(state, "',' or ']'")
    }
    const comma = advance(state)
    if (Either.isLeft(comma)) {
      return Either.left(comma.left)
    }
    if (peek(state)._tag === "RBracket") {
      return fail(state, peek(state).offset, { _tag: "TrailingComma", closing: "]" })
    }
  }
}

const parseMember = (
  state: ParserState,
  depth: number,
  entries: Map<string, Value>
): Parsed<void> => {
  const key = peek(state)
  if (key._tag !== "String") {
    return unexpected(state, "string key")
  }
  const keyToken = advance(state)
  if (Either.isLeft(keyToken)) {
    return Either.left(keyToken.left)
  }
  if (peek(state)._tag !== "Colon") {
    return unexpected(state, "':'")
  }
  const colon = advance(state)
  if (Either.isLeft(colon)) {
    return Either.left(colon.left)
  }
  const member = parseValue(state, depth)
  if (Either.isLeft(member)) {
    return Either.left(member.left)
  }
  entries.set(key.value, member.right)
  return Either.right(undefined)
}

const parseObject = (state: ParserState, depth: number): Parsed<Value> => {
  const entered = enter(state, depth)
  if (Either.isLeft(entered)) {
    return Either.left(entered.left)
  }
  const opened = advance(state)
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const entries = new Map<string, Value>()
  const finish = (): Parsed<Value> => {
    const closed = advance(state)
    return Either.isLeft(closed) ? Either.left(closed.left) : Either.right<Value>({ _tag: "Object", entries })
  }
  if (peek(state)._tag === "RBrace") {
    return finish()
  }
  if (peek(state)._tag !== "String") {
    return unexpected(state, "string key or '}'")
  }
  for (;;) {
    const member = parseMember(state, entered.right, entries)
    if (Either.isLeft(member)) {
      return Either.left(member.left)
    }
    const separator = peek(state)
    if (separator._tag === "RBrace") {
      return finish()
    }
    if (separator._tag !== "Comma") {
      return unexpected(state, "',' or '}'")
    }
    const comma = advance(state)
    if (Either.isLeft(comma)) {
      return Either.left(comma.left)
    }
    if (peek(state)._tag === "RBrace") {
      return fail(state, peek(state).offset, { _tag: "TrailingComma", closing: "}" })
    }
  }
}

const parseScalar = (state: ParserState, value: Value): Parsed<Value> => {
  const consumed = advance(state)
  return Either.isLeft(consumed) ? Either.left(consumed.left) : Either.right(value)
}

/**
 * Parse the value starting at the current token.
 *
 * @param state - Parser cursor; left on the token after the value.
 * @param depth - Number of enclosing containers.
 *
 * @pure false (advances the cursor)
 * @complexity O(n)
 */
const parseValue = (state: ParserState, depth: number): Parsed<Value> => {
  const token = peek(state)
  switch (token._tag) {
    case "LBrace":
      return parseObject(state, depth)
    case "LBracket":
      return parseArray(state, depth)
    case "String":
      return parseScalar(state, jsonString(token.value))
    case "Number":
      return parseScalar(state, jsonNumber(token.value))
    case "True":
      return parseScalar(state, jsonBool(true))
    case "False":
      return parseScalar(state, jsonBool(false))
    case "Null":
      return parseScalar(state, jsonNull)
    default:
      return unexpected(state, "value")
  }
}

/**
 * Parse a complete JSON document.
 *
 * @param text - Source text.
 * @param options - Parser limits.
 * @returns Either with the root Value or the first SyntaxError.
 *
 * @pure true
 * @invariant Right only when everything after the root is whitespace
 * @complexity O(n)
 */
export const parse = (text: string, options: ParseOptions = {}): Parsed<Value> => {
  const lexer = makeLexer(text)
  const first = lexer.next()
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  const state: ParserState = {
    lexer,
    maxDepth: normalizeMaxDepth(options.maxDepth),
    current: first.right
  }
  const root = parseValue(state, 0)
  if (Either.isLeft(root)) {
    return root
  }
  const trailing = peek(state)
  if (trailing._tag !== "EOF") {
    return fail(state, trailing.offset, { _tag: "TrailingData", found: describeToken(trailing) })
  }
  return root
}
