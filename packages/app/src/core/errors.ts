import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the JSON engine and its CLI
// WHY: callers must tell "content problem" (SyntaxError) from "file problem" (IOError)
// FORMAT THEOREM: ∀e ∈ EngineError: e._tag ∈ {"SyntaxError","IOError"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every SyntaxError carries a position; IOError never does
// COMPLEXITY: O(n) to locate a position, O(1) otherwise

export interface SourcePosition {
  /** 0-based UTF-16 offset into the source text. */
  readonly offset: number
  /** 1-based line. */
  readonly line: number
  /** 1-based column within the line. */
  readonly column: number
}

export type SyntaxErrorReason =
  | { readonly _tag: "UnexpectedCharacter"; readonly character: string }
  | { readonly _tag: "UnexpectedToken"; readonly expected: string; readonly found: string }
  | { readonly _tag: "UnexpectedEndOfInput"; readonly expected: string }
  | { readonly _tag: "UnterminatedString" }
  | { readonly _tag: "ControlCharacter"; readonly code: number }
  | { readonly _tag: "InvalidEscape"; readonly character: string }
  | { readonly _tag: "InvalidUnicode"; readonly sequence: string }
  | { readonly _tag: "InvalidNumber"; readonly value: string }
  | { readonly _tag: "InvalidLiteral"; readonly found: string }
  | { readonly _tag: "TrailingComma"; readonly closing: string }
  | { readonly _tag: "TrailingData"; readonly found: string }
  | { readonly _tag: "DepthExceeded"; readonly maxDepth: number }

export type JsonSyntaxError = {
  readonly _tag: "SyntaxError"
  readonly reason: SyntaxErrorReason
  readonly position: SourcePosition
  readonly message: string
}

export type IoErrorReason =
  | "NotFound"
  | "PermissionDenied"
  | "NotAFile"
  | "InvalidEncoding"
  | "Unreadable"

export type IoError = {
  readonly _tag: "IOError"
  readonly path: string
  readonly reason: IoErrorReason
  readonly message: string
}

export type ConversionError = { readonly _tag: "ConversionError"; readonly message: string }
export type UsageError = { readonly _tag: "UsageError"; readonly message: string }

export type EngineError = JsonSyntaxError | IoError

export type AppError = EngineError | CliError | UsageError

const hex4 = (code: number): string => code.toString(16).toUpperCase().padStart(4, "0")

const describeReason = (reason: SyntaxErrorReason, offset: number): string =>
  Match.value(reason).pipe(
    Match.tag("UnexpectedCharacter", (r) => `Unexpected character '${r.character}' at position ${offset}`),
    Match.tag(
      "UnexpectedToken",
      (r) => `Unexpected token at position ${offset}: expected ${r.expected}, found ${r.found}`
    ),
    Match.tag("UnexpectedEndOfInput", (r) => `Unexpected end of input at position ${offset}: expected ${r.expected}`),
    Match.tag("UnterminatedString", () => `Unterminated string starting at position ${offset}`),
    Match.tag(
      "ControlCharacter",
      (r) => `Unescaped control character U+${hex4(r.code)} in string at position ${offset}`
    ),
    Match.tag("InvalidEscape", (r) => `Invalid escape sequence '\\${r.character}' at position ${offset}`),
    Match.tag("InvalidUnicode", (r) => `Invalid Unicode escape '\\u${r.sequence}' at position ${offset}`),
    Match.tag("InvalidNumber", (r) => `Invalid number at position ${offset}: value ${r.value}`),
    Match.tag("InvalidLiteral", (r) => `Invalid literal at position ${offset}: found ${r.found}`),
    Match.tag("TrailingComma", (r) => `Trailing comma before '${r.closing}' at position ${offset}`),
    Match.tag("TrailingData", (r) => `Trailing data at position ${offset}: found ${r.found}`),
    Match.tag("DepthExceeded", (r) => `Nesting depth exceeds ${r.maxDepth} at position ${offset}`),
    Match.exhaustive
  )

/**
 * Resolve an offset to its line and column.
 *
 * @param source - Text the offset points into.
 * @param offset - 0-based offset; clamped to the text length.
 *
 * @pure true
 * @invariant only "\n" starts a new line
 * @complexity O(offset)
 */
export const locate = (source: string, offset: number): SourcePosition => {
  const end = Math.min(Math.max(offset, 0), source.length)
  let line = 1
  let lineStart = 0
  for (let index = source.indexOf("\n"); index !== -1 && index < end; index = source.indexOf("\n", index + 1)) {
    line += 1
    lineStart = index + 1
  }
  return { offset: end, line, column: end - lineStart + 1 }
}

export const syntaxError = (
  source: string,
  offset: number,
  reason: SyntaxErrorReason
): JsonSyntaxError => {
  const position = locate(source, offset)
  return {
    _tag: "SyntaxError",
    reason,
    position,
    message: describeReason(reason, position.offset)
  }
}

export const ioError = (path: string, reason: IoErrorReason, message: string): IoError => ({
  _tag: "IOError",
  path,
  reason,
  message
})

export const conversionError = (message: string): ConversionError => ({
  _tag: "ConversionError",
  message
})

export const usageError = (message: string): UsageError => ({
  _tag: "UsageError",
  message
})

/**
 * Render an engine error for a human-facing caller.
 *
 * @pure true
 * @invariant syntax errors mention "position N" and the line/column
 * @complexity O(1)
 */
export const formatEngineError = (error: EngineError): string =>
  Match.value(error).pipe(
    Match.tag("SyntaxError", (e) => `${e.message} (line ${e.position.line}, column ${e.position.column})`),
    Match.tag("IOError", (e) => e.message),
    Match.exhaustive
  )

export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("SyntaxError", (e) => formatEngineError(e)),
    Match.tag("IOError", (e) => formatEngineError(e)),
    Match.tag("CliError", (e) => e.message),
    Match.tag("UsageError", (e) => e.message),
    Match.exhaustive
  )
