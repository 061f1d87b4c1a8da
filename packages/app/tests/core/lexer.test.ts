import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { SyntaxErrorReason } from "../../src/core/errors.js"
import { describeToken, tokenize } from "../../src/core/lexer.js"
import { expectLeft, expectRight } from "./either-helpers.js"

const reasonOf = (source: string): SyntaxErrorReason => expectLeft(tokenize(source)).reason

describe("tokenize", () => {
  it.effect("emits punctuation, literals and EOF in order", () =>
    Effect.sync(() => {
      const tokens = expectRight(tokenize(`{"a": [1, true, false, null]}`))
      expect(tokens.map((token) => token._tag)).toEqual([
        "LBrace",
        "String",
        "Colon",
        "LBracket",
        "Number",
        "Comma",
        "True",
        "Comma",
        "False",
        "Comma",
        "Null",
        "RBracket",
        "RBrace",
        "EOF"
      ])
    }))

  it.effect("records the offset of each token and skips whitespace", () =>
    Effect.sync(() => {
      const tokens = expectRight(tokenize(` [ 12 ,"x"]\t`))
      expect(tokens.map((token) => token.offset)).toEqual([1, 3, 6, 7, 10, 12])
    }))

  it.effect("decodes every escape sequence including surrogate pairs", () =>
    Effect.sync(() => {
      const [token] = expectRight(tokenize(String.raw`"a\n\t\"\\\/\b\f\r\u0041\uD83D\uDE00"`))
      expect(token?._tag).toBe("String")
      if (token?._tag === "String") {
        expect(token.value).toBe("a\n\t\"\\/\b\f\rA\u{1F600}")
      }
    }))

  it.effect("keeps the literal text and float value of numbers", () =>
    Effect.sync(() => {
      const [token] = expectRight(tokenize("-12.5e3"))
      expect(token).toEqual({ _tag: "Number", offset: 0, text: "-12.5e3", value: -12500 })
    }))

  it.effect("rejects malformed numbers with the offending text", () =>
    Effect.sync(() => {
      expect(reasonOf("01")).toEqual({ _tag: "InvalidNumber", value: "01" })
      expect(reasonOf("[1.]")).toEqual({ _tag: "InvalidNumber", value: "1." })
      expect(reasonOf(".5")).toEqual({ _tag: "InvalidNumber", value: ".5" })
      expect(reasonOf("-")).toEqual({ _tag: "InvalidNumber", value: "-" })
      expect(reasonOf("1e")).toEqual({ _tag: "InvalidNumber", value: "1e" })
    }))

  it.effect("rejects numbers that overflow to infinity", () =>
    Effect.sync(() => {
      const error = expectLeft(tokenize("1e400"))
      expect(error.reason).toEqual({ _tag: "InvalidNumber", value: "1e400" })
      expect(error.message).toBe("Invalid number at position 0: value 1e400")
    }))

  it.effect("reports an unterminated string at its opening quote", () =>
    Effect.sync(() => {
      const error = expectLeft(tokenize(`[1, "abc`))
      expect(error.reason).toEqual({ _tag: "UnterminatedString" })
      expect(error.position.offset).toBe(4)
    }))

  it.effect("reports an unterminated string that ends in a backslash", () =>
    Effect.sync(() => {
      const error = expectLeft(tokenize(`"ab\\`))
      expect(error.reason).toEqual({ _tag: "UnterminatedString" })
      expect(error.position.offset).toBe(0)
    }))

  it.effect("rejects unknown escapes at the backslash", () =>
    Effect.sync(() => {
      const error = expectLeft(tokenize(String.raw`  "a\q"`))
      expect(error.reason).toEqual({ _tag: "InvalidEscape", character: "q" })
      expect(error.message).toBe("Invalid escape sequence '\\q' at position 4")
    }))

  it.effect("rejects malformed and unpaired unicode escapes", () =>
    Effect.sync(() => {
      expect(reasonOf("\"\\u12G4\"")).toEqual({ _tag: "InvalidUnicode", sequence: "12G4" })
      expect(reasonOf(String.raw`"\uD800"`)).toEqual({ _tag: "InvalidUnicode", sequence: "D800" })
      expect(reasonOf(String.raw`"\uD800A"`)).toEqual({ _tag: "InvalidUnicode", sequence: "D800" })
      expect(reasonOf(String.raw`"\uDC00"`)).toEqual({ _tag: "InvalidUnicode", sequence: "DC00" })
    }))

  it.effect("rejects raw control characters inside strings", () =>
    Effect.sync(() => {
      const error = expectLeft(tokenize("\"a\u0001b\""))
      expect(error.reason).toEqual({ _tag: "ControlCharacter", code: 1 })
      expect(error.message).toBe("Unescaped control character U+0001 in string at position 2")
    }))

  it.effect("rejects unknown keywords and stray characters", () =>
    Effect.sync(() => {
      expect(reasonOf("tru")).toEqual({ _tag: "InvalidLiteral", found: "tru" })
      expect(reasonOf("nullable")).toEqual({ _tag: "InvalidLiteral", found: "nullable" })
      expect(reasonOf("toString")).toEqual({ _tag: "InvalidLiteral", found: "toString" })
      expect(reasonOf("@")).toEqual({ _tag: "UnexpectedCharacter", character: "@" })
    }))

  it.effect("locates errors by line and column", () =>
    Effect.sync(() => {
      const error = expectLeft(tokenize("[\n  1,\n  @]"))
      expect(error.position).toEqual({ offset: 9, line: 3, column: 3 })
    }))
})

describe("describeToken", () => {
  it.effect("names punctuation, numbers and end of input", () =>
    Effect.sync(() => {
      const tokens = expectRight(tokenize("} 7"))
      expect(tokens.map(describeToken)).toEqual(["'}'", "number 7", "end of input"])
    }))
})
