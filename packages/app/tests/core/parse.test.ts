import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT, normalizeMaxDepth, parse } from "../../src/core/parse.js"
import { serialize } from "../../src/core/serialize.js"
import {
  asNumber,
  at,
  get,
  jsonArray,
  jsonBool,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonString
} from "../../src/core/value.js"
import { expectLeft, expectRight } from "./either-helpers.js"

describe("parse", () => {
  it.effect("maps literals to their variants", () =>
    Effect.sync(() => {
      expect(expectRight(parse("true"))).toEqual(jsonBool(true))
      expect(expectRight(parse("false"))).toEqual(jsonBool(false))
      expect(expectRight(parse("null"))).toEqual(jsonNull)
      expect(expectRight(parse("42"))).toEqual(jsonNumber(42))
      expect(expectRight(parse("3.14"))).toEqual(jsonNumber(3.14))
      expect(expectRight(parse(`"hi"`))).toEqual(jsonString("hi"))
    }))

  it.effect("builds nested objects and arrays", () =>
    Effect.sync(() => {
      const value = expectRight(parse(`{"users": [{"id": 1}, {"id": 2}]}`))
      expect(value).toEqual(
        jsonObject([
          [
            "users",
            jsonArray([jsonObject([["id", jsonNumber(1)]]), jsonObject([["id", jsonNumber(2)]])])
          ]
        ])
      )
      const secondId = get(value, "users").pipe(
        Option.flatMap((users) => at(users, 1)),
        Option.flatMap((user) => get(user, "id")),
        Option.flatMap(asNumber)
      )
      expect(Option.getOrUndefined(secondId)).toBe(2)
    }))

  it.effect("keeps first-seen key order and the last duplicate value", () =>
    Effect.sync(() => {
      const value = expectRight(parse(`{"b": 1, "a": 2, "b": 3}`))
      expect(value._tag).toBe("Object")
      if (value._tag === "Object") {
        expect([...value.entries.keys()]).toEqual(["b", "a"])
        expect(value.entries.get("b")).toEqual(jsonNumber(3))
      }
    }))

  it.effect("accepts empty containers and surrounding whitespace", () =>
    Effect.sync(() => {
      expect(expectRight(parse(" \t\n[ ]\r\n "))).toEqual(jsonArray([]))
      expect(expectRight(parse("{}"))).toEqual(jsonObject([]))
    }))

  it.effect("points at the token where a value was expected", () =>
    Effect.sync(() => {
      const error = expectLeft(parse(`{"bad": }`))
      expect(error.reason).toEqual({ _tag: "UnexpectedToken", expected: "value", found: "'}'" })
      expect(error.position).toEqual({ offset: 8, line: 1, column: 9 })
      expect(error.message).toBe("Unexpected token at position 8: expected value, found '}'")
    }))

  it.effect("reports an unterminated string value", () =>
    Effect.sync(() => {
      const error = expectLeft(parse(`{"unclosed": "string`))
      expect(error._tag).toBe("SyntaxError")
      expect(error.reason._tag).toBe("UnterminatedString")
      expect(error.position.offset).toBe(13)
    }))

  it.effect("rejects empty input", () =>
    Effect.sync(() => {
      expect(expectLeft(parse("")).reason).toEqual({ _tag: "UnexpectedEndOfInput", expected: "value" })
      expect(expectLeft(parse("   ")).position.offset).toBe(3)
    }))

  it.effect("rejects trailing commas at the closing bracket", () =>
    Effect.sync(() => {
      const inArray = expectLeft(parse("[1,]"))
      expect(inArray.reason).toEqual({ _tag: "TrailingComma", closing: "]" })
      expect(inArray.position.offset).toBe(3)
      const inObject = expectLeft(parse(`{"a":1,}`))
      expect(inObject.reason).toEqual({ _tag: "TrailingComma", closing: "}" })
      expect(inObject.message).toBe("Trailing comma before '}' at position 7")
    }))

  it.effect("rejects malformed members", () =>
    Effect.sync(() => {
      expect(expectLeft(parse(`{"a" 1}`)).reason).toEqual({
        _tag: "UnexpectedToken",
        expected: "':'",
        found: "number 1"
      })
      expect(expectLeft(parse(`{1: 2}`)).reason).toEqual({
        _tag: "UnexpectedToken",
        expected: "string key or '}'",
        found: "number 1"
      })
      expect(expectLeft(parse(`{"a": 1, 2: 3}`)).reason).toEqual({
        _tag: "UnexpectedToken",
        expected: "string key",
        found: "number 2"
      })
      expect(expectLeft(parse(`{"a": 1 "b": 2}`)).reason).toEqual({
        _tag: "UnexpectedToken",
        expected: "',' or '}'",
        found: "string"
      })
    }))

  it.effect("rejects missing separators and unclosed containers", () =>
    Effect.sync(() => {
      const missingComma = expectLeft(parse("[1 2]"))
      expect(missingComma.reason).toEqual({ _tag: "UnexpectedToken", expected: "',' or ']'", found: "number 2" })
      expect(missingComma.position.offset).toBe(3)
      const unclosedObject = expectLeft(parse(`{"a":1,"b"`))
      expect(unclosedObject.reason).toEqual({ _tag: "UnexpectedEndOfInput", expected: "':'" })
      expect(unclosedObject.position.offset).toBe(10)
      expect(expectLeft(parse("[")).reason).toEqual({ _tag: "UnexpectedEndOfInput", expected: "value" })
    }))

  it.effect("rejects anything after the root value", () =>
    Effect.sync(() => {
      const error = expectLeft(parse("true false"))
      expect(error.reason).toEqual({ _tag: "TrailingData", found: "'false'" })
      expect(error.position.offset).toBe(5)
      expect(expectLeft(parse(`{"a":1}}`)).message).toBe("Trailing data at position 7: found '}'")
    }))

  it.effect("propagates lexical errors found after the root", () =>
    Effect.sync(() => {
      expect(expectLeft(parse("[1] #")).reason).toEqual({ _tag: "UnexpectedCharacter", character: "#" })
    }))

  it.effect("enforces the nesting limit at the opening bracket", () =>
    Effect.sync(() => {
      expect(expectRight(parse("[[1]]", { maxDepth: 2 }))).toEqual(jsonArray([jsonArray([jsonNumber(1)])]))
      const error = expectLeft(parse(`[{"a": [1]}]`, { maxDepth: 2 }))
      expect(error.reason).toEqual({ _tag: "DepthExceeded", maxDepth: 2 })
      expect(error.position.offset).toBe(7)
    }))

  it.effect("fails instead of overflowing the stack on deep input", () =>
    Effect.sync(() => {
      const error = expectLeft(parse("[".repeat(100_000)))
      expect(error.reason).toEqual({ _tag: "DepthExceeded", maxDepth: DEFAULT_MAX_DEPTH })
      expect(error.position.offset).toBe(DEFAULT_MAX_DEPTH)
      const deepest = "[".repeat(DEFAULT_MAX_DEPTH) + "]".repeat(DEFAULT_MAX_DEPTH)
      expect(expectRight(parse(deepest))._tag).toBe("Array")
    }))

  it.effect("falls back to the default limit for non-finite or negative maxDepth", () =>
    Effect.sync(() => {
      const deep = "[".repeat(100_000)
      for (const maxDepth of [Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY, -1]) {
        const error = expectLeft(parse(deep, { maxDepth }))
        expect(error.reason).toEqual({ _tag: "DepthExceeded", maxDepth: DEFAULT_MAX_DEPTH })
        expect(error.position.offset).toBe(DEFAULT_MAX_DEPTH)
      }
    }))

  it.effect("caps very large maxDepth values", () =>
    Effect.sync(() => {
      const error = expectLeft(parse("[".repeat(100_000), { maxDepth: 1e9 }))
      expect(error.reason).toEqual({ _tag: "DepthExceeded", maxDepth: MAX_DEPTH_LIMIT })
      expect(error.position.offset).toBe(MAX_DEPTH_LIMIT)
    }))
})

describe("normalizeMaxDepth", () => {
  it.effect("floors fractional limits and keeps zero", () =>
    Effect.sync(() => {
      expect(normalizeMaxDepth(undefined)).toBe(DEFAULT_MAX_DEPTH)
      expect(normalizeMaxDepth(3.9)).toBe(3)
      expect(normalizeMaxDepth(0)).toBe(0)
      expect(normalizeMaxDepth(MAX_DEPTH_LIMIT + 1)).toBe(MAX_DEPTH_LIMIT)
    }))
})

describe("parse and serialize", () => {
  const documents = [
    `{"name": "Ada", "tags": ["x", "y"], "score": 9.5, "active": true, "manager": null}`,
    `[0, -0, 1e21, 1.5e-7, -273.15, 12345678901234567890]`,
    `{"nested": {"deeper": {"deepest": [[], {}, [{}]]}}}`,
    `"line\\nbreak \\"quoted\\" tab\\t slash\\/ \\u00e9 \\ud83d\\ude00"`,
    `{"": "", "__proto__": {"x": 1}, "constructor": []}`,
    `[true, false, null]`
  ]

  it.effect("round-trips compact output to an equal tree", () =>
    Effect.sync(() => {
      for (const document of documents) {
        const value = expectRight(parse(document))
        expect(expectRight(parse(serialize(value)))).toEqual(value)
      }
    }))

  it.effect("round-trips pretty output to an equal tree", () =>
    Effect.sync(() => {
      for (const document of documents) {
        const value = expectRight(parse(document))
        expect(expectRight(parse(serialize(value, { indent: 3 })))).toEqual(value)
      }
    }))

  it.effect("reaches a fixed point after one compact serialization", () =>
    Effect.sync(() => {
      for (const document of documents) {
        const once = serialize(expectRight(parse(document)))
        expect(serialize(expectRight(parse(once)))).toBe(once)
      }
    }))
})
