import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { ConversionError } from "./errors.js"
import { conversionError } from "./errors.js"
import type { Value } from "./value.js"
import { jsonArray, jsonBool, jsonNull, jsonNumber, jsonObject, jsonString } from "./value.js"

// CHANGE: bridge Value trees and plain JavaScript data
// WHY: callers holding native objects serialize them through the engine and read parse results natively
// FORMAT THEOREM: ∀j ∈ Json: toJson(fromJson(j)) deep-equals j
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(n)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

// Only plain records convert; Date, Map, RegExp and class instances do not.
const isPlainObject = (input: unknown): input is object => {
  if (typeof input !== "object" || input === null) {
    return false
  }
  const prototype: unknown = Object.getPrototypeOf(input)
  return prototype === Object.prototype || prototype === null
}

const isJson = (input: unknown): boolean => Schema.is(JsonSchema)(input)

const PlainJsonObject = Schema.declare(
  (input: unknown): input is JsonObject => isPlainObject(input) && Object.values(input).every(isJson),
  { identifier: "PlainJsonObject", description: "a plain object whose values are JSON" }
)

const JsonSchema: Schema.Schema<Json> = Schema.suspend(() =>
  Schema.Union(
    Schema.Null,
    Schema.Boolean,
    Schema.Number.pipe(Schema.finite()),
    Schema.String,
    Schema.Array(JsonSchema),
    PlainJsonObject
  )
)

const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)

export const toJson = (value: Value): Json => {
  switch (value._tag) {
    case "Null":
      return null
    case "Bool":
    case "Number":
    case "String":
      return value.value
    case "Array":
      return value.items.map(toJson)
    case "Object":
      // fromEntries defines own properties, so a "__proto__" key stays data
      return Object.fromEntries([...value.entries].map(([key, member]): [string, Json] => [key, toJson(member)]))
  }
}

export const fromJson = (json: Json): Value => {
  if (json === null) {
    return jsonNull
  }
  if (typeof json === "boolean") {
    return jsonBool(json)
  }
  if (typeof json === "number") {
    return jsonNumber(json)
  }
  if (typeof json === "string") {
    return jsonString(json)
  }
  if (isJsonArray(json)) {
    return jsonArray(json.map(fromJson))
  }
  return jsonObject(Object.entries(json).map(([key, member]) => [key, fromJson(member)] as const))
}

/**
 * Validate an arbitrary runtime value and convert it to a Value tree.
 *
 * @param input - Any JavaScript value.
 * @returns Either with the Value or a ConversionError naming the offending path.
 *
 * @pure true
 * @invariant NaN and ±Infinity are rejected
 * @complexity O(n)
 */
export const fromUnknown = (input: unknown): Either.Either<Value, ConversionError> =>
  pipe(
    Schema.decodeUnknownEither(JsonSchema)(input),
    Either.map(fromJson),
    Either.mapLeft((error) => conversionError(TreeFormatter.formatErrorSync(error)))
  )
