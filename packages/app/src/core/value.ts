import * as Option from "effect/Option"

// CHANGE: introduce the tagged Value tree shared by parser and serializer
// WHY: each variant's payload is statically known to consumers
// FORMAT THEOREM: ∀v ∈ Value: v._tag determines the shape of v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Value is closed under Array/Object nesting; children are owned by exactly one parent
// COMPLEXITY: O(1)/O(1)

export interface NullValue {
  readonly _tag: "Null"
}

export interface BoolValue {
  readonly _tag: "Bool"
  readonly value: boolean
}

export interface NumberValue {
  readonly _tag: "Number"
  readonly value: number
}

export interface StringValue {
  readonly _tag: "String"
  readonly value: string
}

export interface ArrayValue {
  readonly _tag: "Array"
  readonly items: ReadonlyArray<Value>
}

export interface ObjectValue {
  readonly _tag: "Object"
  readonly entries: ReadonlyMap<string, Value>
}

export type Value =
  | NullValue
  | BoolValue
  | NumberValue
  | StringValue
  | ArrayValue
  | ObjectValue

export type ValueTag = Value["_tag"]

export const jsonNull: NullValue = { _tag: "Null" }

export const jsonBool = (value: boolean): BoolValue => ({ _tag: "Bool", value })

export const jsonNumber = (value: number): NumberValue => ({ _tag: "Number", value })

export const jsonString = (value: string): StringValue => ({ _tag: "String", value })

export const jsonArray = (items: ReadonlyArray<Value>): ArrayValue => ({ _tag: "Array", items })

/**
 * Build an object value from key/value pairs.
 *
 * @param entries - Pairs in insertion order.
 * @returns ObjectValue keyed by the first occurrence of each key.
 *
 * @pure true
 * @invariant a repeated key keeps its first position and takes its last value
 * @complexity O(n)
 */
export const jsonObject = (
  entries: Iterable<readonly [string, Value]>
): ObjectValue => ({ _tag: "Object", entries: new Map(entries) })

export const isNull = (value: Value): value is NullValue => value._tag === "Null"

export const asBoolean = (value: Value): Option.Option<boolean> =>
  value._tag === "Bool" ? Option.some(value.value) : Option.none()

export const asNumber = (value: Value): Option.Option<number> =>
  value._tag === "Number" ? Option.some(value.value) : Option.none()

export const asString = (value: Value): Option.Option<string> =>
  value._tag === "String" ? Option.some(value.value) : Option.none()

export const asArray = (value: Value): Option.Option<ReadonlyArray<Value>> =>
  value._tag === "Array" ? Option.some(value.items) : Option.none()

export const asObject = (value: Value): Option.Option<ReadonlyMap<string, Value>> =>
  value._tag === "Object" ? Option.some(value.entries) : Option.none()

// Lookups miss (None) on the wrong variant as well as on an absent key/index.
export const get = (value: Value, key: string): Option.Option<Value> =>
  value._tag === "Object" ? Option.fromNullable(value.entries.get(key)) : Option.none()

export const at = (value: Value, index: number): Option.Option<Value> =>
  value._tag === "Array" ? Option.fromNullable(value.items[index]) : Option.none()

const typeNames: Readonly<Record<ValueTag, string>> = {
  Null: "null",
  Bool: "boolean",
  Number: "number",
  String: "string",
  Array: "array",
  Object: "object"
}

export const typeName = (value: Value): string => typeNames[value._tag]
