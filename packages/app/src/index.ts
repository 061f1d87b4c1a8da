export type {
  ConversionError,
  EngineError,
  IoError,
  IoErrorReason,
  JsonSyntaxError,
  SourcePosition,
  SyntaxErrorReason
} from "./core/errors.js"
export { formatEngineError, locate } from "./core/errors.js"
export type { Json, JsonObject } from "./core/json.js"
export { fromJson, fromUnknown, toJson } from "./core/json.js"
export type { Lexer, Token, TokenTag } from "./core/lexer.js"
export { describeToken, makeLexer, tokenize } from "./core/lexer.js"
export type { ParseOptions } from "./core/parse.js"
export { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT, normalizeMaxDepth, parse } from "./core/parse.js"
export type { SerializeOptions } from "./core/serialize.js"
export { formatNumber, quoteString, serialize } from "./core/serialize.js"
export { decodeUtf8 } from "./core/utf8.js"
export type {
  ArrayValue,
  BoolValue,
  NullValue,
  NumberValue,
  ObjectValue,
  StringValue,
  Value,
  ValueTag
} from "./core/value.js"
export {
  asArray,
  asBoolean,
  asNumber,
  asObject,
  asString,
  at,
  get,
  isNull,
  jsonArray,
  jsonBool,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonString,
  typeName
} from "./core/value.js"
export { parseFile, readTextFile } from "./shell/load-file.js"
