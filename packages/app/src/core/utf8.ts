import * as Either from "effect/Either"

import type { IoError } from "./errors.js"
import { ioError } from "./errors.js"

// CHANGE: decode raw bytes as strict UTF-8 before parsing
// WHY: an undecodable buffer is an input problem, reported before parsing starts
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Right(text) only for well-formed UTF-8; a leading BOM is dropped
// COMPLEXITY: O(n)

/**
 * Decode bytes read from `source` (a path or "<stdin>").
 *
 * @param bytes - Raw input.
 * @param source - Label carried into the IoError.
 * @returns Either with the text or an IoError with reason InvalidEncoding.
 */
export const decodeUtf8 = (
  bytes: Uint8Array,
  source: string
): Either.Either<string, IoError> =>
  Either.try({
    try: () => new TextDecoder("utf-8", { fatal: true }).decode(bytes),
    catch: () => ioError(source, "InvalidEncoding", `Invalid UTF-8 in ${source}`)
  })
