import type { PlatformError } from "@effect/platform/Error"
import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { EngineError, IoError, IoErrorReason } from "../core/errors.js"
import { ioError } from "../core/errors.js"
import type { ParseOptions } from "../core/parse.js"
import { parse } from "../core/parse.js"
import { decodeUtf8 } from "../core/utf8.js"
import type { Value } from "../core/value.js"

// CHANGE: load a JSON document from a path through the Effect file system
// WHY: file problems (IOError) stay distinct from content problems (SyntaxError)
// FORMAT THEOREM: ∀p: parseFile(p) = Left(e) ∧ e._tag = "IOError" → parsing never started
// PURITY: SHELL
// EFFECT: Effect<Value, EngineError, FileSystem>
// INVARIANT: one stat and one read per call; no retries
// COMPLEXITY: O(n)

const reasonFromPlatform = (error: PlatformError): IoErrorReason => {
  if (error._tag === "SystemError") {
    if (error.reason === "NotFound") {
      return "NotFound"
    }
    if (error.reason === "PermissionDenied") {
      return "PermissionDenied"
    }
  }
  return "Unreadable"
}

export const mapFsError = (path: string) => (error: PlatformError): IoError => {
  const reason = reasonFromPlatform(error)
  return ioError(path, reason, reason === "NotFound" ? `File not found: ${path}` : error.message)
}

/**
 * Read a file as strict UTF-8 text.
 *
 * @param path - File path.
 * @returns Effect with the decoded text or an IoError.
 *
 * @pure false
 * @effect FileSystem
 * @invariant directories and other non-regular files fail with reason NotAFile
 */
export const readTextFile = (
  path: string
): Effect.Effect<string, IoError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const info = yield* _(fs.stat(path).pipe(Effect.mapError(mapFsError(path))))
    if (info.type !== "File") {
      return yield* _(Effect.fail(ioError(path, "NotAFile", `Not a regular file: ${path}`)))
    }
    const bytes = yield* _(fs.readFile(path).pipe(Effect.mapError(mapFsError(path))))
    const decoded = decodeUtf8(bytes, path)
    if (decoded._tag === "Left") {
      return yield* _(Effect.fail(decoded.left))
    }
    return decoded.right
  })

/**
 * Parse the JSON document stored at `path`.
 *
 * @param path - File path.
 * @param options - Parser limits forwarded to `parse`.
 * @returns Effect with the root Value, an IoError, or the parser's SyntaxError.
 *
 * @pure false
 * @effect FileSystem
 * @complexity O(n)
 */
export const parseFile = (
  path: string,
  options: ParseOptions = {}
): Effect.Effect<Value, EngineError, FileSystemService> =>
  Effect.gen(function*(_) {
    const text = yield* _(readTextFile(path))
    const parsed = parse(text, options)
    if (parsed._tag === "Left") {
      return yield* _(Effect.fail(parsed.left))
    }
    return parsed.right
  })
