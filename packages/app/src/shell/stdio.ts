import * as Effect from "effect/Effect"
import { buffer } from "node:stream/consumers"

import type { IoError } from "../core/errors.js"
import { ioError } from "../core/errors.js"
import { decodeUtf8 } from "../core/utf8.js"

// CHANGE: isolate process stdio behind a record the program receives
// WHY: the CLI reads stdin and writes two streams; tests swap in buffers
// PURITY: SHELL
// EFFECT: Effect<string, IoError> for stdin, Effect<void> for writes
// INVARIANT: stdin bytes are decoded with the same strict UTF-8 rules as files
// COMPLEXITY: O(n)

export const STDIN_LABEL = "<stdin>"

export interface ProgramIo {
  readonly stdinIsTty: boolean
  readonly readStdin: Effect.Effect<string, IoError>
  readonly writeStdout: (payload: string) => Effect.Effect<void>
  readonly writeStderr: (payload: string) => Effect.Effect<void>
}

const readProcessStdin: Effect.Effect<string, IoError> = Effect.tryPromise({
  try: () => buffer(process.stdin),
  catch: (error) => ioError(STDIN_LABEL, "Unreadable", `Cannot read ${STDIN_LABEL}: ${String(error)}`)
}).pipe(
  Effect.flatMap((bytes): Effect.Effect<string, IoError> => {
    const decoded = decodeUtf8(bytes, STDIN_LABEL)
    return decoded._tag === "Left" ? Effect.fail(decoded.left) : Effect.succeed(decoded.right)
  })
)

export const nodeIo: ProgramIo = {
  stdinIsTty: process.stdin.isTTY === true,
  readStdin: readProcessStdin,
  writeStdout: (payload) =>
    Effect.sync(() => {
      process.stdout.write(payload)
    }),
  writeStderr: (payload) =>
    Effect.sync(() => {
      process.stderr.write(payload)
    })
}
