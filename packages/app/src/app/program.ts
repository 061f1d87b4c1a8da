import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import { parseCliArgs, USAGE } from "../core/cli.js"
import type { CliArgs } from "../core/cli.js"
import { type AppError, formatAppError, ioError, usageError } from "../core/errors.js"
import { parse } from "../core/parse.js"
import { serialize } from "../core/serialize.js"
import type { Value } from "../core/value.js"
import { parseFile } from "../shell/load-file.js"
import { nodeIo, STDIN_LABEL } from "../shell/stdio.js"
import type { ProgramIo } from "../shell/stdio.js"

// CHANGE: orchestrate the json-engine CLI: pick an input, parse, pretty-print
// WHY: a single entrypoint maps every typed failure to stderr text and an exit code
// FORMAT THEOREM: ∀argv: run(argv).exitCode ∈ {0, 1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, never, FileSystem>
// INVARIANT: stdout receives the document only on success; stderr receives exactly one line on failure
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly exitCode: number
}

type InputSource =
  | { readonly _tag: "Stdin" }
  | { readonly _tag: "File"; readonly path: string }
  | { readonly _tag: "Literal"; readonly text: string }

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const isRegularFile = (
  path: string
): Effect.Effect<boolean, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(
      fs.stat(path).pipe(
        Effect.map((info) => info.type === "File"),
        Effect.orElseSucceed(() => false)
      )
    )
  })

const resolveSource = (
  target: string | undefined,
  io: ProgramIo
): Effect.Effect<InputSource, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (target === undefined) {
      if (io.stdinIsTty) {
        return yield* _(Effect.fail(usageError(USAGE)))
      }
      return { _tag: "Stdin" } as const
    }
    if (yield* _(isRegularFile(target))) {
      return { _tag: "File", path: target } as const
    }
    // A target that names a .json file but is not one is a missing file, not JSON text.
    if (target.endsWith(".json")) {
      return yield* _(Effect.fail(ioError(target, "NotFound", `File not found: ${target}`)))
    }
    return { _tag: "Literal", text: target } as const
  })

const sourceLabel = (source: InputSource): string =>
  Match.value(source).pipe(
    Match.tag("Stdin", () => STDIN_LABEL),
    Match.tag("File", (file) => file.path),
    Match.tag("Literal", () => "<argument>"),
    Match.exhaustive
  )

const loadValue = (
  source: InputSource,
  cli: CliArgs,
  io: ProgramIo
): Effect.Effect<Value, AppError, FileSystemService> => {
  const options = { maxDepth: cli.maxDepth }
  return Match.value(source).pipe(
    Match.tag("Stdin", () =>
      io.readStdin.pipe(Effect.flatMap((text) => fromEither(parse(text, options))))),
    Match.tag("File", (file) => parseFile(file.path, options)),
    Match.tag("Literal", (literal) => fromEither(parse(literal.text, options))),
    Match.exhaustive
  )
}

const renderFailure = (prefix: string, error: AppError): string =>
  error._tag === "UsageError" ? `${error.message}\n` : `${prefix}: ${formatAppError(error)}\n`

const reportFailure = (io: ProgramIo, prefix: string) => (error: AppError): Effect.Effect<ProgramResult> =>
  io.writeStderr(renderFailure(prefix, error)).pipe(Effect.as({ exitCode: 1 }))

const renderSource = (
  source: InputSource,
  cli: CliArgs,
  io: ProgramIo
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const value = yield* _(loadValue(source, cli, io))
    yield* _(Effect.logDebug(`parsed ${value._tag.toLowerCase()} document`))
    yield* _(io.writeStdout(`${serialize(value, { indent: cli.indent })}\n`))
    return { exitCode: 0 }
  }).pipe(Effect.annotateLogs("source", sourceLabel(source)))

/**
 * Run the CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @param io - Process streams; tests pass in-memory buffers.
 * @returns ProgramResult with the exit code; failures are already reported on stderr.
 *
 * @pure false
 * @effect FileSystem, stdio
 * @invariant exitCode is 0 exactly when a document was written to stdout
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>,
  io: ProgramIo = nodeIo
): Effect.Effect<ProgramResult, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const source = yield* _(resolveSource(cli.target, io))
    const rendered = renderSource(source, cli, io).pipe(
      Effect.catchAll(reportFailure(io, source._tag === "Stdin" ? "Error parsing stdin" : "Error"))
    )
    return yield* _(cli.verbose ? rendered.pipe(Logger.withMinimumLogLevel(LogLevel.Debug)) : rendered)
  }).pipe(Effect.catchAll(reportFailure(io, "Error")))
