import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"

import { DEFAULT_MAX_DEPTH } from "./parse.js"

// CHANGE: decode json-engine argv deterministically
// WHY: keep flag decoding pure so the program only sees validated options
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.indent ∈ ℕ ∧ args.maxDepth ∈ ℕ⁺
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and extra positionals are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  /** JSON text or a file path; undefined means stdin. */
  readonly target: string | undefined
  readonly indent: number
  readonly maxDepth: number
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const USAGE = "Usage: json-engine [--indent <n> | --compact] [--max-depth <n>] [--verbose] <json_string_or_file_path>"

// Only long options are flags, so a literal such as "-1" stays a positional target.
const isFlag = (value: string): boolean => value.startsWith("--")

const NonNegativeIntFromString = Schema.NumberFromString.pipe(Schema.int(), Schema.nonNegative())
const PositiveIntFromString = Schema.NumberFromString.pipe(Schema.int(), Schema.positive())

const decodeInt = (
  flagName: string,
  schema: Schema.Schema<number, string>,
  value: string
): Either.Either<number, CliError> =>
  Either.mapLeft(
    Schema.decodeUnknownEither(schema)(value),
    (error) => cliError(`Invalid value for --${flagName}: ${TreeFormatter.formatErrorSync(error)}`)
  )

const defaultArgs: CliArgs = {
  target: undefined,
  indent: 2,
  maxDepth: DEFAULT_MAX_DEPTH,
  verbose: false
}

interface FlagStep {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<FlagStep, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseSwitch = (
  flagName: string,
  inlineValue: string | undefined,
  next: CliArgs
): Either.Either<FlagStep, CliError> =>
  inlineValue === undefined
    ? Either.right({ next, consumed: 1 })
    : Either.left(cliError(`--${flagName} does not take a value`))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<FlagStep, CliError>

const flagParsers: ReadonlyMap<string, FlagParser> = new Map<string, FlagParser>([
  ["compact", (current, inlineValue) => parseSwitch("compact", inlineValue, { ...current, indent: 0 })],
  ["verbose", (current, inlineValue) => parseSwitch("verbose", inlineValue, { ...current, verbose: true })],
  [
    "indent",
    (current, inlineValue, nextValue) =>
      parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
        Either.map(decodeInt("indent", NonNegativeIntFromString, value), (indent) => ({ ...args, indent })))
  ],
  [
    "max-depth",
    (current, inlineValue, nextValue) =>
      parseValueFlag("max-depth", current, inlineValue, nextValue, (args, value) =>
        Either.map(decodeInt("max-depth", PositiveIntFromString, value), (maxDepth) => ({ ...args, maxDepth })))
  ]
])

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<FlagStep, CliError> => {
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = flagParsers.get(name)
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

/**
 * Parse CLI arguments into typed options.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant target stays undefined when no positional argument is given
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  let args = defaultArgs
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      if (args.target !== undefined) {
        return Either.left(cliError(`Unexpected positional argument: ${current}`))
      }
      args = { ...args, target: current }
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}
