#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Logger } from "effect"

import { runCli } from "./program.js"

// CHANGE: wire the CLI program into the Node runtime
// WHY: execute effects with platform services; stdout carries only the document
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: log lines go to stderr
// COMPLEXITY: O(1)

const StderrLogger = Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.stringLogger))

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  if (result.exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = result.exitCode
      })
    )
  }
})

NodeRuntime.runMain(main.pipe(Effect.provide(NodeContext.layer), Effect.provide(StderrLogger)))
