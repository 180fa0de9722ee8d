import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Console, Effect, Logger, Match, pipe } from "effect"

import type { RangeError } from "../core/errors.js"
import { usage } from "../core/text.js"
import { type CliError, type Command, readCommand } from "../shell/cli.js"
import { type Config, type ConfigError, loadConfig } from "../shell/config.js"
import type { OutputError } from "../shell/output.js"
import { runBatch } from "./batch.js"
import { runGenerate } from "./generate.js"
import { runEncode, runVerify, type VerificationFailed } from "./lookup.js"

export type ProgramError = ConfigError | CliError | RangeError | OutputError | VerificationFailed

export const runCommand = (
  command: Command,
  config: Config
): Effect.Effect<void, RangeError | OutputError | VerificationFailed, FileSystem.FileSystem | Path.Path> =>
  Match.value(command).pipe(
    Match.when({ kind: "generate" }, (value) => Effect.asVoid(runGenerate(value))),
    Match.when({ kind: "batch" }, (value) => Effect.asVoid(runBatch(value, config))),
    Match.when({ kind: "encode" }, (value) => Effect.asVoid(runEncode(value))),
    Match.when({ kind: "verify" }, (value) => runVerify(value)),
    Match.when({ kind: "help" }, () => Console.log(usage())),
    Match.exhaustive
  )

// CHANGE: compose the generator program from configuration, argv and the selected command
// WHY: run every command through typed effects with one logging policy
// QUOTE(TZ): "CLI argument parsing, per-year file dispatch, existence checks, progress bars"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall argv, env: program = run(decode(argv), decode(env))
// PURITY: SHELL
// EFFECT: Effect<void, ProgramError, FileSystem | Path>
// INVARIANT: configuration and argv are decoded before any output is produced
// COMPLEXITY: O(n)/O(n)
export const program: Effect.Effect<void, ProgramError, FileSystem.FileSystem | Path.Path> = pipe(
  loadConfig,
  Effect.flatMap((config) =>
    pipe(
      readCommand,
      Effect.flatMap((command) => runCommand(command, config)),
      Logger.withMinimumLogLevel(config.logLevel)
    )
  )
)
