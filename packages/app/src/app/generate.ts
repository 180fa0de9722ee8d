import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Effect } from "effect"

import type { DateRange, Sex } from "../core/domain.js"
import { parseRangeBound, resolveDateRange } from "../core/enumerate.js"
import type { RangeError } from "../core/errors.js"
import { logGeneratedCount, logGeneratingRange, logOutputExists } from "../core/text.js"
import type { GenerateCommand } from "../shell/cli.js"
import { fileExists, type OutputError, printPesels, writePeselFile } from "../shell/output.js"
import { makeProgressReporter } from "./progress.js"

export type GenerateResult =
  | { readonly kind: "printed"; readonly count: number }
  | { readonly kind: "written"; readonly path: string; readonly count: number; readonly bytes: number }
  | { readonly kind: "skipped"; readonly path: string }

export const resolveCommandRange = (command: GenerateCommand): Effect.Effect<DateRange, RangeError> =>
  Effect.gen(function*(_) {
    const start = yield* _(parseRangeBound(command.start))
    const end = command.end === undefined ? start : yield* _(parseRangeBound(command.end))
    return yield* _(resolveDateRange(start, end))
  })

const writeRange = (
  path: string,
  range: DateRange,
  sex: Sex | undefined,
  force: boolean
): Effect.Effect<GenerateResult, OutputError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function*(_) {
    const exists = yield* _(fileExists(path))
    if (exists && !force) {
      yield* _(Effect.logWarning(logOutputExists(path)))
      const skipped: GenerateResult = { kind: "skipped", path }
      return skipped
    }
    yield* _(Effect.logInfo(logGeneratingRange(range, sex)))
    const reporter = yield* _(makeProgressReporter(Effect.logInfo))
    const result = yield* _(writePeselFile(path, range, sex, reporter))
    yield* _(Effect.logInfo(logGeneratedCount(result.count, path)))
    const written: GenerateResult = { kind: "written", path, count: result.count, bytes: result.bytes }
    return written
  })

// CHANGE: generate one range either into a file or onto standard output
// WHY: a single range is either saved for later or piped into another tool
// QUOTE(TZ): "Generate PESEL numbers for a given year range"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall c: left(resolve(c)) -> nothing is written
// PURITY: SHELL
// EFFECT: Effect<GenerateResult, RangeError | OutputError, FileSystem | Path>
// INVARIANT: range errors surface before the first identifier is produced
// COMPLEXITY: O(days · 10^4)/O(10^4)
export const runGenerate = (
  command: GenerateCommand
): Effect.Effect<GenerateResult, RangeError | OutputError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function*(_) {
    const range = yield* _(resolveCommandRange(command))
    if (command.output === undefined) {
      yield* _(Effect.logDebug(logGeneratingRange(range, command.sex)))
      const count = yield* _(printPesels(range, command.sex))
      const printed: GenerateResult = { kind: "printed", count }
      return printed
    }
    return yield* _(writeRange(command.output, range, command.sex, command.force))
  })
