import type { PlatformError } from "@effect/platform/Error"
import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { Console, Data, Effect, Exit, pipe, Ref, Stream } from "effect"

import type { DateRange, DayBatch, Sex } from "../core/domain.js"
import { enumerateDays } from "../core/enumerate.js"
import { formatPeselLines, logPartialFileRemovalFailed } from "../core/text.js"

export class OutputError extends Data.TaggedError("OutputError")<{
  readonly path: string
  readonly message: string
}> {}

export type WriteResult = {
  readonly count: number
  readonly bytes: number
}

export type BatchReporter = (batch: DayBatch) => Effect.Effect<void>

const toOutputError = (path: string) => (error: PlatformError): OutputError =>
  new OutputError({ path, message: error.message })

// CHANGE: expose the range enumeration as a stream of day batches
// WHY: pulling one day per chunk keeps memory bounded by 10,000 identifiers
// QUOTE(TZ): "the design must not require materializing the full result set in memory"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall r, s: collect(stream(r, s)) = enumerateDays(r, s)
// PURITY: SHELL
// EFFECT: Stream<DayBatch, never, never>
// INVARIANT: each run starts a fresh iterator
// COMPLEXITY: O(days · 10^4)/O(10^4)
export const dayBatches = (range: DateRange, sex?: Sex): Stream.Stream<DayBatch> =>
  Stream.suspend(() => Stream.fromIteratorSucceed(enumerateDays(range, sex), 1))

export const fileExists = (path: string): Effect.Effect<boolean, OutputError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) => pipe(fs.exists(path), Effect.mapError(toOutputError(path))))

export const ensureDirectory = (dir: string): Effect.Effect<void, OutputError, FileSystem.FileSystem> =>
  Effect.flatMap(
    FileSystem.FileSystem,
    (fs) => pipe(fs.makeDirectory(dir, { recursive: true }), Effect.mapError(toOutputError(dir)))
  )

export const partialPath = (path: string): string => `${path}.partial`

const removePartialFile = (fs: FileSystem.FileSystem, path: string): Effect.Effect<void> =>
  pipe(
    fs.exists(path),
    Effect.flatMap((exists) => exists ? fs.remove(path) : Effect.void),
    Effect.catchAll((error) => Effect.logWarning(logPartialFileRemovalFailed(path, error.message)))
  )

// CHANGE: stream a range of identifiers into a newline-terminated text file
// WHY: partitions reach tens of megabytes and must be written without buffering the whole range
// QUOTE(TZ): "Persisted format per partition: one identifier per line, newline-terminated, no header"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall r, s: lines(file) = enumerateRange(r.start, r.end, s)
// PURITY: SHELL
// EFFECT: Effect<WriteResult, OutputError, FileSystem | Path>
// INVARIANT: path only ever holds a complete partition; failure or interruption leaves neither file behind
// COMPLEXITY: O(days · 10^4)/O(10^4)
export const writePeselFile = (
  path: string,
  range: DateRange,
  sex: Sex | undefined,
  report: BatchReporter
): Effect.Effect<WriteResult, OutputError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const pathService = yield* _(Path.Path)
    yield* _(ensureDirectory(pathService.dirname(path)))
    const counter = yield* _(Ref.make(0))
    const staging = partialPath(path)
    yield* _(
      pipe(
        dayBatches(range, sex),
        Stream.tap((batch) =>
          pipe(
            Ref.update(counter, (count) => count + batch.pesels.length),
            Effect.zipRight(report(batch))
          )
        ),
        Stream.map((batch) => formatPeselLines(batch.pesels)),
        Stream.encodeText,
        Stream.run(fs.sink(staging, { flag: "w" })),
        Effect.zipRight(fs.rename(staging, path)),
        Effect.mapError(toOutputError(path)),
        Effect.onExit((exit) => Exit.isFailure(exit) ? removePartialFile(fs, staging) : Effect.void)
      )
    )
    const count = yield* _(Ref.get(counter))
    const info = yield* _(pipe(fs.stat(path), Effect.mapError(toOutputError(path))))
    return { count, bytes: Number(info.size) }
  })

// CHANGE: print a range of identifiers to standard output one day per write
// WHY: without an output file the identifiers go straight to the terminal or a pipe
// QUOTE(TZ): n/a
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall r, s: printed(r, s) = |enumerateRange(r.start, r.end, s)|
// PURITY: SHELL
// EFFECT: Effect<number, never, never>
// INVARIANT: identifiers keep enumeration order
// COMPLEXITY: O(days · 10^4)/O(10^4)
export const printPesels = (range: DateRange, sex?: Sex): Effect.Effect<number> =>
  pipe(
    dayBatches(range, sex),
    Stream.mapEffect((batch) => pipe(Console.log(batch.pesels.join("\n")), Effect.as(batch.pesels.length))),
    Stream.runFold(0, (total, count) => total + count)
  )
