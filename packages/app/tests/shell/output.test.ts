import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Exit, pipe } from "effect"

import type { DayBatch } from "../../src/core/domain.js"
import { resolveDateRange } from "../../src/core/enumerate.js"
import { partialPath, writePeselFile } from "../../src/shell/output.js"

const january1999 = resolveDateRange({ kind: "date", date: { year: 1999, month: 1, day: 1 } }, {
  kind: "date",
  date: { year: 1999, month: 1, day: 31 }
})

const stopAtDay = (day: number, stop: Effect.Effect<never>) => (batch: DayBatch): Effect.Effect<void> =>
  batch.dayIndex === day ? stop : Effect.void

describe("writePeselFile", () => {
  it.scoped("moves the finished partition into place and leaves no staging file", () =>
    pipe(
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        const path = yield* _(Path.Path)
        const dir = yield* _(fs.makeTempDirectoryScoped())
        const output = path.join(dir, "1999_male.txt")
        const range = yield* _(january1999)
        const result = yield* _(writePeselFile(output, range, "male", () => Effect.void))
        expect(result).toEqual({ count: 31 * 5000, bytes: 31 * 5000 * 12 })
        expect(yield* _(fs.readDirectory(dir))).toEqual(["1999_male.txt"])
      }),
      Effect.provide(NodeContext.layer)
    ))

  const stops: ReadonlyArray<{ readonly label: string; readonly stop: Effect.Effect<never> }> = [
    { label: "interrupted", stop: Effect.interrupt },
    { label: "killed by a defect", stop: Effect.dieMessage("disk went away") }
  ]

  for (const { label, stop } of stops) {
    it.scoped(`removes the partial file when ${label} partway through`, () =>
      pipe(
        Effect.gen(function*(_) {
          const fs = yield* _(FileSystem.FileSystem)
          const path = yield* _(Path.Path)
          const dir = yield* _(fs.makeTempDirectoryScoped())
          const output = path.join(dir, "1999_male.txt")
          const range = yield* _(january1999)
          const exit = yield* _(Effect.exit(writePeselFile(output, range, "male", stopAtDay(3, stop))))
          expect(Exit.isFailure(exit)).toBe(true)
          expect(yield* _(fs.exists(output))).toBe(false)
          expect(yield* _(fs.exists(partialPath(output)))).toBe(false)
        }),
        Effect.provide(NodeContext.layer)
      ))
  }

  it.scoped("removes the partial file when the finished partition cannot be moved into place", () =>
    pipe(
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        const path = yield* _(Path.Path)
        const dir = yield* _(fs.makeTempDirectoryScoped())
        const output = path.join(dir, "1999_male.txt")
        yield* _(fs.makeDirectory(output))
        const range = yield* _(january1999)
        const error = yield* _(Effect.flip(writePeselFile(output, range, "male", () => Effect.void)))
        expect(error).toMatchObject({ _tag: "OutputError", path: output })
        expect(yield* _(fs.exists(partialPath(output)))).toBe(false)
        expect((yield* _(fs.stat(output))).type).toBe("Directory")
      }),
      Effect.provide(NodeContext.layer)
    ))
})
