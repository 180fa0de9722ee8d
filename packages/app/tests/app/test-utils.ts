import { Effect, LogLevel } from "effect"
import { vi } from "vitest"

import type { Config } from "../../src/shell/config.js"

export const withLogSpy = Effect.acquireRelease(
  Effect.sync(() => vi.spyOn(console, "log").mockImplementation(() => {})),
  (spy) =>
    Effect.sync(() => {
      spy.mockRestore()
    })
)

export const withArgv = (nextArgv: ReadonlyArray<string>) =>
  Effect.acquireRelease(
    Effect.sync(() => {
      const previous = process.argv
      process.argv = [...nextArgv]
      return previous
    }),
    (previous) =>
      Effect.sync(() => {
        process.argv = previous
      })
  )

export const makeConfig = (overrides: Partial<Config> = {}): Config => ({
  outputDir: "generated_pesels",
  startYear: 1950,
  endYear: 2030,
  concurrency: 1,
  logLevel: LogLevel.Info,
  ...overrides
})

export const loggedLines = (spy: { readonly mock: { readonly calls: ReadonlyArray<ReadonlyArray<unknown>> } }) =>
  spy.mock.calls.map((call) => String(call[0]))
