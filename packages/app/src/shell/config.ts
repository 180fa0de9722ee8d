import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import dotenv from "dotenv"
import { Data, Effect, LogLevel, pipe } from "effect"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
}> {}

const yearSchema = S.NumberFromString.pipe(S.int(), S.between(1800, 2299))

const logLevelSchema = S.Literal("All", "Trace", "Debug", "Info", "Warning", "Error", "Fatal", "None")

const envSchema = S.Struct({
  PESEL_OUTPUT_DIR: S.optionalWith(S.NonEmptyString, { default: () => "generated_pesels" }),
  PESEL_START_YEAR: S.optionalWith(yearSchema, { default: () => 1950 }),
  PESEL_END_YEAR: S.optionalWith(yearSchema, { default: () => 2030 }),
  PESEL_CONCURRENCY: S.optionalWith(S.NumberFromString.pipe(S.int(), S.between(1, 64)), { default: () => 1 }),
  PESEL_LOG_LEVEL: S.optionalWith(logLevelSchema, { default: () => "Info" as const })
})

type Env = S.Schema.Type<typeof envSchema>

export type Config = {
  readonly outputDir: string
  readonly startYear: number
  readonly endYear: number
  readonly concurrency: number
  readonly logLevel: LogLevel.LogLevel
}

const toConfigError = (
  error: ConfigError | Error | string
): ConfigError =>
  error instanceof ConfigError
    ? error
    : new ConfigError({
      message: error instanceof Error ? error.message : error
    })

// CHANGE: load an optional .env file before reading the environment
// WHY: batch defaults are tuned per machine without editing code
// QUOTE(TZ): n/a
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall paths: first existing .env wins, otherwise dotenv defaults apply
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError, FileSystem | Path>
// INVARIANT: variables already present in process.env are never overridden
// COMPLEXITY: O(1)/O(1)
const loadEnv = pipe(
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const modulePath = yield* _(path.fromFileUrl(new URL(import.meta.url)))
    const moduleDir = path.dirname(modulePath)
    const cwd = process.cwd()
    const candidateEnvPaths = [
      path.resolve(cwd, ".env"),
      path.resolve(cwd, "../.env"),
      path.resolve(cwd, "../../.env"),
      path.resolve(moduleDir, ".env"),
      path.resolve(moduleDir, "../.env"),
      path.resolve(moduleDir, "../../.env")
    ]

    let resolvedEnvPath: string | null = null
    for (const envPath of candidateEnvPaths) {
      const exists = yield* _(fs.exists(envPath))
      if (exists) {
        resolvedEnvPath = envPath
        break
      }
    }

    if (resolvedEnvPath) {
      dotenv.config({ path: resolvedEnvPath })
    } else {
      dotenv.config()
    }
  }),
  Effect.mapError((error) => toConfigError(error instanceof Error ? error : String(error))),
  Effect.asVoid
)

// CHANGE: decode generator configuration from environment variables
// WHY: keep boundary data validated before entering the domain
// QUOTE(TZ): "Generate PESELs for years 1950-2030 with separate files for each year and sex"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall env: decode(env) = config -> 1800 <= config.startYear, config.endYear <= 2299
// PURITY: SHELL
// EFFECT: Effect<Config, ConfigError, FileSystem | Path>
// INVARIANT: concurrency is an integer in [1, 64]
// COMPLEXITY: O(1)/O(1)
export const loadConfig = pipe(
  loadEnv,
  Effect.flatMap(() => Effect.sync(() => process.env)),
  Effect.flatMap(S.decodeUnknown(envSchema)),
  Effect.map((env: Env): Config => ({
    outputDir: env.PESEL_OUTPUT_DIR,
    startYear: env.PESEL_START_YEAR,
    endYear: env.PESEL_END_YEAR,
    concurrency: env.PESEL_CONCURRENCY,
    logLevel: LogLevel.fromLiteral(env.PESEL_LOG_LEVEL)
  })),
  Effect.mapError((error) => toConfigError(error instanceof Error ? error : String(error)))
)
