import * as S from "@effect/schema/Schema"
import { Data, Effect, Either, pipe } from "effect"

export class CliError extends Data.TaggedError("CliError")<{
  readonly message: string
}> {}

const sexSchema = S.Literal("male", "female")

const integerSchema = S.NumberFromString.pipe(S.int())

const generateSchema = S.Struct({
  kind: S.Literal("generate"),
  start: S.NonEmptyString,
  end: S.optional(S.NonEmptyString),
  sex: S.optional(sexSchema),
  output: S.optional(S.NonEmptyString),
  force: S.Boolean
})

const batchSchema = S.Struct({
  kind: S.Literal("batch"),
  from: S.optional(integerSchema),
  to: S.optional(integerSchema),
  dir: S.optional(S.NonEmptyString),
  sex: S.optional(sexSchema),
  concurrency: S.optional(integerSchema.pipe(S.between(1, 64)))
})

const encodeSchema = S.Struct({
  kind: S.Literal("encode"),
  date: S.NonEmptyString,
  sequential: integerSchema.pipe(S.between(0, 9999)),
  sex: sexSchema
})

const verifySchema = S.Struct({
  kind: S.Literal("verify"),
  values: S.NonEmptyArray(S.String)
})

const helpSchema = S.Struct({
  kind: S.Literal("help")
})

const commandSchema = S.Union(generateSchema, batchSchema, encodeSchema, verifySchema, helpSchema)

export type Command = S.Schema.Type<typeof commandSchema>
export type GenerateCommand = S.Schema.Type<typeof generateSchema>
export type BatchCommand = S.Schema.Type<typeof batchSchema>
export type EncodeCommand = S.Schema.Type<typeof encodeSchema>
export type VerifyCommand = S.Schema.Type<typeof verifySchema>

type OptionValue = string | boolean

type ParsedArgv = {
  readonly positionals: ReadonlyArray<string>
  readonly options: Readonly<Record<string, OptionValue>>
}

type RawValue = OptionValue | ReadonlyArray<string> | undefined

type RawCommand = Readonly<Record<string, RawValue>>

const aliases: ReadonlyMap<string, string> = new Map([
  ["-s", "sex"],
  ["-o", "output"],
  ["-f", "force"],
  ["-h", "help"]
])

const booleanOptions: ReadonlySet<string> = new Set(["force", "help"])

const maxPositionals: ReadonlyMap<string, number> = new Map([
  ["generate", 2],
  ["batch", 0],
  ["encode", 2],
  ["verify", Number.POSITIVE_INFINITY]
])

const optionName = (token: string): { readonly name: string; readonly inline: string | undefined } | null => {
  const alias = aliases.get(token)
  if (alias !== undefined) {
    return { name: alias, inline: undefined }
  }
  if (!token.startsWith("--") || token.length === 2) {
    return null
  }
  const body = token.slice(2)
  const separator = body.indexOf("=")
  return separator === -1
    ? { name: body, inline: undefined }
    : { name: body.slice(0, separator), inline: body.slice(separator + 1) }
}

// CHANGE: split argv into positionals and named options
// WHY: flags may appear anywhere after the command, with or without "=" values
// QUOTE(TZ): "optional sex filter, both sexes when absent"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall argv: right(split(argv)) -> every value option has a value
// PURITY: CORE
// INVARIANT: tokens after "--" are always positionals
// COMPLEXITY: O(n)/O(n)
const splitArgv = (argv: ReadonlyArray<string>): Either.Either<ParsedArgv, CliError> => {
  const positionals: Array<string> = []
  let options: Record<string, OptionValue> = {}
  let index = 0
  while (index < argv.length) {
    const token = argv[index] ?? ""
    index += 1
    if (token === "--") {
      for (const rest of argv.slice(index)) {
        positionals.push(rest)
      }
      break
    }
    const option = optionName(token)
    if (option === null) {
      positionals.push(token)
      continue
    }
    if (booleanOptions.has(option.name)) {
      if (option.inline !== undefined) {
        return Either.left(new CliError({ message: `Option --${option.name} does not take a value` }))
      }
      options = { ...options, [option.name]: true }
      continue
    }
    const value = option.inline ?? argv[index]
    if (value === undefined) {
      return Either.left(new CliError({ message: `Missing value for --${option.name}` }))
    }
    if (option.inline === undefined) {
      index += 1
    }
    options = { ...options, [option.name]: value }
  }
  return Either.right({ positionals, options })
}

const toRawCommand = (parsed: ParsedArgv): Either.Either<RawCommand, CliError> => {
  const [command, ...rest] = parsed.positionals
  if (command === undefined || command === "help" || parsed.options["help"] === true) {
    return Either.right({ kind: "help" })
  }
  const limit = maxPositionals.get(command)
  if (limit === undefined) {
    return Either.left(new CliError({ message: `Unknown command "${command}"` }))
  }
  if (rest.length > limit) {
    return Either.left(new CliError({ message: `Unexpected argument "${rest[limit] ?? ""}" for ${command}` }))
  }
  const { options } = parsed
  if (command === "generate") {
    return Either.right({ ...options, kind: command, start: rest[0], end: rest[1], force: options["force"] === true })
  }
  if (command === "encode") {
    return Either.right({ ...options, kind: command, date: rest[0], sequential: rest[1] })
  }
  if (command === "verify") {
    return Either.right({ ...options, kind: command, values: rest })
  }
  return Either.right({ ...options, kind: command })
}

const decodeCommand = S.decodeUnknown(commandSchema, { onExcessProperty: "error" })

// CHANGE: decode command-line arguments into a typed command
// WHY: keep boundary data validated before entering the domain
// QUOTE(TZ): "CLI argument parsing"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall argv: parse(argv) = c -> c.kind in {generate, batch, encode, verify, help}
// PURITY: SHELL
// EFFECT: Effect<Command, CliError, never>
// INVARIANT: unknown options are rejected rather than ignored
// COMPLEXITY: O(n)/O(n)
export const parseCommand = (argv: ReadonlyArray<string>): Effect.Effect<Command, CliError> =>
  pipe(
    splitArgv(argv),
    Either.flatMap(toRawCommand),
    Effect.flatMap((raw) =>
      pipe(
        decodeCommand(raw),
        Effect.mapError((error) => new CliError({ message: error.message }))
      )
    )
  )

export const readCommand = pipe(
  Effect.sync(() => process.argv.slice(2)),
  Effect.flatMap(parseCommand)
)
