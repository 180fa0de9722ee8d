import { Data } from "effect"

export class InvalidYearRange extends Data.TaggedError("InvalidYearRange")<{
  readonly startYear: number
  readonly endYear: number
  readonly message: string
}> {}

export class InvalidDate extends Data.TaggedError("InvalidDate")<{
  readonly year: number
  readonly month: number
  readonly day: number
  readonly message: string
}> {}

export class InvalidPeselFormat extends Data.TaggedError("InvalidPeselFormat")<{
  readonly value: string
  readonly message: string
}> {}

export class ChecksumMismatch extends Data.TaggedError("ChecksumMismatch")<{
  readonly value: string
  readonly expected: number
  readonly actual: number
  readonly message: string
}> {}

export type DecodeError = InvalidPeselFormat | ChecksumMismatch | InvalidDate

export type RangeError = InvalidYearRange | InvalidDate
