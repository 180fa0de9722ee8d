import { Console, Data, Effect, Either, pipe } from "effect"

import type { PeselNumber } from "../core/brand.js"
import { parseLocalDate } from "../core/calendar.js"
import type { InvalidDate } from "../core/errors.js"
import { decodePesel, encodePesel } from "../core/pesel.js"
import { formatDecodedPesel, formatInvalidPesel } from "../core/text.js"
import type { EncodeCommand, VerifyCommand } from "../shell/cli.js"

export class VerificationFailed extends Data.TaggedError("VerificationFailed")<{
  readonly invalid: number
  readonly total: number
  readonly message: string
}> {}

// CHANGE: encode a single identifier with an explicit sequential number
// WHY: direct lookups need one identifier, not a whole day of them
// QUOTE(TZ): "an optional sequential-number override (used only by direct single-identifier generation)"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall c: printed = encodePesel(c.date, c.sequential, c.sex)
// PURITY: SHELL
// EFFECT: Effect<PeselNumber, InvalidDate, never>
// INVARIANT: an impossible date is rejected before encoding
// COMPLEXITY: O(1)/O(1)
export const runEncode = (command: EncodeCommand): Effect.Effect<PeselNumber, InvalidDate> =>
  Effect.gen(function*(_) {
    const date = yield* _(parseLocalDate(command.date))
    const pesel = encodePesel(date, command.sequential, command.sex)
    yield* _(Console.log(pesel))
    return pesel
  })

const verifyOne = (value: string): Effect.Effect<boolean> =>
  Either.match(decodePesel(value), {
    onLeft: (error) => pipe(Console.log(formatInvalidPesel(value, error.message)), Effect.as(false)),
    onRight: (decoded) => pipe(Console.log(formatDecodedPesel(decoded)), Effect.as(true))
  })

// CHANGE: decode and verify supplied identifiers, one report line each
// WHY: scripts check stored identifiers and need a non-zero exit when any of them is wrong
// QUOTE(TZ): "a separate verification function, if implemented, fails with ChecksumMismatch"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall vs: succeed(verify(vs)) <-> forall v in vs: right(decodePesel(v))
// PURITY: SHELL
// EFFECT: Effect<void, VerificationFailed, never>
// INVARIANT: every value is reported, even after the first invalid one
// COMPLEXITY: O(n)/O(n)
export const runVerify = (command: VerifyCommand): Effect.Effect<void, VerificationFailed> =>
  Effect.gen(function*(_) {
    const results = yield* _(Effect.forEach(command.values, verifyOne))
    const invalid = results.filter((valid) => !valid).length
    if (invalid > 0) {
      return yield* _(
        new VerificationFailed({
          invalid,
          total: results.length,
          message: `${invalid} of ${results.length} PESEL numbers are invalid`
        })
      )
    }
  })
