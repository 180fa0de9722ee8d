import { Either, pipe } from "effect"

import { PeselNumber } from "./brand.js"
import { makeCalendarDate } from "./calendar.js"
import type { CalendarDate, DecodedPesel, Sex } from "./domain.js"
import { ChecksumMismatch, type DecodeError, type InvalidDate, InvalidPeselFormat } from "./errors.js"

export const maxSequential = 9999

const checksumWeights: ReadonlyArray<number> = [1, 3, 7, 9, 1, 3, 7, 9, 1, 3]

const peselPattern = /^\d{11}$/

type CenturyOffset = {
  readonly firstYear: number
  readonly offset: number
}

const centuryOffsets: ReadonlyArray<CenturyOffset> = [
  { firstYear: 1800, offset: 80 },
  { firstYear: 1900, offset: 0 },
  { firstYear: 2000, offset: 20 },
  { firstYear: 2100, offset: 40 },
  { firstYear: 2200, offset: 60 }
]

const pad = (value: number, width: number): string => value.toString().padStart(width, "0")

export const sexForSequential = (sequential: number): Sex => sequential % 2 === 1 ? "male" : "female"

// CHANGE: map a year to the addend the month field carries for its century
// WHY: the date field only holds a two-digit year, the century lives in the month
// QUOTE(TZ): "1800–1899 +80, 1900–1999 +0, 2000–2099 +20, 2100–2199 +40, 2200–2299 +60"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall y in [1800, 2299]: offset(y) = table(floor(y / 100))
// PURITY: CORE
// INVARIANT: years outside the table map to 0 (the encoder does not re-validate)
// COMPLEXITY: O(1)/O(1)
export const centuryMonthOffset = (year: number): number =>
  centuryOffsets.find((entry) => year >= entry.firstYear && year < entry.firstYear + 100)?.offset ?? 0

export const encodeDate = (date: CalendarDate): string =>
  `${pad(date.year % 100, 2)}${pad(date.month + centuryMonthOffset(date.year), 2)}${pad(date.day, 2)}`

// CHANGE: clamp a sequential number and align its parity with the requested sex
// WHY: the last digit of the four-digit block encodes sex (odd = male, even = female)
// QUOTE(TZ): "adjust by +1 when male is requested, −1 when female is requested"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall n, s: normalize(n, s) mod 2 = (s = male ? 1 : 0)
// PURITY: CORE
// INVARIANT: result stays within [0, 9999]
// COMPLEXITY: O(1)/O(1)
export const normalizeSequential = (sequential: number, sex: Sex): number => {
  const clamped = Number.isNaN(sequential) ? 0 : Math.min(maxSequential, Math.max(0, Math.trunc(sequential)))
  if (sexForSequential(clamped) === sex) {
    return clamped
  }
  return sex === "male" ? clamped + 1 : clamped - 1
}

export const encodeSequentialAndSex = (sequential: number, sex: Sex): string =>
  pad(normalizeSequential(sequential, sex), 4)

/**
 * Check digit over the first ten digits of an identifier.
 *
 * @param base - Ten ASCII digits; positions beyond the weights are ignored.
 * @returns `(10 - (Σ digit·weight mod 10)) mod 10`
 *
 * @pure true
 * @complexity O(1) time / O(1) space
 */
export const checksumDigit = (base: string): number => {
  let sum = 0
  for (const [index, weight] of checksumWeights.entries()) {
    sum += Number(base.charAt(index)) * weight
  }
  return (10 - (sum % 10)) % 10
}

// CHANGE: build a complete identifier from a birth date, a sequential number and a sex
// WHY: the encoder is the single producer of identifiers for ranges and single lookups alike
// QUOTE(TZ): "Encode(date: CalendarDate, seq: int, isMale: bool) -> PeselIdentifier"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall d, n, s: checksumDigit(take10(encode(d, n, s))) = digit11(encode(d, n, s))
// PURITY: CORE
// INVARIANT: output is exactly 11 ASCII digits for every year in [1800, 2299]
// COMPLEXITY: O(1)/O(1)
export const encodePesel = (date: CalendarDate, sequential: number, sex: Sex): PeselNumber => {
  const base = `${encodeDate(date)}${encodeSequentialAndSex(sequential, sex)}`
  return PeselNumber(`${base}${checksumDigit(base)}`)
}

// CHANGE: re-derive the check digit of a supplied identifier
// WHY: supplied identifiers are only trusted after their trailing digit matches the weighted sum
// QUOTE(TZ): "fails with ChecksumMismatch when re-deriving the checksum of a supplied 11-digit string disagrees"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall v: right(verify(v)) <-> matches(v, /^\d{11}$/) ∧ checksumDigit(v) = digit11(v)
// PURITY: CORE
// INVARIANT: surrounding whitespace is not accepted
// COMPLEXITY: O(1)/O(1)
export const verifyChecksum = (
  value: string
): Either.Either<PeselNumber, InvalidPeselFormat | ChecksumMismatch> => {
  if (!peselPattern.test(value)) {
    return Either.left(
      new InvalidPeselFormat({
        value,
        message: `Invalid PESEL "${value}": expected exactly 11 digits`
      })
    )
  }
  const expected = checksumDigit(value.slice(0, 10))
  const actual = Number(value.charAt(10))
  return expected === actual
    ? Either.right(PeselNumber(value))
    : Either.left(
      new ChecksumMismatch({
        value,
        expected,
        actual,
        message: `Checksum mismatch for ${value}: expected ${expected}, found ${actual}`
      })
    )
}

const decodeBirthDate = (pesel: PeselNumber): Either.Either<CalendarDate, InvalidDate> => {
  const yy = Number(pesel.slice(0, 2))
  const encodedMonth = Number(pesel.slice(2, 4))
  const day = Number(pesel.slice(4, 6))
  const offset = Math.floor(encodedMonth / 20) * 20
  const century = centuryOffsets.find((entry) => entry.offset === offset)?.firstYear ?? 1900
  return makeCalendarDate(century + yy, encodedMonth - offset, day)
}

// CHANGE: decode a supplied identifier back into birth date, sequential number and sex
// WHY: verification reports what an identifier encodes, not only whether its checksum holds
// QUOTE(TZ): "the PESEL encoding/decoding algorithm"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall d, n, s: decode(encode(d, n, s)) = { d, normalize(n, s), s }
// PURITY: CORE
// INVARIANT: checksum is verified before the date is interpreted
// COMPLEXITY: O(1)/O(1)
export const decodePesel = (value: string): Either.Either<DecodedPesel, DecodeError> =>
  pipe(
    verifyChecksum(value),
    Either.flatMap((pesel) =>
      pipe(
        decodeBirthDate(pesel),
        Either.map((birthDate): DecodedPesel => {
          const sequential = Number(pesel.slice(6, 10))
          return {
            pesel,
            birthDate,
            sequential,
            sex: sexForSequential(sequential),
            checkDigit: Number(pesel.charAt(10))
          }
        })
      )
    )
  )
