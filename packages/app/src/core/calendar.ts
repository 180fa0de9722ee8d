import { Either, Order } from "effect"

import type { LocalDateString } from "./brand.js"
import { LocalDateString as LocalDate } from "./brand.js"
import type { CalendarDate } from "./domain.js"
import { InvalidDate } from "./errors.js"

export const minYear = 1800
export const maxYear = 2299

const millisPerDay = 24 * 60 * 60 * 1000

const monthLengths: ReadonlyArray<number> = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

const isoDatePattern = /^(\d{4})-(\d{2})-(\d{2})$/

export const isLeapYear = (year: number): boolean => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0

export const daysInMonth = (year: number, month: number): number =>
  month === 2 && isLeapYear(year) ? 29 : monthLengths[month - 1] ?? 0

export const calendarDateOrder: Order.Order<CalendarDate> = Order.struct({
  year: Order.number,
  month: Order.number,
  day: Order.number
})

const describeInvalid = (year: number, month: number, day: number): string | null => {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return "date parts must be integers"
  }
  if (year < minYear || year > maxYear) {
    return `year must be between ${minYear} and ${maxYear}`
  }
  if (month < 1 || month > 12) {
    return "month must be between 1 and 12"
  }
  const length = daysInMonth(year, month)
  if (day < 1 || day > length) {
    return `day must be between 1 and ${length}`
  }
  return null
}

// CHANGE: construct a calendar date, rejecting impossible days instead of clamping them
// WHY: every identifier embeds its birth date, so an impossible date must never reach the encoder
// QUOTE(TZ): "a caller-constructed date with an impossible day-of-month is rejected at construction time"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall y,m,d: right(make(y,m,d)) -> 1 <= d <= daysInMonth(y,m)
// PURITY: CORE
// INVARIANT: returned dates lie within [minYear, maxYear]
// COMPLEXITY: O(1)/O(1)
export const makeCalendarDate = (
  year: number,
  month: number,
  day: number
): Either.Either<CalendarDate, InvalidDate> => {
  const reason = describeInvalid(year, month, day)
  return reason === null
    ? Either.right({ year, month, day })
    : Either.left(
      new InvalidDate({
        year,
        month,
        day,
        message: `Invalid date ${year}-${month}-${day}: ${reason}`
      })
    )
}

/**
 * Successor day in the proleptic Gregorian calendar.
 *
 * @pure true
 * @complexity O(1) time / O(1) space
 */
export const nextDay = (date: CalendarDate): CalendarDate => {
  if (date.day < daysInMonth(date.year, date.month)) {
    return { ...date, day: date.day + 1 }
  }
  if (date.month < 12) {
    return { year: date.year, month: date.month + 1, day: 1 }
  }
  return { year: date.year + 1, month: 1, day: 1 }
}

export const startOfYear = (year: number): CalendarDate => ({ year, month: 1, day: 1 })

export const endOfYear = (year: number): CalendarDate => ({ year, month: 12, day: 31 })

const toEpochDay = (date: CalendarDate): number => Date.UTC(date.year, date.month - 1, date.day) / millisPerDay

export const daysBetweenInclusive = (start: CalendarDate, end: CalendarDate): number =>
  Math.max(0, toEpochDay(end) - toEpochDay(start) + 1)

export const formatLocalDate = (date: CalendarDate): LocalDateString => {
  const year = date.year.toString().padStart(4, "0")
  const month = date.month.toString().padStart(2, "0")
  const day = date.day.toString().padStart(2, "0")
  return LocalDate(`${year}-${month}-${day}`)
}

// CHANGE: parse YYYY-MM-DD text into a validated calendar date
// WHY: command-line range bounds may name a single day instead of a whole year
// QUOTE(TZ): "an explicit (startDate, endDate) pair"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall d: parse(format(d)) = right(d)
// PURITY: CORE
// INVARIANT: text that does not match the pattern is an InvalidDate with zeroed parts
// COMPLEXITY: O(1)/O(1)
export const parseLocalDate = (text: string): Either.Either<CalendarDate, InvalidDate> => {
  const match = isoDatePattern.exec(text.trim())
  if (!match) {
    return Either.left(
      new InvalidDate({
        year: 0,
        month: 0,
        day: 0,
        message: `Invalid date "${text}": expected YYYY-MM-DD`
      })
    )
  }
  const [, year = "0", month = "0", day = "0"] = match
  return makeCalendarDate(Number(year), Number(month), Number(day))
}
