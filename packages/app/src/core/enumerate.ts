import { Either, Order, pipe } from "effect"

import type { PeselNumber } from "./brand.js"
import {
  calendarDateOrder,
  daysBetweenInclusive,
  endOfYear,
  maxYear,
  minYear,
  nextDay,
  parseLocalDate,
  startOfYear
} from "./calendar.js"
import type {
  CalendarDate,
  DateRange,
  DayBatch,
  RangeBound,
  RangeObserver,
  RangeProgress,
  Sex,
  YearRange
} from "./domain.js"
import { InvalidYearRange, type RangeError } from "./errors.js"
import { encodePesel, maxSequential, sexForSequential } from "./pesel.js"

const yearPattern = /^\d{4}$/

const describeYearRange = (startYear: number, endYear: number): string | null => {
  if (!Number.isInteger(startYear) || !Number.isInteger(endYear)) {
    return "years must be integers"
  }
  if (startYear < minYear || endYear > maxYear) {
    return `Year range must be between ${minYear} and ${maxYear}`
  }
  if (startYear > endYear) {
    return "Start year must be less than or equal to end year"
  }
  return null
}

const checkYears = <A>(startYear: number, endYear: number, value: A): Either.Either<A, InvalidYearRange> => {
  const reason = describeYearRange(startYear, endYear)
  return reason === null
    ? Either.right(value)
    : Either.left(new InvalidYearRange({ startYear, endYear, message: reason }))
}

// CHANGE: validate a closed year interval before any enumeration starts
// WHY: bad bounds must fail fast so that no partial output is ever produced
// QUOTE(TZ): "start year outside [1800, 2299], end year outside the same bound, or start > end"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall a, b: right(validate(a, b)) <-> 1800 <= a <= b <= 2299
// PURITY: CORE
// INVARIANT: a missing end year equals the start year
// COMPLEXITY: O(1)/O(1)
export const validateYearRange = (
  startYear: number,
  endYear: number = startYear
): Either.Either<YearRange, InvalidYearRange> => checkYears(startYear, endYear, { startYear, endYear })

export const validateDateRange = (
  start: CalendarDate,
  end: CalendarDate
): Either.Either<DateRange, InvalidYearRange> =>
  pipe(
    checkYears(start.year, end.year, { start, end, totalDays: daysBetweenInclusive(start, end) }),
    Either.flatMap((range) =>
      Order.greaterThan(calendarDateOrder)(start, end)
        ? Either.left(
          new InvalidYearRange({
            startYear: start.year,
            endYear: end.year,
            message: "Start date must be on or before end date"
          })
        )
        : Either.right(range)
    )
  )

export const yearRangeToDateRange = (range: YearRange): DateRange => {
  const start = startOfYear(range.startYear)
  const end = endOfYear(range.endYear)
  return { start, end, totalDays: daysBetweenInclusive(start, end) }
}

export const parseRangeBound = (text: string): Either.Either<RangeBound, RangeError> => {
  const trimmed = text.trim()
  if (yearPattern.test(trimmed)) {
    const year = Number(trimmed)
    return pipe(validateYearRange(year), Either.map((): RangeBound => ({ kind: "year", year })))
  }
  return pipe(parseLocalDate(trimmed), Either.map((date): RangeBound => ({ kind: "date", date })))
}

const boundStart = (bound: RangeBound): CalendarDate => bound.kind === "year" ? startOfYear(bound.year) : bound.date

const boundEnd = (bound: RangeBound): CalendarDate => bound.kind === "year" ? endOfYear(bound.year) : bound.date

// CHANGE: turn command-line range bounds into a validated inclusive date range
// WHY: a year as start means January 1, a year as end means December 31, a date means itself
// QUOTE(TZ): "a closed date interval expressed as (startYear, endYear) ... or an explicit (startDate, endDate) pair"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall s, e: right(resolve(s, e)) -> range.start <= range.end
// PURITY: CORE
// INVARIANT: a missing end bound equals the start bound
// COMPLEXITY: O(1)/O(1)
export const resolveDateRange = (
  start: RangeBound,
  end: RangeBound = start
): Either.Either<DateRange, InvalidYearRange> => validateDateRange(boundStart(start), boundEnd(end))

export const identifiersPerDay = (sex?: Sex): number => sex === undefined ? maxSequential + 1 : (maxSequential + 1) / 2

export const progressPercent = (daysProcessed: number, totalDays: number): number =>
  totalDays <= 0 ? 100 : Math.floor((daysProcessed * 100) / totalDays)

/**
 * Progress after a completed day, or `null` while the integer percentage is unchanged.
 *
 * @pure true
 * @invariant result !== null ⇒ result.percent !== lastPercent
 */
export const nextProgress = (
  lastPercent: number | null,
  daysProcessed: number,
  totalDays: number
): RangeProgress | null => {
  const percent = progressPercent(daysProcessed, totalDays)
  return percent === lastPercent ? null : { daysProcessed, totalDays, percent }
}

const matchesSex = (sequential: number, sex?: Sex): boolean =>
  sex === undefined || sexForSequential(sequential) === sex

// CHANGE: lazily produce every identifier of one day
// WHY: sex follows the sequential number's own parity, so each number is used exactly once
// QUOTE(TZ): "emit one identifier per sequential number, with sex determined by that number's own parity"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall d, s: |day(d, s)| = s = undefined ? 10000 : 5000
// PURITY: CORE
// INVARIANT: sequential numbers are visited in ascending order
// COMPLEXITY: O(10^4)/O(1)
export const peselsForDay = function*(date: CalendarDate, sex?: Sex): Generator<PeselNumber, void> {
  for (let sequential = 0; sequential <= maxSequential; sequential += 1) {
    if (matchesSex(sequential, sex)) {
      yield encodePesel(date, sequential, sexForSequential(sequential))
    }
  }
}

const daysOf = function*(range: DateRange): Generator<CalendarDate, void> {
  let current = range.start
  while (Order.lessThanOrEqualTo(calendarDateOrder)(current, range.end)) {
    yield current
    current = nextDay(current)
  }
}

// CHANGE: group the range enumeration into per-day batches
// WHY: file writers stream one bounded day at a time instead of holding the whole range
// QUOTE(TZ): "Emission is lazy/streamable"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall r, s: flatten(days(r, s)) = range(r, s)
// PURITY: CORE
// INVARIANT: dayIndex runs 1..totalDays without gaps
// COMPLEXITY: O(days · 10^4)/O(10^4)
export const enumerateDays = function*(range: DateRange, sex?: Sex): Generator<DayBatch, void> {
  let dayIndex = 0
  for (const date of daysOf(range)) {
    dayIndex += 1
    yield {
      date,
      dayIndex,
      totalDays: range.totalDays,
      pesels: Array.from(peselsForDay(date, sex))
    }
  }
}

// CHANGE: enumerate every identifier of an inclusive date range in date then sequence order
// WHY: the exhaustive space must be reproducible and consumable without materializing it
// QUOTE(TZ): "EnumerateRange(startDate, endDate, sexFilter: optional SexFlag) -> lazy sequence of PeselIdentifier"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall a, b, s: enumerate(a, b, s) = enumerate(a, b, s) (restartable, deterministic)
// PURITY: CORE
// INVARIANT: observer calls never change emission order or count
// COMPLEXITY: O(days · 10^4)/O(1)
export const enumerateRange = function*(
  start: CalendarDate,
  end: CalendarDate,
  sex?: Sex,
  observer?: RangeObserver
): Generator<PeselNumber, void> {
  const totalDays = daysBetweenInclusive(start, end)
  let daysProcessed = 0
  let lastPercent: number | null = null
  for (const date of daysOf({ start, end, totalDays })) {
    yield* peselsForDay(date, sex)
    daysProcessed += 1
    const progress = nextProgress(lastPercent, daysProcessed, totalDays)
    if (progress !== null) {
      lastPercent = progress.percent
      observer?.onProgress(progress)
    }
  }
}

export const enumerateYears = (
  startYear: number,
  endYear: number,
  sex?: Sex,
  observer?: RangeObserver
): Either.Either<Generator<PeselNumber, void>, InvalidYearRange> =>
  pipe(
    validateYearRange(startYear, endYear),
    Either.map(yearRangeToDateRange),
    Either.map((range) => enumerateRange(range.start, range.end, sex, observer))
  )
