import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"
import fc from "fast-check"

import {
  daysBetweenInclusive,
  daysInMonth,
  formatLocalDate,
  isLeapYear,
  makeCalendarDate,
  nextDay,
  parseLocalDate
} from "../../src/core/calendar.js"
import { calendarDate, calendarDateArb } from "./property-helpers.js"

describe("calendar", () => {
  it("applies the Gregorian leap-year rule", () => {
    expect(isLeapYear(1900)).toBe(false)
    expect(isLeapYear(2000)).toBe(true)
    expect(isLeapYear(2024)).toBe(true)
    expect(isLeapYear(2100)).toBe(false)
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2023, 2)).toBe(28)
    expect(daysInMonth(1999, 4)).toBe(30)
  })

  it("rejects impossible days instead of clamping them", () => {
    const result = makeCalendarDate(2023, 2, 29)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("InvalidDate")
      expect(result.left.message).toBe("Invalid date 2023-2-29: day must be between 1 and 28")
    }
  })

  it("rejects years outside the encodable range", () => {
    const result = makeCalendarDate(1799, 12, 31)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe("Invalid date 1799-12-31: year must be between 1800 and 2299")
    }
  })

  it("steps across month, year and leap-day boundaries", () => {
    expect(nextDay(calendarDate(1999, 12, 31))).toEqual(calendarDate(2000, 1, 1))
    expect(nextDay(calendarDate(2024, 2, 28))).toEqual(calendarDate(2024, 2, 29))
    expect(nextDay(calendarDate(2023, 2, 28))).toEqual(calendarDate(2023, 3, 1))
    expect(nextDay(calendarDate(1999, 4, 30))).toEqual(calendarDate(1999, 5, 1))
  })

  it("counts days inclusively", () => {
    expect(daysBetweenInclusive(calendarDate(1999, 1, 1), calendarDate(1999, 12, 31))).toBe(365)
    expect(daysBetweenInclusive(calendarDate(2000, 1, 1), calendarDate(2000, 12, 31))).toBe(366)
    expect(daysBetweenInclusive(calendarDate(1999, 1, 1), calendarDate(1999, 1, 1))).toBe(1)
    expect(daysBetweenInclusive(calendarDate(1999, 1, 2), calendarDate(1999, 1, 1))).toBe(0)
  })

  it("parses only YYYY-MM-DD", () => {
    expect(parseLocalDate("1999-01-01")).toEqual(Either.right(calendarDate(1999, 1, 1)))
    const result = parseLocalDate("1999-1-1")
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe("Invalid date \"1999-1-1\": expected YYYY-MM-DD")
    }
  })

  it("parses what it formats", () => {
    fc.assert(
      fc.property(calendarDateArb, (date) => {
        expect(parseLocalDate(formatLocalDate(date))).toEqual(Either.right(date))
      })
    )
  })

  it("agrees with the platform calendar on the successor day", () => {
    fc.assert(
      fc.property(calendarDateArb, (date) => {
        const next = new Date(Date.UTC(date.year, date.month - 1, date.day + 1))
        expect(nextDay(date)).toEqual(calendarDate(next.getUTCFullYear(), next.getUTCMonth() + 1, next.getUTCDate()))
      })
    )
  })
})
