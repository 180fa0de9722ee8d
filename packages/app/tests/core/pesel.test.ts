import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"

import type { CalendarDate, Sex } from "../../src/core/domain.js"
import {
  centuryMonthOffset,
  checksumDigit,
  decodePesel,
  encodePesel,
  normalizeSequential,
  verifyChecksum
} from "../../src/core/pesel.js"
import { calendarDate } from "./property-helpers.js"

describe("encodePesel", () => {
  const cases: ReadonlyArray<
    {
      readonly label: string
      readonly date: CalendarDate
      readonly sequential: number
      readonly sex: Sex
      readonly expected: string
    }
  > = [
    { label: "1800s add 80 to the month", date: calendarDate(1800, 1, 1), sequential: 0, sex: "male", expected: "00810100019" },
    { label: "1900s keep the month", date: calendarDate(1900, 1, 1), sequential: 0, sex: "male", expected: "00010100015" },
    { label: "2000s add 20 to the month", date: calendarDate(2000, 1, 1), sequential: 0, sex: "male", expected: "00210100011" },
    { label: "2020 is year 20, month 21", date: calendarDate(2020, 1, 1), sequential: 0, sex: "male", expected: "20210100019" },
    { label: "2100s add 40 to the month", date: calendarDate(2100, 1, 1), sequential: 0, sex: "male", expected: "00410100017" },
    { label: "2200s add 60 to the month", date: calendarDate(2200, 1, 1), sequential: 0, sex: "male", expected: "00610100013" },
    { label: "female keeps an even number", date: calendarDate(1985, 7, 23), sequential: 4562, sex: "female", expected: "85072345628" },
    { label: "male bumps an even number up", date: calendarDate(1985, 7, 23), sequential: 4562, sex: "male", expected: "85072345635" },
    { label: "female at 9999 steps down to 9998", date: calendarDate(1999, 12, 31), sequential: 9999, sex: "female", expected: "99123199986" },
    { label: "male at 9999 stays in range", date: calendarDate(2299, 12, 31), sequential: 9999, sex: "male", expected: "99723199991" },
    { label: "leap day is encoded", date: calendarDate(2024, 2, 29), sequential: 123, sex: "male", expected: "24222901235" }
  ]

  for (const { date, expected, label, sequential, sex } of cases) {
    it(label, () => {
      expect(encodePesel(date, sequential, sex)).toBe(expected)
    })
  }

  it("clamps sequential numbers into 0..9999 before aligning parity", () => {
    const day = calendarDate(1999, 1, 1)
    expect(encodePesel(day, 12_000, "male")).toBe("99010199992")
    expect(encodePesel(day, -5, "female")).toBe("99010100002")
    expect(encodePesel(day, -5, "male")).toBe("99010100019")
  })
})

describe("normalizeSequential", () => {
  it("aligns parity with the requested sex", () => {
    expect(normalizeSequential(0, "female")).toBe(0)
    expect(normalizeSequential(0, "male")).toBe(1)
    expect(normalizeSequential(7, "male")).toBe(7)
    expect(normalizeSequential(7, "female")).toBe(6)
    expect(normalizeSequential(9999, "female")).toBe(9998)
    expect(normalizeSequential(Number.NaN, "female")).toBe(0)
  })
})

describe("centuryMonthOffset", () => {
  it("follows the century table", () => {
    expect([1800, 1899, 1900, 1999, 2000, 2099, 2100, 2199, 2200, 2299].map(centuryMonthOffset)).toEqual([
      80,
      80,
      0,
      0,
      20,
      20,
      40,
      40,
      60,
      60
    ])
  })
})

describe("verifyChecksum", () => {
  it("computes the weighted check digit", () => {
    expect(checksumDigit("8507234562")).toBe(8)
    expect(checksumDigit("0021010001")).toBe(1)
  })

  it("accepts an identifier whose last digit matches", () => {
    expect(verifyChecksum("85072345628")).toEqual(Either.right("85072345628"))
  })

  it("reports the expected and actual digit on mismatch", () => {
    const result = verifyChecksum("85072345620")
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("ChecksumMismatch")
      expect(result.left.message).toBe("Checksum mismatch for 85072345620: expected 8, found 0")
    }
  })

  for (const value of ["1234", "8507234562a", " 85072345628", "850723456281"]) {
    it(`rejects malformed input ${JSON.stringify(value)}`, () => {
      const result = verifyChecksum(value)
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("InvalidPeselFormat")
      }
    })
  }
})

describe("decodePesel", () => {
  it("recovers birth date, sequential number and sex", () => {
    expect(decodePesel("00210100011")).toEqual(
      Either.right({
        pesel: "00210100011",
        birthDate: calendarDate(2000, 1, 1),
        sequential: 1,
        sex: "male",
        checkDigit: 1
      })
    )
  })

  it("reads the 1800s from months 81..92", () => {
    const result = decodePesel("00810100019")
    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(result.right.birthDate).toEqual(calendarDate(1800, 1, 1))
    }
  })

  it("rejects a valid checksum over an impossible month", () => {
    const result = decodePesel("00130100010")
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("InvalidDate")
      expect(result.left.message).toBe("Invalid date 1900-13-1: month must be between 1 and 12")
    }
  })

  it("rejects a valid checksum over an impossible day", () => {
    const result = decodePesel("99023000003")
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe("Invalid date 1999-2-30: day must be between 1 and 28")
    }
  })

  it("checks the checksum before the date", () => {
    const result = decodePesel("00130100011")
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("ChecksumMismatch")
    }
  })
})
