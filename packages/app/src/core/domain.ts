import type { PeselNumber } from "./brand.js"

export type Sex = "male" | "female"

export const sexes: ReadonlyArray<Sex> = ["male", "female"]

export type CalendarDate = {
  readonly year: number
  readonly month: number
  readonly day: number
}

export type YearRange = {
  readonly startYear: number
  readonly endYear: number
}

export type DateRange = {
  readonly start: CalendarDate
  readonly end: CalendarDate
  readonly totalDays: number
}

export type RangeBound =
  | { readonly kind: "year"; readonly year: number }
  | { readonly kind: "date"; readonly date: CalendarDate }

export type DayBatch = {
  readonly date: CalendarDate
  readonly dayIndex: number
  readonly totalDays: number
  readonly pesels: ReadonlyArray<PeselNumber>
}

export type RangeProgress = {
  readonly daysProcessed: number
  readonly totalDays: number
  readonly percent: number
}

export type RangeObserver = {
  readonly onProgress: (progress: RangeProgress) => void
}

export type DecodedPesel = {
  readonly pesel: PeselNumber
  readonly birthDate: CalendarDate
  readonly sequential: number
  readonly sex: Sex
  readonly checkDigit: number
}

export type Partition = {
  readonly year: number
  readonly sex: Sex
  readonly fileName: string
  readonly range: DateRange
}

export type PartitionOutcome =
  | {
    readonly kind: "generated"
    readonly path: string
    readonly count: number
    readonly bytes: number
  }
  | {
    readonly kind: "skipped"
    readonly path: string
  }

export type BatchSummary = {
  readonly generated: number
  readonly skipped: number
  readonly bytes: number
}
