import { Match } from "effect"

import type { PeselNumber } from "./brand.js"
import { formatLocalDate } from "./calendar.js"
import type { BatchSummary, DateRange, DecodedPesel, PartitionOutcome, RangeProgress, Sex } from "./domain.js"

export const defaultBarWidth = 50

const bytesPerMegabyte = 1024 * 1024
const bytesPerGigabyte = 1024 * 1024 * 1024

// CHANGE: render progress as a fixed-width bar with a percentage
// WHY: long ranges take minutes per partition and need a visible heartbeat
// QUOTE(TZ): "Progress reporting is a side observation keyed on days processed / total days"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall p, w: |bar(p, w)| = w + |prefix| + |suffix|
// PURITY: CORE
// INVARIANT: filled cells never exceed width
// COMPLEXITY: O(w)/O(w)
export const formatProgressBar = (progress: RangeProgress, width: number = defaultBarWidth): string => {
  const ratio = progress.totalDays <= 0 ? 1 : progress.daysProcessed / progress.totalDays
  const filled = Math.min(width, Math.floor(width * ratio))
  return `Progress: [${"=".repeat(filled)}${"-".repeat(width - filled)}] ${progress.percent}%`
}

export const formatMegabytes = (bytes: number): string => `${(bytes / bytesPerMegabyte).toFixed(1)} MB`

export const formatGigabytes = (bytes: number): string => `${(bytes / bytesPerGigabyte).toFixed(1)} GB`

/**
 * Persisted partition format: one identifier per line, every line newline-terminated.
 */
export const formatPeselLines = (pesels: ReadonlyArray<PeselNumber>): string =>
  pesels.length === 0 ? "" : `${pesels.join("\n")}\n`

const describeSex = (sex?: Sex): string => sex === undefined ? "all" : sex

export const formatDateRange = (range: DateRange): string =>
  `${formatLocalDate(range.start)}..${formatLocalDate(range.end)}`

export const logGeneratingRange = (range: DateRange, sex?: Sex): string =>
  `Generating PESEL numbers for ${formatDateRange(range)} (${range.totalDays} days, sex=${describeSex(sex)})`

export const logGeneratedCount = (count: number, path: string): string =>
  `Generated ${count} PESEL numbers and saved to ${path}`

export const logOutputExists = (path: string): string => `File ${path} already exists, skipping (use --force to overwrite)`

export const logStorageDirectory = (dir: string): string => `Storing generated files in: ${dir}`

export const logPartitionStarted = (path: string, sex: Sex): string => `Generating ${sex} PESELs into ${path}`

export const logPartitionOutcome = (outcome: PartitionOutcome): string =>
  Match.value(outcome).pipe(
    Match.when({ kind: "generated" }, (value) => `Generated ${value.path} (${formatMegabytes(value.bytes)})`),
    Match.when({ kind: "skipped" }, (value) => `File ${value.path} already exists, skipping...`),
    Match.exhaustive
  )

export const formatBatchSummary = (summary: BatchSummary): ReadonlyArray<string> => [
  "Generation complete!",
  `Total files generated: ${summary.generated}`,
  `Files skipped: ${summary.skipped}`,
  `Total size: ${formatGigabytes(summary.bytes)}`
]

export const logPartialFileRemovalFailed = (path: string, reason: string): string =>
  `Could not remove partial file ${path}: ${reason}`

// CHANGE: describe a decoded identifier on one line
// WHY: verification output must be greppable and stable for scripts
// QUOTE(TZ): n/a
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall d: line(d) starts with "valid " + d.pesel
// PURITY: CORE
// INVARIANT: sequential number is rendered with four digits
// COMPLEXITY: O(1)/O(1)
export const formatDecodedPesel = (decoded: DecodedPesel): string =>
  [
    `valid ${decoded.pesel}`,
    `birthDate=${formatLocalDate(decoded.birthDate)}`,
    `sex=${decoded.sex}`,
    `sequential=${decoded.sequential.toString().padStart(4, "0")}`
  ].join(" ")

export const formatInvalidPesel = (value: string, reason: string): string => `invalid ${value}: ${reason}`

export const usage = (): string =>
  [
    "Usage:",
    "  pesel-range generate <start> [end] [--sex|-s male|female] [--output|-o FILE] [--force|-f]",
    "  pesel-range batch [--from YEAR] [--to YEAR] [--dir DIR] [--sex|-s male|female] [--concurrency N]",
    "  pesel-range encode <date> <sequential> --sex|-s male|female",
    "  pesel-range verify <pesel>...",
    "  pesel-range help",
    "",
    "<start> and [end] are a year (1999) or a date (1999-01-01) between 1800 and 2299."
  ].join("\n")
