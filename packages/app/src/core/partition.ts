import type { BatchSummary, Partition, PartitionOutcome, Sex, YearRange } from "./domain.js"
import { yearRangeToDateRange } from "./enumerate.js"

export const partitionFileName = (year: number, sex: Sex): string => `${year}_${sex}.txt`

// CHANGE: plan one output partition per year and sex
// WHY: multi-gigabyte ranges are persisted as independent per-year/per-sex files
// QUOTE(TZ): "partitioning work per (year, sex) into separate persisted files"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall r, S: |plan(r, S)| = (r.endYear - r.startYear + 1) · |S|
// PURITY: CORE
// INVARIANT: partitions are ordered by year, then by the order of the given sexes
// COMPLEXITY: O(years · |S|)/O(years · |S|)
export const planPartitions = (range: YearRange, sexes: ReadonlyArray<Sex>): ReadonlyArray<Partition> => {
  const partitions: Array<Partition> = []
  for (let year = range.startYear; year <= range.endYear; year += 1) {
    for (const sex of sexes) {
      partitions.push({
        year,
        sex,
        fileName: partitionFileName(year, sex),
        range: yearRangeToDateRange({ startYear: year, endYear: year })
      })
    }
  }
  return partitions
}

export const summarizeOutcomes = (outcomes: ReadonlyArray<PartitionOutcome>): BatchSummary => {
  let summary: BatchSummary = { generated: 0, skipped: 0, bytes: 0 }
  for (const outcome of outcomes) {
    summary = outcome.kind === "generated"
      ? { ...summary, generated: summary.generated + 1, bytes: summary.bytes + outcome.bytes }
      : { ...summary, skipped: summary.skipped + 1 }
  }
  return summary
}
