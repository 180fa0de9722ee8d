import { describe, expect, it } from "@effect/vitest"

import { sexes } from "../../src/core/domain.js"
import { partitionFileName, planPartitions, summarizeOutcomes } from "../../src/core/partition.js"

describe("planPartitions", () => {
  it("plans one file per year and sex, year first", () => {
    const partitions = planPartitions({ startYear: 1999, endYear: 2000 }, sexes)
    expect(partitions.map((partition) => partition.fileName)).toEqual([
      "1999_male.txt",
      "1999_female.txt",
      "2000_male.txt",
      "2000_female.txt"
    ])
    expect(partitions.map((partition) => partition.range.totalDays)).toEqual([365, 365, 366, 366])
  })

  it("honours a single-sex selection", () => {
    const partitions = planPartitions({ startYear: 2299, endYear: 2299 }, ["female"])
    expect(partitions).toEqual([
      {
        year: 2299,
        sex: "female",
        fileName: partitionFileName(2299, "female"),
        range: {
          start: { year: 2299, month: 1, day: 1 },
          end: { year: 2299, month: 12, day: 31 },
          totalDays: 365
        }
      }
    ])
  })
})

describe("summarizeOutcomes", () => {
  it("counts generated and skipped partitions and sums written bytes", () => {
    expect(
      summarizeOutcomes([
        { kind: "generated", path: "a", count: 10, bytes: 120 },
        { kind: "skipped", path: "b" },
        { kind: "generated", path: "c", count: 5, bytes: 60 }
      ])
    ).toEqual({ generated: 2, skipped: 1, bytes: 180 })
    expect(summarizeOutcomes([])).toEqual({ generated: 0, skipped: 0, bytes: 0 })
  })
})
