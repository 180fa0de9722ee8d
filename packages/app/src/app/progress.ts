import { Effect, pipe, Ref } from "effect"

import { nextProgress } from "../core/enumerate.js"
import { formatProgressBar } from "../core/text.js"
import type { BatchReporter } from "../shell/output.js"

// CHANGE: log a progress bar whenever the integer percentage of processed days moves
// WHY: observation stays outside the enumerator so the core never touches the console
// QUOTE(TZ): "an optional callback/observer invoked by the Range Enumerator's driving loop"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall days: |logs| <= 101
// PURITY: SHELL
// EFFECT: Effect<BatchReporter, never, never>
// INVARIANT: each reporter keeps its own last percentage
// COMPLEXITY: O(1)/O(1)
export const makeProgressReporter = (
  log: (message: string) => Effect.Effect<void>
): Effect.Effect<BatchReporter> =>
  pipe(
    Ref.make<number | null>(null),
    Effect.map((lastPercent): BatchReporter => (batch) =>
      pipe(
        Ref.modify(lastPercent, (last) => {
          const progress = nextProgress(last, batch.dayIndex, batch.totalDays)
          return [progress, progress === null ? last : progress.percent] as const
        }),
        Effect.flatMap((progress) => progress === null ? Effect.void : log(formatProgressBar(progress)))
      )
    )
  )
