import type { MonotonicSource } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export interface Stopwatch {
  /** Whole milliseconds since the stopwatch started; never negative. */
  elapsedMs(): Milliseconds
}

export function startStopwatch(source: MonotonicSource): Stopwatch {
  const startedAt = source.monotonicMs()

  return {
    elapsedMs: () => Math.max(0, Math.floor(source.monotonicMs() - startedAt)),
  }
}
