import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export type FakeClockOptions = {
  /**
   * Advance time by this much after every `monotonicMs()` reading, so code that
   * measures its own duration sees a predictable, non-zero result.
   * @default 0
   */
  step?: Milliseconds
}

/**
 * Manually driven clock. Wall-clock and monotonic readings share one timeline.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private readonly step: Milliseconds

  constructor(start: Milliseconds = 0, options: FakeClockOptions = {}) {
    this.time = start
    this.step = options.step ?? 0
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  monotonicMs(): Milliseconds {
    const reading = this.time
    this.time += this.step

    return reading
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }
}
