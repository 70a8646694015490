export { FakeClock, type FakeClockOptions } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { startStopwatch, type Stopwatch } from "./core/stopwatch"
export type { Clock, MonotonicSource, TimeSource } from "./ports/clock"
export type * from "./ports/time"
