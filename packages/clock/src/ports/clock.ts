import type { Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current wall-clock time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current wall-clock time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export type MonotonicSource = {
  /**
   * Milliseconds from an arbitrary origin that never goes backwards.
   *
   * @remarks
   * Only differences between two readings are meaningful. Use this for measuring
   * durations; wall-clock time can jump when the system clock is adjusted.
   */
  monotonicMs(): Milliseconds
}

export type Clock = TimeSource & MonotonicSource
