import { FakeClock } from "../../adapters/fake-clock"
import type { MonotonicSource } from "../../ports/clock"
import { startStopwatch } from "../stopwatch"

describe("startStopwatch", () => {
  it("measures time elapsed since start", () => {
    const clock = new FakeClock(1_000)
    const watch = startStopwatch(clock)

    clock.advance(25)

    expect(watch.elapsedMs()).toBe(25)
  })

  it("floors fractional milliseconds", () => {
    const clock = new FakeClock(10.2)
    const watch = startStopwatch(clock)

    clock.set(13.9)

    expect(watch.elapsedMs()).toBe(3)
  })

  it("never reports a negative duration", () => {
    const readings = [100, 40]
    const source: MonotonicSource = { monotonicMs: () => readings.shift() ?? 0 }

    const watch = startStopwatch(source)

    expect(watch.elapsedMs()).toBe(0)
  })

  it("can be read repeatedly", () => {
    const clock = new FakeClock(0)
    const watch = startStopwatch(clock)

    clock.advance(5)
    expect(watch.elapsedMs()).toBe(5)

    clock.advance(5)
    expect(watch.elapsedMs()).toBe(10)
  })
})
