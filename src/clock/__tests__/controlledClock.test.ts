import { describe, expect, it } from "vitest"
import { ControlledClock } from "../controlledClock.js"
import { normalizeDelayMs } from "../UIClock.js"

describe("ControlledClock", () => {
  it("fires due timers in order while advancing", () => {
    const clock = new ControlledClock(1_000)
    const fired: Array<[string, number]> = []
    clock.setTimeout(() => fired.push(["late", clock.now()]), 300)
    clock.setTimeout(() => fired.push(["early", clock.now()]), 100)
    const cancelled = clock.setTimeout(() => fired.push(["cancelled", clock.now()]), 200)
    clock.clearTimeout(cancelled)
    expect(clock.pendingTimers()).toBe(2)
    expect(clock.advance(150)).toBe(1_150)
    expect(fired).toEqual([["early", 1_100]])
    clock.advance(1_000)
    expect(fired).toEqual([
      ["early", 1_100],
      ["late", 1_300],
    ])
    expect(clock.now()).toBe(2_150)
    expect(clock.pendingTimers()).toBe(0)
  })

  it("runs timers scheduled from a callback within the same advance", () => {
    const clock = new ControlledClock()
    const fired: number[] = []
    clock.setTimeout(() => {
      fired.push(clock.now())
      clock.setTimeout(() => fired.push(clock.now()), 50)
    }, 50)
    clock.advance(100)
    expect(fired).toEqual([50, 100])
  })

  it("can be moved backwards explicitly", () => {
    const clock = new ControlledClock(5_000)
    clock.setNow(4_000)
    expect(clock.now()).toBe(4_000)
    clock.setNow(Number.NaN)
    expect(clock.now()).toBe(4_000)
  })
})

describe("normalizeDelayMs", () => {
  it("floors and clamps delays", () => {
    expect(normalizeDelayMs(12.7)).toBe(12)
    expect(normalizeDelayMs(-5)).toBe(0)
    expect(normalizeDelayMs(Number.POSITIVE_INFINITY)).toBe(0)
  })
})
