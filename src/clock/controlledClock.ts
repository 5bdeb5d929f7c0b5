import { normalizeDelayMs, type UIClock, type UIClockTimeoutHandle } from "./UIClock.js"

interface ScheduledTimeout {
  dueAt: number
  callback: () => void
}

/** Manually advanced clock for deterministic countdown and polling tests. */
export class ControlledClock implements UIClock {
  private nowMs: number
  private nextTimerId = 1
  private readonly timers = new Map<number, ScheduledTimeout>()

  constructor(seedNowMs = 0) {
    this.nowMs = Number.isFinite(seedNowMs) ? Math.floor(seedNowMs) : 0
  }

  now(): number {
    return this.nowMs
  }

  setNow(nowMs: number): void {
    if (!Number.isFinite(nowMs)) return
    this.nowMs = Math.floor(nowMs)
  }

  pendingTimers(): number {
    return this.timers.size
  }

  advance(stepMs: number): number {
    const target = this.nowMs + normalizeDelayMs(stepMs)
    while (true) {
      let nextId: number | null = null
      let nextDueAt = Number.POSITIVE_INFINITY
      for (const [id, timer] of this.timers) {
        if (timer.dueAt < nextDueAt) {
          nextDueAt = timer.dueAt
          nextId = id
        }
      }
      if (nextId == null || nextDueAt > target) break
      const timer = this.timers.get(nextId)
      this.timers.delete(nextId)
      this.nowMs = nextDueAt
      timer?.callback()
    }
    this.nowMs = target
    return this.nowMs
  }

  setTimeout(callback: () => void, delayMs: number): UIClockTimeoutHandle {
    const id = this.nextTimerId++
    this.timers.set(id, { dueAt: this.nowMs + normalizeDelayMs(delayMs), callback })
    return id
  }

  clearTimeout(handle: UIClockTimeoutHandle | null | undefined): void {
    if (typeof handle !== "number") return
    this.timers.delete(handle)
  }
}
