import { normalizeDelayMs, type UIClock, type UIClockTimeoutHandle } from "./UIClock.js"

export class SystemClock implements UIClock {
  now(): number {
    return Date.now()
  }

  setTimeout(callback: () => void, delayMs: number): UIClockTimeoutHandle {
    return setTimeout(callback, normalizeDelayMs(delayMs))
  }

  clearTimeout(handle: UIClockTimeoutHandle | null | undefined): void {
    if (handle == null) return
    clearTimeout(handle)
  }
}

export const DEFAULT_SYSTEM_CLOCK = new SystemClock()
