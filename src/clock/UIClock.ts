export type UIClockTimeoutHandle = ReturnType<typeof setTimeout> | number

export interface UIClock {
  now(): number
  setTimeout(callback: () => void, delayMs: number): UIClockTimeoutHandle
  clearTimeout(handle: UIClockTimeoutHandle | null | undefined): void
}

export const normalizeDelayMs = (delayMs: number): number => {
  if (!Number.isFinite(delayMs)) return 0
  return Math.max(0, Math.floor(delayMs))
}
