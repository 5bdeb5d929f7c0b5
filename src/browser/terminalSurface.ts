import type { RenderSurface } from "./renderGate.js"

export const ALT_BUFFER_ENTER = "\u001b[?1049h"
export const ALT_BUFFER_EXIT = "\u001b[?1049l"
export const CURSOR_HIDE = "\u001b[?25l"
export const CURSOR_SHOW = "\u001b[?25h"

export interface TerminalOutputStream {
  readonly columns?: number
  readonly rows?: number
  write(chunk: string): unknown
}

export interface ExitHooks {
  on(event: string, listener: () => void): unknown
  off(event: string, listener: () => void): unknown
  exit(code: number): unknown
}

// 128 + signal number.
const SIGNAL_EXIT_CODES = { SIGTERM: 143, SIGHUP: 129 } as const
const SIGNALS = ["SIGTERM", "SIGHUP"] as const
const FALLBACK_COLUMNS = 80
const FALLBACK_ROWS = 24

/**
 * Owns the alternate screen while open. `close()` is idempotent and also runs on process
 * exit and on SIGTERM/SIGHUP, so the user's shell screen always comes back.
 */
export class TerminalSurface implements RenderSurface {
  private active = false

  constructor(
    private readonly output: TerminalOutputStream,
    private readonly hooks: ExitHooks | null = null,
  ) {}

  get columns(): number {
    return this.output.columns ?? FALLBACK_COLUMNS
  }

  get rows(): number {
    return this.output.rows ?? FALLBACK_ROWS
  }

  isActive(): boolean {
    return this.active
  }

  open(): void {
    if (this.active) return
    this.active = true
    this.output.write(`${ALT_BUFFER_ENTER}${CURSOR_HIDE}`)
    this.hooks?.on("exit", this.close)
    for (const signal of SIGNALS) this.hooks?.on(signal, this.signalListeners[signal])
  }

  write(chunk: string): void {
    if (!this.active) return
    this.output.write(chunk)
  }

  readonly close = (): void => {
    if (!this.active) return
    this.active = false
    this.hooks?.off("exit", this.close)
    for (const signal of SIGNALS) this.hooks?.off(signal, this.signalListeners[signal])
    try {
      this.output.write(`${CURSOR_SHOW}${ALT_BUFFER_EXIT}`)
    } catch {
      // The terminal may already be gone during exit.
    }
  }

  private readonly signalListeners = {
    SIGTERM: () => this.exitOnSignal("SIGTERM"),
    SIGHUP: () => this.exitOnSignal("SIGHUP"),
  }

  private exitOnSignal(signal: (typeof SIGNALS)[number]): void {
    this.close()
    this.hooks?.exit(SIGNAL_EXIT_CODES[signal])
  }
}
