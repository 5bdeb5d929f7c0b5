import stripAnsi from "strip-ansi"
import type { RedrawRequest } from "./selectionController.js"

export interface SurfaceSize {
  readonly columns: number
  readonly rows: number
}

/** The one resource that owns the screen. Only the render gate writes to it. */
export interface RenderSurface extends SurfaceSize {
  write(chunk: string): void
}

export interface SceneLine {
  /** Zero-based screen row. */
  readonly row: number
  readonly text: string
}

export interface Scene {
  readonly lines: readonly string[]
  /** The lines a countdown update rewrites, or null when the scene has no countdown. */
  readonly countdown: readonly SceneLine[] | null
}

export type FlushOutcome = "full" | "countdown" | "tooSmall" | "none"

export const MIN_COLUMNS = 40
export const MIN_ROWS = 10

const CLEAR_SCREEN = "\u001b[2J"
const CLEAR_TO_EOL = "\u001b[K"
const moveTo = (row: number) => `\u001b[${row + 1};1H`

export const isSurfaceTooSmall = (size: SurfaceSize): boolean => size.columns < MIN_COLUMNS || size.rows < MIN_ROWS

export const tooSmallNotice = (size: SurfaceSize): string =>
  `Terminal too small: ${size.columns}x${size.rows}, need at least ${MIN_COLUMNS}x${MIN_ROWS}`

const fit = (line: string, width: number): string => {
  const plain = stripAnsi(line)
  if ([...plain].length <= width) return line
  return [...plain].slice(0, Math.max(0, width)).join("")
}

/**
 * Decides what, if anything, to draw. Full frames clear the screen; countdown frames only
 * rewrite the lines the scene marks as countdown lines.
 */
export class RenderGate {
  private dirty = true
  private resizePending = false
  private countdownPending = false
  private showingNotice = false

  constructor(private readonly surface: RenderSurface) {}

  get size(): SurfaceSize {
    return { columns: this.surface.columns, rows: this.surface.rows }
  }

  markDirty(): void {
    this.dirty = true
  }

  markResize(): void {
    this.resizePending = true
  }

  markCountdown(): void {
    this.countdownPending = true
  }

  request(redraw: RedrawRequest): void {
    if (redraw === "none") return
    this.dirty = true
  }

  isPending(): boolean {
    return this.dirty || this.resizePending || this.countdownPending
  }

  flush(build: (size: SurfaceSize) => Scene): FlushOutcome {
    const size = this.size
    const full = this.dirty || this.resizePending
    const countdown = this.countdownPending
    this.dirty = false
    this.resizePending = false
    this.countdownPending = false
    if (!full && !countdown) return "none"
    if (isSurfaceTooSmall(size)) {
      if (!full && this.showingNotice) return "none"
      this.surface.write(`${CLEAR_SCREEN}${moveTo(0)}${fit(tooSmallNotice(size), size.columns)}${CLEAR_TO_EOL}`)
      this.showingNotice = true
      return "tooSmall"
    }
    const scene = build(size)
    if (!full && !this.showingNotice && scene.countdown) {
      this.surface.write(scene.countdown.map((line) => `${moveTo(line.row)}${fit(line.text, size.columns)}${CLEAR_TO_EOL}`).join(""))
      return "countdown"
    }
    const body = scene.lines
      .slice(0, size.rows)
      .map((line, row) => `${moveTo(row)}${fit(line, size.columns)}${CLEAR_TO_EOL}`)
      .join("")
    this.surface.write(`${CLEAR_SCREEN}${body}`)
    this.showingNotice = false
    return "full"
  }
}
