import { StringDecoder } from "node:string_decoder"
import type { UIClock, UIClockTimeoutHandle } from "../clock/UIClock.js"
import { InputDeviceUnavailableError } from "../errors.js"
import { decodeKeys, trailingEscapeLength, type InputEvent } from "./keys.js"

/** How long a held ESC waits for the rest of its sequence before it counts as the Escape key. */
export const ESCAPE_TIMEOUT_MS = 25

/** The single bounded wait of every loop iteration. */
export interface InputSource {
  /** Resolves with the next queued event, or null once `timeoutMs` passes without one. */
  next(timeoutMs: number): Promise<InputEvent | null>
  /** Drops queued key events; pending resizes are kept. */
  flush(): void
}

type DataListener = (chunk: Buffer | string) => void

export interface TerminalInputStream {
  readonly isTTY?: boolean
  setRawMode?(mode: boolean): unknown
  on(event: "data", listener: DataListener): unknown
  off(event: "data", listener: DataListener): unknown
  resume(): unknown
  pause(): unknown
}

export interface ResizeSource {
  on(event: "resize", listener: () => void): unknown
  off(event: "resize", listener: () => void): unknown
}

export class TerminalInput implements InputSource {
  private readonly queue: InputEvent[] = []
  private waiter: ((event: InputEvent | null) => void) | null = null
  private timer: UIClockTimeoutHandle | null = null
  private readonly decoder = new StringDecoder("utf8")
  private pendingEscape = ""
  private escapeTimer: UIClockTimeoutHandle | null = null
  private closed = false

  constructor(
    private readonly stdin: TerminalInputStream,
    private readonly resizeSource: ResizeSource | null,
    private readonly clock: UIClock,
  ) {
    if (!stdin.isTTY || typeof stdin.setRawMode !== "function") {
      throw new InputDeviceUnavailableError()
    }
    stdin.setRawMode(true)
    stdin.on("data", this.onData)
    stdin.resume()
    resizeSource?.on("resize", this.onResize)
  }

  // Multibyte characters and escape sequences may be split across chunks.
  private readonly onData: DataListener = (chunk) => {
    const text = this.pendingEscape + (typeof chunk === "string" ? chunk : this.decoder.write(chunk))
    this.clearEscapeTimer()
    const held = trailingEscapeLength(text)
    this.pendingEscape = text.slice(text.length - held)
    for (const event of decodeKeys(text.slice(0, text.length - held))) this.push(event)
    if (held > 0) {
      this.escapeTimer = this.clock.setTimeout(this.onEscapeTimeout, ESCAPE_TIMEOUT_MS)
    }
  }

  private readonly onEscapeTimeout = (): void => {
    this.escapeTimer = null
    const held = this.pendingEscape
    this.pendingEscape = ""
    for (const event of decodeKeys(held)) this.push(event)
  }

  private clearEscapeTimer(): void {
    this.clock.clearTimeout(this.escapeTimer)
    this.escapeTimer = null
  }

  private readonly onResize = (): void => {
    this.push({ kind: "resize" })
  }

  private push(event: InputEvent): void {
    if (this.closed) return
    if (this.waiter) {
      this.settle(event)
      return
    }
    this.queue.push(event)
  }

  private settle(event: InputEvent | null): void {
    const waiter = this.waiter
    if (!waiter) return
    this.waiter = null
    this.clock.clearTimeout(this.timer)
    this.timer = null
    waiter(event)
  }

  pending(): number {
    return this.queue.length
  }

  next(timeoutMs: number): Promise<InputEvent | null> {
    const queued = this.queue.shift()
    if (queued) return Promise.resolve(queued)
    if (this.closed) return Promise.resolve(null)
    if (this.waiter) return Promise.reject(new Error("TerminalInput.next() is already waiting"))
    return new Promise((resolve) => {
      this.waiter = resolve
      this.timer = this.clock.setTimeout(() => this.settle(null), timeoutMs)
    })
  }

  flush(): void {
    const resizes = this.queue.filter((event) => event.kind === "resize")
    this.queue.length = 0
    this.queue.push(...resizes)
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.stdin.off("data", this.onData)
    this.resizeSource?.off("resize", this.onResize)
    this.stdin.setRawMode?.(false)
    this.stdin.pause()
    this.clearEscapeTimer()
    this.pendingEscape = ""
    this.queue.length = 0
    this.settle(null)
  }
}
