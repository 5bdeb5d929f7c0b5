import { appendFileSync } from "node:fs"

const DEBUG_LOG_ENV = "OTPVIEW_DEBUG_LOG"

export type DebugFields = Record<string, string | number | boolean | null | undefined>

export type DebugLog = (event: string, fields?: DebugFields) => void

export interface DebugLogOptions {
  /** Target file; defaults to `$OTPVIEW_DEBUG_LOG`. Logging is off when neither is set. */
  readonly filePath?: string | null
  readonly now?: () => number
}

// The TUI owns stdout and stderr while it runs, so debug output only ever goes to a file.
export const createDebugLog = (scope: string, options: DebugLogOptions = {}): DebugLog => {
  const target = options.filePath === undefined ? process.env[DEBUG_LOG_ENV]?.trim() : options.filePath
  if (!target) return () => {}
  const now = options.now ?? Date.now
  return (event, fields = {}) => {
    const line = JSON.stringify({ ts: new Date(now()).toISOString(), scope, event, ...fields })
    try {
      appendFileSync(target, `${line}\n`, "utf8")
    } catch {
      // Best-effort: a broken log file is ignored.
    }
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error)
