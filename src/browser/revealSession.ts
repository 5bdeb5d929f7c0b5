import type { OtpProvider, OtpResult, OtpSource } from "../otp/provider.js"
import { describeError } from "../util/debugLog.js"

export type RevealCode =
  | { readonly ok: true; readonly result: OtpResult }
  | { readonly ok: false; readonly error: string }

export interface RevealSession {
  readonly entry: OtpSource
  readonly code: RevealCode
  /** Remaining time as of `lastTick`; 0 for counter entries and failures. */
  readonly msUntilNext: number
  readonly lastTick: number
}

export interface RevealTick {
  readonly session: RevealSession
  /** The code was recomputed for a new window. */
  readonly rolled: boolean
  /** The displayed whole seconds changed. */
  readonly secondsChanged: boolean
}

const computeCode = (entry: OtpSource, provider: OtpProvider, now: number): RevealCode => {
  try {
    return { ok: true, result: provider.compute(entry, now) }
  } catch (error) {
    return { ok: false, error: describeError(error) }
  }
}

const remainingOf = (code: RevealCode): number => (code.ok && code.result.kind === "time" ? Math.max(0, code.result.msUntilNext) : 0)

export const displayedSeconds = (msUntilNext: number): number => Math.floor(Math.max(0, msUntilNext) / 1000)

export const isCountingDown = (session: RevealSession): boolean => session.code.ok && session.code.result.kind === "time"

export const openRevealSession = (entry: OtpSource, provider: OtpProvider, now: number): RevealSession => {
  const code = computeCode(entry, provider, now)
  return { entry, code, msUntilNext: remainingOf(code), lastTick: now }
}

const codeText = (code: RevealCode): string | null => (code.ok ? code.result.code : null)

/**
 * Recomputes the code and remaining time at `now`. A new window shows up as a changed code or
 * a remaining time that went up; the countdown never goes negative.
 */
export const tickRevealSession = (session: RevealSession, provider: OtpProvider, now: number): RevealTick => {
  if (!isCountingDown(session)) {
    return { session, rolled: false, secondsChanged: false }
  }
  const code = computeCode(session.entry, provider, now)
  const remaining = remainingOf(code)
  const next: RevealSession = { ...session, code, msUntilNext: remaining, lastTick: now }
  const rolled = codeText(code) !== codeText(session.code) || remaining > session.msUntilNext
  return { session: next, rolled, secondsChanged: displayedSeconds(remaining) !== displayedSeconds(session.msUntilNext) }
}

export const sessionCodeText = (session: RevealSession): string => {
  if (!session.code.ok) return "Error"
  return session.code.result.code
}
