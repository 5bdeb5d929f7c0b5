import type { UIClock } from "../clock/UIClock.js"
import type { OtpProvider } from "../otp/provider.js"
import type { DebugLog } from "../util/debugLog.js"
import type { EntryIndex } from "../vault/entryIndex.js"
import { buildRevealScene } from "./frames.js"
import type { RenderGate } from "./renderGate.js"
import { openRevealSession, sessionCodeText, tickRevealSession, type RevealSession } from "./revealSession.js"
import { transition, type ControllerContext, type SelectionState } from "./selectionController.js"
import type { InputSource } from "./terminalInput.js"
import type { BrowserTheme } from "./theme.js"

export interface RevealLoopDeps {
  readonly index: EntryIndex
  readonly input: InputSource
  readonly gate: RenderGate
  readonly clock: UIClock
  readonly provider: OtpProvider
  readonly theme: BrowserTheme
  readonly vaultLabel: string
  readonly revealPollMs: number
  readonly lowTimeSeconds: number
  readonly context: () => ControllerContext
  /** Absent when no clipboard tool is configured. */
  readonly copy?: (text: string) => Promise<boolean>
  readonly log: DebugLog
}

export interface RevealLoopExit {
  readonly state: SelectionState
  readonly quit: boolean
}

const copyNotice = async (deps: RevealLoopDeps, session: RevealSession): Promise<string> => {
  if (!deps.copy) return "No clipboard tool configured"
  if (!session.code.ok) return "Nothing to copy"
  const copied = await deps.copy(sessionCodeText(session))
  deps.log("clipboard_copy", { entry: session.entry.uuid, ok: copied })
  return copied ? "Copied to clipboard" : "Copy failed"
}

/**
 * Runs while the state is in reveal mode. Each iteration ticks the countdown, flushes the
 * render gate and then waits at most `revealPollMs` for input, so countdown and keys share
 * the one bounded wait.
 */
export const runRevealLoop = async (deps: RevealLoopDeps, initial: SelectionState): Promise<RevealLoopExit> => {
  let state = initial
  const entry = state.revealedUuid ? deps.index.byUuid(state.revealedUuid) : undefined
  if (!entry) {
    deps.log("reveal_missing_entry", { uuid: state.revealedUuid })
    const back = transition(state, { kind: "escape" }, deps.context())
    deps.gate.request(back.redraw)
    return { state: back.state, quit: false }
  }
  let session = openRevealSession(entry, deps.provider, deps.clock.now())
  let notice: string | null = null
  deps.log("reveal_open", { entry: entry.uuid, ok: session.code.ok })
  deps.gate.markDirty()
  while (true) {
    const tick = tickRevealSession(session, deps.provider, deps.clock.now())
    session = tick.session
    if (tick.rolled) deps.log("reveal_rollover", { entry: entry.uuid })
    if (tick.rolled || tick.secondsChanged) deps.gate.markCountdown()
    const current = session
    deps.gate.flush((size) =>
      buildRevealScene(
        { entry, session: current, theme: deps.theme, vaultLabel: deps.vaultLabel, lowTimeSeconds: deps.lowTimeSeconds, notice },
        size,
      ),
    )

    const event = await deps.input.next(deps.revealPollMs)
    if (event === null) continue
    if (event.kind === "resize") deps.gate.markResize()
    const result = transition(state, event, deps.context())
    state = result.state
    deps.gate.request(result.redraw)
    if (result.quit) return { state, quit: true }
    for (const effect of result.effects) {
      if (effect.kind !== "copy") continue
      notice = await copyNotice(deps, session)
      deps.gate.markDirty()
    }
    if (state.mode !== "reveal") {
      deps.log("reveal_close", { entry: entry.uuid })
      return { state, quit: false }
    }
  }
}
