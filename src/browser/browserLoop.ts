import type { UIClock } from "../clock/UIClock.js"
import type { OtpProvider } from "../otp/provider.js"
import { createDebugLog, type DebugLog } from "../util/debugLog.js"
import type { EntryIndex } from "../vault/entryIndex.js"
import { buildGroupScene, buildListScene } from "./frames.js"
import type { RenderGate, Scene, SurfaceSize } from "./renderGate.js"
import { runRevealLoop } from "./revealLoop.js"
import {
  createInitialState,
  settle,
  transition,
  type ControllerContext,
  type InitialSelection,
  type SelectionState,
} from "./selectionController.js"
import type { InputSource } from "./terminalInput.js"
import type { BrowserTheme } from "./theme.js"
import { listViewportHeight } from "./viewport.js"

export interface BrowserSettings {
  readonly listPollMs: number
  readonly revealPollMs: number
  readonly lowTimeSeconds: number
}

export interface BrowserDeps {
  readonly index: EntryIndex
  readonly input: InputSource
  readonly gate: RenderGate
  readonly clock: UIClock
  readonly provider: OtpProvider
  readonly theme: BrowserTheme
  readonly settings: BrowserSettings
  readonly vaultLabel: string
  readonly initial?: InitialSelection
  readonly copy?: (text: string) => Promise<boolean>
  readonly log?: DebugLog
}

export interface BrowserExit {
  readonly state: SelectionState
}

const sceneFor = (deps: BrowserDeps, state: SelectionState) => (size: SurfaceSize): Scene => {
  const input = { state, index: deps.index, theme: deps.theme, vaultLabel: deps.vaultLabel }
  return state.mode === "groupSelect" ? buildGroupScene(input, size) : buildListScene(input, size)
}

/**
 * Settle-then-render loop. Every iteration first brings the state in line with the current
 * viewport, flushes the render gate, then waits once for input.
 */
export const runBrowser = async (deps: BrowserDeps): Promise<BrowserExit> => {
  const log = deps.log ?? createDebugLog("browser")
  const context = (): ControllerContext => ({ index: deps.index, viewportHeight: listViewportHeight(deps.gate.size.rows) })
  let state = createInitialState(context(), deps.initial)
  log("browser_start", { entries: deps.index.entries.length, mode: state.mode })
  deps.input.flush()
  deps.gate.markDirty()
  while (true) {
    if (state.mode === "reveal") {
      const exit = await runRevealLoop(
        {
          index: deps.index,
          input: deps.input,
          gate: deps.gate,
          clock: deps.clock,
          provider: deps.provider,
          theme: deps.theme,
          vaultLabel: deps.vaultLabel,
          revealPollMs: deps.settings.revealPollMs,
          lowTimeSeconds: deps.settings.lowTimeSeconds,
          context,
          copy: deps.copy,
          log,
        },
        state,
      )
      state = exit.state
      if (exit.quit) break
      continue
    }

    const settled = settle(state, context())
    if (settled !== state) deps.gate.markDirty()
    state = settled
    deps.gate.flush(sceneFor(deps, state))

    const event = await deps.input.next(deps.settings.listPollMs)
    if (event === null) continue
    if (event.kind === "resize") deps.gate.markResize()
    const result = transition(state, event, context())
    state = result.state
    deps.gate.request(result.redraw)
    if (result.quit) break
  }
  log("browser_quit", { mode: state.mode })
  return { state }
}
