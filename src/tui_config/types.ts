import type { ColorMode } from "../browser/theme.js"
import type { EntrySort } from "../vault/entryIndex.js"

export type TuiConfigInput = {
  lowTimeSeconds?: number
  listPollMs?: number
  revealPollMs?: number
  sortBy?: EntrySort
  asciiOnly?: boolean
  colorMode?: ColorMode
}

export type ResolvedTuiConfig = {
  /** The countdown turns to the alert color below this many seconds. */
  readonly lowTimeSeconds: number
  /** Bounded input wait in list and group modes. */
  readonly listPollMs: number
  /** Bounded input wait in reveal mode; also the countdown resolution. */
  readonly revealPollMs: number
  readonly sortBy: EntrySort
  readonly asciiOnly: boolean
  readonly colorMode: ColorMode
  readonly meta: {
    readonly strict: boolean
    readonly warnings: readonly string[]
    readonly sources: readonly string[]
  }
}

export type ResolvedTuiConfigOptions = {
  /** Directory searched for `otpview.tui.yaml`; defaults to the working directory. */
  readonly workspace?: string | null
  readonly cliConfigPath?: string | null
  readonly cliStrict?: boolean | null
  /** Flag values; applied last. */
  readonly cliOverrides?: TuiConfigInput
  /** False forces colors off regardless of every layer. */
  readonly colorAllowed?: boolean
}
