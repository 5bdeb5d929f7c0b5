import path from "node:path"
import { Command, Options } from "@effect/cli"
import { supportsColor } from "chalk"
import { Console, Effect, Option } from "effect"
import { runBrowser } from "../browser/browserLoop.js"
import { RenderGate } from "../browser/renderGate.js"
import { TerminalInput } from "../browser/terminalInput.js"
import { TerminalSurface } from "../browser/terminalSurface.js"
import { createTheme, type BrowserTheme } from "../browser/theme.js"
import { DEFAULT_SYSTEM_CLOCK } from "../clock/systemClock.js"
import { AppConfigTag } from "../config/appConfig.js"
import { InputDeviceUnavailableError } from "../errors.js"
import { createOtpProvider } from "../otp/provider.js"
import { resolveTuiConfig } from "../tui_config/load.js"
import type { ResolvedTuiConfig } from "../tui_config/types.js"
import { copyToClipboard } from "../util/clipboard.js"
import { createDebugLog } from "../util/debugLog.js"
import { buildEntryIndex } from "../vault/entryIndex.js"
import type { VaultDb } from "../vault/types.js"
import { resolveCommandSelection } from "./selection.js"
import {
  attempt,
  attemptPromise,
  configOption,
  configStrictOption,
  groupOption,
  interactivePrompt,
  uuidOption,
  vaultDirOption,
  vaultPathArg,
} from "./shared.js"
import { unlockVault } from "./unlock.js"

const noColorOption = Options.boolean("no-color")
const asciiOption = Options.boolean("ascii")

const browserTheme = (tui: ResolvedTuiConfig): BrowserTheme => {
  const level = supportsColor === false ? 0 : supportsColor.level
  if (tui.colorMode === "none" || level === 0) {
    return createTheme({ colorMode: "none", asciiOnly: tui.asciiOnly })
  }
  return createTheme({ colorMode: "auto", asciiOnly: tui.asciiOnly, colorLevel: level })
}

interface BrowseSession {
  readonly vaultPath: string
  readonly db: VaultDb
  readonly tui: ResolvedTuiConfig
  readonly groupName: string | null
  readonly uuid: string | null
  readonly clipboardTool: string
}

const runBrowseSession = async (session: BrowseSession): Promise<void> => {
  const log = createDebugLog("browse")
  const index = buildEntryIndex(session.db, { sortBy: session.tui.sortBy })
  const selection = resolveCommandSelection(index, session.groupName, session.uuid)
  const clock = DEFAULT_SYSTEM_CLOCK
  const surface = new TerminalSurface(process.stdout, process)
  let input: TerminalInput | null = null
  try {
    input = new TerminalInput(process.stdin, process.stdout, clock)
    surface.open()
    const tool = session.clipboardTool
    await runBrowser({
      index,
      input,
      gate: new RenderGate(surface),
      clock,
      provider: createOtpProvider(),
      theme: browserTheme(session.tui),
      settings: {
        listPollMs: session.tui.listPollMs,
        revealPollMs: session.tui.revealPollMs,
        lowTimeSeconds: session.tui.lowTimeSeconds,
      },
      vaultLabel: path.basename(session.vaultPath),
      initial: { activeGroupUuid: selection.group?.uuid ?? null, revealedUuid: selection.entry?.uuid ?? null },
      copy: tool.trim() ? (text) => copyToClipboard(text, tool) : undefined,
      log,
    })
  } finally {
    input?.close()
    surface.close()
  }
}

export const browseCommand = Command.make(
  "browse",
  {
    vaultPath: vaultPathArg,
    vaultDir: vaultDirOption,
    group: groupOption,
    uuid: uuidOption,
    noColor: noColorOption,
    ascii: asciiOption,
    config: configOption,
    configStrict: configStrictOption,
  },
  ({ vaultPath, vaultDir, group, uuid, noColor, ascii, config: configPath, configStrict }) =>
    Effect.gen(function* () {
      const config = yield* AppConfigTag
      yield* attempt(() => {
        if (!process.stdin.isTTY || !process.stdout.isTTY) throw new InputDeviceUnavailableError()
      })
      const tui = yield* attemptPromise(() =>
        resolveTuiConfig({
          workspace: config.workspace,
          cliConfigPath: Option.getOrNull(configPath),
          cliStrict: configStrict ? true : null,
          cliOverrides: ascii ? { asciiOnly: true } : {},
          colorAllowed: !noColor && config.user.defaultColorMode,
        }),
      )
      for (const warning of tui.meta.warnings) {
        yield* Console.warn(warning)
      }
      const unlocked = yield* attemptPromise(() =>
        unlockVault({
          vaultPath: Option.getOrNull(vaultPath),
          vaultDir: Option.getOrNull(vaultDir),
          password: config.password,
          prompt: interactivePrompt,
          userConfig: config.user,
        }),
      )
      yield* attemptPromise(() =>
        runBrowseSession({
          vaultPath: unlocked.path,
          db: unlocked.db,
          tui,
          groupName: Option.getOrNull(group),
          uuid: Option.getOrNull(uuid),
          clipboardTool: config.user.clipboardTool,
        }),
      )
    }),
)
