import { Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { DEFAULT_SYSTEM_CLOCK } from "../clock/systemClock.js"
import { AppConfigTag } from "../config/appConfig.js"
import { createOtpProvider } from "../otp/provider.js"
import { resolveTuiConfig } from "../tui_config/load.js"
import { buildEntryIndex } from "../vault/entryIndex.js"
import { buildCodeRows, formatCodesJson, formatCodesTable } from "./codesTable.js"
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

const outputOption = Options.choice("output", ["table", "json"]).pipe(Options.withDefault("table"))

export const codesCommand = Command.make(
  "codes",
  {
    vaultPath: vaultPathArg,
    vaultDir: vaultDirOption,
    group: groupOption,
    uuid: uuidOption,
    output: outputOption,
    config: configOption,
    configStrict: configStrictOption,
  },
  ({ vaultPath, vaultDir, group, uuid, output, config: configPath, configStrict }) =>
    Effect.gen(function* () {
      const config = yield* AppConfigTag
      const tui = yield* attemptPromise(() =>
        resolveTuiConfig({
          workspace: config.workspace,
          cliConfigPath: Option.getOrNull(configPath),
          cliStrict: configStrict ? true : null,
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
      const index = buildEntryIndex(unlocked.db, { sortBy: tui.sortBy })
      const selection = yield* attempt(() =>
        resolveCommandSelection(index, Option.getOrNull(group), Option.getOrNull(uuid)),
      )
      const now = DEFAULT_SYSTEM_CLOCK.now()
      const rows = buildCodeRows(index, createOtpProvider(), now, selection)
      yield* Console.log(output === "json" ? formatCodesJson(rows) : formatCodesTable(rows, now))
    }),
)
