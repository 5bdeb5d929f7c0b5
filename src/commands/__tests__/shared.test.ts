import { Command } from "@effect/cli"
import { NodeContext } from "@effect/platform-node"
import { Effect, Option } from "effect"
import { describe, expect, it } from "vitest"
import { groupOption, uuidOption, vaultDirOption, vaultPathArg } from "../shared.js"

interface ParsedSelection {
  readonly vaultPath: string | null
  readonly vaultDir: string | null
  readonly group: string | null
  readonly uuid: string | null
}

const parseSelection = async (args: ReadonlyArray<string>): Promise<ParsedSelection | null> => {
  let parsed: ParsedSelection | null = null
  const command = Command.make(
    "otpview",
    { vaultPath: vaultPathArg, vaultDir: vaultDirOption, group: groupOption, uuid: uuidOption },
    (options) =>
      Effect.sync(() => {
        parsed = {
          vaultPath: Option.getOrNull(options.vaultPath),
          vaultDir: Option.getOrNull(options.vaultDir),
          group: Option.getOrNull(options.group),
          uuid: Option.getOrNull(options.uuid),
        }
      }),
  )
  const cli = Command.run(command, { name: "otpview", version: "0.0.0" })
  await Effect.runPromise(cli(["node", "otpview", ...args]).pipe(Effect.provide(NodeContext.layer)))
  return parsed
}

describe("shared options", () => {
  it("accepts the short aliases", async () => {
    await expect(parseSelection(["-d", "vaults", "-g", "Work", "-u", "entry-1"])).resolves.toEqual({
      vaultPath: null,
      vaultDir: "vaults",
      group: "Work",
      uuid: "entry-1",
    })
  })

  it("accepts the long names and the vault path", async () => {
    await expect(parseSelection(["--vault-dir", "vaults", "--group", "Work", "backup.json"])).resolves.toEqual({
      vaultPath: "backup.json",
      vaultDir: "vaults",
      group: "Work",
      uuid: null,
    })
  })
})
