#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { browseCommand } from "./commands/browse.js"
import { codesCommand } from "./commands/codes.js"
import { AppConfigLayer } from "./config/appConfig.js"

const root = Command.make("otpview", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([browseCommand, codesCommand]),
)

const cli = Command.run(root, { name: "otpview", version: "0.3.0" })

const defaultedToBrowse = process.argv.length <= 2
const argv = defaultedToBrowse ? [...process.argv.slice(0, 2), "browse"] : process.argv

cli(argv).pipe(
  Effect.provide(Layer.merge(NodeContext.layer, AppConfigLayer)),
  NodeRuntime.runMain({ disableErrorReporting: true }),
)
