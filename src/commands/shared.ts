import { Args, Options } from "@effect/cli"
import { Console, Effect } from "effect"
import { InputDeviceUnavailableError, isReportableError } from "../errors.js"
import { promptForPassword, type PasswordPrompt } from "../prompt/UnlockPrompt.js"
import { describeError } from "../util/debugLog.js"

export const vaultPathArg = Args.text({ name: "vault-path" }).pipe(Args.optional)
export const vaultDirOption = Options.text("vault-dir").pipe(Options.withAlias("d"), Options.optional)
export const groupOption = Options.text("group").pipe(Options.withAlias("g"), Options.optional)
export const uuidOption = Options.text("uuid").pipe(Options.withAlias("u"), Options.optional)
export const configOption = Options.text("config").pipe(Options.optional)
export const configStrictOption = Options.boolean("config-strict")

const reportError = (error: unknown) =>
  Console.error(isReportableError(error) ? error.message : describeError(error))

/** Runs `evaluate`; a rejection is printed to stderr and fails the effect. */
export const attemptPromise = <A>(evaluate: () => Promise<A>) =>
  Effect.tryPromise({ try: () => evaluate(), catch: (error) => error }).pipe(Effect.tapError(reportError))

export const attempt = <A>(evaluate: () => A) =>
  Effect.try({ try: evaluate, catch: (error) => error }).pipe(Effect.tapError(reportError))

/** The Ink prompt needs a terminal; without one the password has to come from the environment. */
export const interactivePrompt: PasswordPrompt = async (options) => {
  if (!process.stdin.isTTY) {
    throw new InputDeviceUnavailableError("No terminal to ask for the vault password; set OTPVIEW_PASSWORD")
  }
  return promptForPassword(options)
}
