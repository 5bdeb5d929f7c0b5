import dotenv from "dotenv"
import { Context, Effect, Layer } from "effect"
import { loadUserConfigSync, type UserConfig } from "./userConfig.js"

export interface AppConfig {
  /** `OTPVIEW_PASSWORD`; null means prompt for it. */
  readonly password: string | null
  readonly user: UserConfig
  /** Directory searched for `otpview.tui.yaml`. */
  readonly workspace: string
}

export const computeAppConfig = (): AppConfig => {
  dotenv.config()
  const password = process.env.OTPVIEW_PASSWORD
  return {
    password: password != null && password.length > 0 ? password : null,
    user: loadUserConfigSync(),
    workspace: process.env.OTPVIEW_WORKSPACE?.trim() || process.cwd(),
  }
}

export const AppConfigTag = Context.GenericTag<AppConfig>("AppConfig")

export const AppConfigLayer = Layer.effect(AppConfigTag, Effect.sync(computeAppConfig))
