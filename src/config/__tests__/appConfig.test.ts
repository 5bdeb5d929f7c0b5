import { afterEach, describe, expect, it } from "vitest"
import { Effect } from "effect"
import os from "node:os"
import path from "node:path"
import { AppConfigLayer, AppConfigTag } from "../appConfig.js"

const envKeys = ["OTPVIEW_PASSWORD", "OTPVIEW_WORKSPACE", "OTPVIEW_USER_CONFIG"]
const snapshot = new Map(envKeys.map((key) => [key, process.env[key]]))

afterEach(() => {
  for (const key of envKeys) {
    const value = snapshot.get(key)
    if (value == null) delete process.env[key]
    else process.env[key] = value
  }
})

const readConfig = () => Effect.runSync(AppConfigTag.pipe(Effect.provide(AppConfigLayer)))

describe("AppConfigLayer", () => {
  it("reads the password and workspace from the environment", () => {
    process.env.OTPVIEW_PASSWORD = "test-secret"
    process.env.OTPVIEW_WORKSPACE = "/workspace"
    process.env.OTPVIEW_USER_CONFIG = path.join(os.tmpdir(), "otpview-missing", "config.json")
    const config = readConfig()
    expect(config.password).toBe("test-secret")
    expect(config.workspace).toBe("/workspace")
    expect(config.user.clipboardTool).toBe("")
  })

  it("treats an empty password as unset", () => {
    process.env.OTPVIEW_PASSWORD = ""
    delete process.env.OTPVIEW_WORKSPACE
    expect(readConfig().password).toBeNull()
    expect(readConfig().workspace).toBe(process.cwd())
  })
})
