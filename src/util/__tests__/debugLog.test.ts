import { describe, expect, it } from "vitest"
import { promises as fs } from "node:fs"
import os from "node:os"
import path from "node:path"
import { createDebugLog, describeError } from "../debugLog.js"

describe("createDebugLog", () => {
  it("appends one JSON object per event", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "otpview-debug-"))
    const filePath = path.join(dir, "debug.log")
    const log = createDebugLog("browser", { filePath, now: () => 0 })
    log("browser_start", { entries: 4 })
    log("browser_exit")
    const lines = (await fs.readFile(filePath, "utf8")).trimEnd().split("\n")
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { ts: "1970-01-01T00:00:00.000Z", scope: "browser", event: "browser_start", entries: 4 },
      { ts: "1970-01-01T00:00:00.000Z", scope: "browser", event: "browser_exit" },
    ])
  })

  it("is a no-op without a target file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "otpview-debug-"))
    const log = createDebugLog("browser", { filePath: null })
    log("ignored")
    expect(await fs.readdir(dir)).toEqual([])
  })
})

describe("describeError", () => {
  it("prefers the error name and message", () => {
    expect(describeError(new TypeError("bad input"))).toBe("TypeError: bad input")
    expect(describeError("plain")).toBe("plain")
  })
})
