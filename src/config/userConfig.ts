import { homedir } from "node:os"
import path from "node:path"
import fs from "node:fs"
import { promises as fsp } from "node:fs"

export interface UserConfigFile {
  /** False starts every session without colors. */
  readonly defaultColorMode?: boolean
  readonly lastOpenedVault?: string
  readonly lastVaultDir?: string
  /** "" disables copying, "auto" uses the platform clipboard, anything else is a command fed on stdin. */
  readonly clipboardTool?: string
}

export interface UserConfig {
  readonly defaultColorMode: boolean
  readonly lastOpenedVault: string | null
  readonly lastVaultDir: string | null
  readonly clipboardTool: string
}

export const DEFAULT_USER_CONFIG: UserConfig = {
  defaultColorMode: true,
  lastOpenedVault: null,
  lastVaultDir: null,
  clipboardTool: "",
}

const resolveConfigPath = (): string => {
  const explicit = process.env.OTPVIEW_USER_CONFIG?.trim()
  if (explicit) {
    return path.resolve(explicit)
  }
  return path.join(homedir(), ".config", "otpview", "config.json")
}

export const getUserConfigPath = (): string => resolveConfigPath()

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const readString = (value: unknown): string | null => (typeof value === "string" && value.length > 0 ? value : null)

export const loadUserConfigSync = (): UserConfig => {
  const configPath = resolveConfigPath()
  let parsed: unknown
  try {
    if (!fs.existsSync(configPath)) return DEFAULT_USER_CONFIG
    parsed = JSON.parse(fs.readFileSync(configPath, "utf8"))
  } catch {
    // A damaged config file falls back to defaults; the next save rewrites it.
    return DEFAULT_USER_CONFIG
  }
  if (!isRecord(parsed)) return DEFAULT_USER_CONFIG
  return {
    defaultColorMode:
      typeof parsed.defaultColorMode === "boolean" ? parsed.defaultColorMode : DEFAULT_USER_CONFIG.defaultColorMode,
    lastOpenedVault: readString(parsed.lastOpenedVault),
    lastVaultDir: readString(parsed.lastVaultDir),
    clipboardTool: typeof parsed.clipboardTool === "string" ? parsed.clipboardTool : DEFAULT_USER_CONFIG.clipboardTool,
  }
}

/** Merges `patch` over the stored values and writes the file back. */
export const writeUserConfig = async (patch: UserConfigFile): Promise<UserConfig> => {
  const configPath = resolveConfigPath()
  const current = loadUserConfigSync()
  const next: UserConfig = {
    defaultColorMode: patch.defaultColorMode ?? current.defaultColorMode,
    lastOpenedVault: patch.lastOpenedVault ?? current.lastOpenedVault,
    lastVaultDir: patch.lastVaultDir ?? current.lastVaultDir,
    clipboardTool: patch.clipboardTool ?? current.clipboardTool,
  }
  await fsp.mkdir(path.dirname(configPath), { recursive: true })
  const payload = {
    defaultColorMode: next.defaultColorMode,
    ...(next.lastOpenedVault ? { lastOpenedVault: next.lastOpenedVault } : {}),
    ...(next.lastVaultDir ? { lastVaultDir: next.lastVaultDir } : {}),
    clipboardTool: next.clipboardTool,
  }
  await fsp.writeFile(configPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8")
  return next
}
