import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { VaultFormatError, VaultIOError } from "../errors.js"
import { parseVaultFile } from "./parse.js"
import type { VaultFile } from "./types.js"

const VAULT_FILE_PATTERN = /^aegis-(backup|export)-\d+(-\d+)*\.json$/

export const DEFAULT_AEGIS_VAULT_DIR = path.join(os.homedir(), ".config", "aegis")

const errnoCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined

export const readVaultFile = (filePath: string): VaultFile => {
  let raw: string
  try {
    raw = fs.readFileSync(filePath, "utf8")
  } catch (error) {
    const code = errnoCode(error)
    const reason = code === "ENOENT" ? "does not exist" : code === "EACCES" ? "is not readable" : "could not be read"
    throw new VaultIOError(`Vault file ${filePath} ${reason}`, { path: filePath, cause: error })
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new VaultFormatError(`Vault file ${filePath} is not valid JSON`, { path: filePath, cause: error })
  }
  return parseVaultFile(parsed)
}

/** Newest `aegis-backup-*.json` / `aegis-export-*.json` in `dir`, or null. */
export const findVaultPath = (dir: string): string | null => {
  let names: string[]
  try {
    names = fs.readdirSync(dir)
  } catch {
    return null
  }
  let newest: { filePath: string; mtimeMs: number } | null = null
  for (const name of names) {
    if (!VAULT_FILE_PATTERN.test(name)) continue
    const filePath = path.join(dir, name)
    let stat: fs.Stats
    try {
      stat = fs.statSync(filePath)
    } catch {
      continue
    }
    if (!stat.isFile()) continue
    if (newest === null || stat.mtimeMs > newest.mtimeMs) {
      newest = { filePath, mtimeMs: stat.mtimeMs }
    }
  }
  return newest?.filePath ?? null
}

export interface VaultLocationOptions {
  readonly explicitPath: string | null
  readonly lastOpenedVault: string | null
  readonly vaultDir: string
  readonly fallbackDir?: string
}

export const resolveVaultPath = (options: VaultLocationOptions): string => {
  if (options.explicitPath) return path.resolve(options.explicitPath)
  if (options.lastOpenedVault && fs.existsSync(options.lastOpenedVault)) return options.lastOpenedVault
  const fallbackDir = options.fallbackDir ?? DEFAULT_AEGIS_VAULT_DIR
  const found = findVaultPath(options.vaultDir) ?? (path.resolve(options.vaultDir) !== path.resolve(fallbackDir) ? findVaultPath(fallbackDir) : null)
  if (!found) {
    throw new VaultIOError(`No vault file found in ${path.resolve(options.vaultDir)} or ${fallbackDir}`)
  }
  return found
}
