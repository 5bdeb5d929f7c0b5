import path from "node:path"
import { loadUserConfigSync, writeUserConfig, type UserConfig } from "../config/userConfig.js"
import { VaultAuthError } from "../errors.js"
import type { PasswordPrompt } from "../prompt/UnlockPrompt.js"
import { createDebugLog, describeError, type DebugLog } from "../util/debugLog.js"
import { decryptVaultDb } from "../vault/crypto.js"
import { readVaultFile, resolveVaultPath } from "../vault/store.js"
import type { VaultDb } from "../vault/types.js"

export const MAX_UNLOCK_ATTEMPTS = 3

export interface UnlockOptions {
  readonly vaultPath: string | null
  readonly vaultDir: string | null
  /** Non-interactive password; a wrong one is fatal instead of re-prompting. */
  readonly password: string | null
  readonly prompt: PasswordPrompt
  readonly userConfig?: UserConfig
  readonly fallbackDir?: string
  readonly log?: DebugLog
}

export interface UnlockedVault {
  readonly path: string
  readonly db: VaultDb
}

export const unlockVault = async (options: UnlockOptions): Promise<UnlockedVault> => {
  const log = options.log ?? createDebugLog("unlock")
  const userConfig = options.userConfig ?? loadUserConfigSync()
  const vaultPath = resolveVaultPath({
    explicitPath: options.vaultPath,
    lastOpenedVault: userConfig.lastOpenedVault,
    vaultDir: options.vaultDir ?? ".",
    fallbackDir: options.fallbackDir,
  })
  log("vault_resolved", { path: vaultPath })
  const file = readVaultFile(vaultPath)
  let db: VaultDb
  if (file.kind === "plain") {
    db = file.db
  } else if (options.password != null) {
    db = decryptVaultDb(file, options.password)
  } else {
    let error: string | null = null
    let unlocked: VaultDb | null = null
    for (let attempt = 1; attempt <= MAX_UNLOCK_ATTEMPTS && unlocked === null; attempt += 1) {
      const password = await options.prompt({ vaultPath, attempt, maxAttempts: MAX_UNLOCK_ATTEMPTS, error })
      try {
        unlocked = decryptVaultDb(file, password)
      } catch (cause) {
        if (!(cause instanceof VaultAuthError)) throw cause
        log("unlock_failed", { attempt })
        error = "Wrong password"
      }
    }
    if (unlocked === null) {
      throw new VaultAuthError(`Could not unlock ${vaultPath} after ${MAX_UNLOCK_ATTEMPTS} attempts`)
    }
    db = unlocked
  }
  try {
    await writeUserConfig({ lastOpenedVault: vaultPath, lastVaultDir: path.dirname(vaultPath) })
  } catch (error) {
    log("remember_vault_failed", { error: describeError(error) })
  }
  return { path: vaultPath, db }
}
