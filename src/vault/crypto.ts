import { createCipheriv, createDecipheriv, randomBytes as nodeRandomBytes, randomUUID, scryptSync } from "node:crypto"
import { VaultAuthError, VaultFormatError } from "../errors.js"
import { createDebugLog } from "../util/debugLog.js"
import { parseVaultDb, serializeVaultDb } from "./parse.js"
import { PASSWORD_SLOT_TYPE, type GcmParams, type VaultDb, type VaultFile, type VaultHeader, type VaultSlot } from "./types.js"

const KEY_LENGTH = 32
const NONCE_LENGTH = 12
const SALT_LENGTH = 32
// scrypt needs 128 * N * r bytes; Aegis uses N=2^15, r=8 which sits right at Node's 32 MiB default.
const SCRYPT_MAXMEM = 256 * 1024 * 1024

export const AEGIS_SCRYPT_PARAMS = { n: 32768, r: 8, p: 1 } as const

const log = createDebugLog("vault")

const openGcm = (key: Buffer, params: GcmParams, ciphertext: Buffer): Buffer => {
  const decipher = createDecipheriv("aes-256-gcm", key, Buffer.from(params.nonce, "hex"))
  decipher.setAuthTag(Buffer.from(params.tag, "hex"))
  return Buffer.concat([decipher.update(ciphertext), decipher.final()])
}

const sealGcm = (key: Buffer, nonce: Buffer, plaintext: Buffer): { ciphertext: Buffer; params: GcmParams } => {
  const cipher = createCipheriv("aes-256-gcm", key, nonce)
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()])
  return { ciphertext, params: { nonce: nonce.toString("hex"), tag: cipher.getAuthTag().toString("hex") } }
}

const deriveSlotKey = (password: string, slot: Pick<VaultSlot, "salt" | "n" | "r" | "p">): Buffer =>
  scryptSync(Buffer.from(password, "utf8"), Buffer.from(slot.salt, "hex"), KEY_LENGTH, {
    N: slot.n,
    r: slot.r,
    p: slot.p,
    maxmem: SCRYPT_MAXMEM,
  })

/** Tries every password slot in header order; the first slot that opens yields the master key. */
export const findMasterKey = (header: VaultHeader, password: string): Buffer => {
  for (const slot of header.slots) {
    if (slot.type !== PASSWORD_SLOT_TYPE) continue
    try {
      const slotKey = deriveSlotKey(password, slot)
      const masterKey = openGcm(slotKey, slot.keyParams, Buffer.from(slot.key, "hex"))
      if (masterKey.length === KEY_LENGTH) return masterKey
      log("slot_key_length_mismatch", { slot: slot.uuid, length: masterKey.length })
    } catch (error) {
      log("slot_rejected", { slot: slot.uuid, reason: error instanceof Error ? error.message : String(error) })
    }
  }
  throw new VaultAuthError()
}

export const decryptVaultDb = (vault: Extract<VaultFile, { kind: "encrypted" }>, password: string): VaultDb => {
  const masterKey = findMasterKey(vault.header, password)
  const params = vault.header.params
  if (params == null) {
    throw new VaultFormatError("Encrypted vault has no database parameters")
  }
  let content: Buffer
  try {
    content = openGcm(masterKey, params, Buffer.from(vault.db, "base64"))
  } catch (error) {
    throw new VaultFormatError("Vault database does not decrypt with the master key", { cause: error })
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(content.toString("utf8"))
  } catch (error) {
    throw new VaultFormatError("Decrypted vault database is not valid JSON", { cause: error })
  }
  return parseVaultDb(parsed)
}

export interface EncryptVaultOptions {
  readonly scrypt?: { readonly n: number; readonly r: number; readonly p: number }
  readonly randomBytes?: (size: number) => Buffer
  readonly slotUuid?: string
}

/**
 * Writes `db` in the Aegis encrypted backup layout with a single password slot.
 * Used for fixtures; small scrypt parameters keep tests fast.
 */
export const encryptVault = (db: VaultDb, password: string, options: EncryptVaultOptions = {}): Record<string, unknown> => {
  const random = options.randomBytes ?? nodeRandomBytes
  const scrypt = options.scrypt ?? AEGIS_SCRYPT_PARAMS
  const masterKey = random(KEY_LENGTH)
  const salt = random(SALT_LENGTH).toString("hex")
  const slotKey = deriveSlotKey(password, { salt, ...scrypt })
  const wrapped = sealGcm(slotKey, random(NONCE_LENGTH), masterKey)
  const body = sealGcm(masterKey, random(NONCE_LENGTH), Buffer.from(JSON.stringify(serializeVaultDb(db)), "utf8"))
  return {
    version: 1,
    header: {
      slots: [
        {
          type: PASSWORD_SLOT_TYPE,
          uuid: options.slotUuid ?? randomUUID(),
          key: wrapped.ciphertext.toString("hex"),
          key_params: wrapped.params,
          n: scrypt.n,
          r: scrypt.r,
          p: scrypt.p,
          salt,
          repaired: true,
          is_backup: false,
        },
      ],
      params: body.params,
    },
    db: body.ciphertext.toString("base64"),
  }
}
