export type OtpAlgorithm = "SHA1" | "SHA256" | "SHA512" | "MD5"

export interface OtpInfo {
  readonly secret: string
  readonly algo: OtpAlgorithm
  readonly digits: number
  readonly period: number | null
  readonly counter: number | null
  readonly pin: string | null
}

export interface VaultEntry {
  /** `totp`, `hotp`, `steam` or `motp`; other values are kept and rejected when a code is computed. */
  readonly type: string
  readonly uuid: string
  readonly name: string
  readonly issuer: string
  readonly note: string
  readonly favorite: boolean
  readonly info: OtpInfo
  /** Group uuids. */
  readonly groups: readonly string[]
}

export interface VaultGroup {
  readonly uuid: string
  readonly name: string
}

export interface VaultDb {
  readonly version: number
  readonly entries: readonly VaultEntry[]
  readonly groups: readonly VaultGroup[]
}

export interface GcmParams {
  readonly nonce: string
  readonly tag: string
}

export interface VaultSlot {
  readonly type: number
  readonly uuid: string
  readonly key: string
  readonly keyParams: GcmParams
  readonly n: number
  readonly r: number
  readonly p: number
  readonly salt: string
  readonly repaired: boolean
  readonly isBackup: boolean
}

export interface VaultHeader {
  readonly slots: readonly VaultSlot[]
  readonly params: GcmParams | null
}

export type VaultFile =
  | { readonly kind: "encrypted"; readonly version: number; readonly header: VaultHeader; readonly db: string }
  | { readonly kind: "plain"; readonly version: number; readonly header: VaultHeader; readonly db: VaultDb }

export const PASSWORD_SLOT_TYPE = 1
