import { VaultFormatError } from "../errors.js"
import type { GcmParams, OtpAlgorithm, OtpInfo, VaultDb, VaultEntry, VaultFile, VaultGroup, VaultHeader, VaultSlot } from "./types.js"

type JsonRecord = Record<string, unknown>

const ALGORITHMS: ReadonlySet<string> = new Set(["SHA1", "SHA256", "SHA512", "MD5"])

const isAlgorithm = (value: string): value is OtpAlgorithm => ALGORITHMS.has(value)

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const fail = (path: string, message: string): never => {
  throw new VaultFormatError(`Invalid vault: ${path} ${message}`)
}

const readRecord = (source: JsonRecord, key: string, path: string): JsonRecord => {
  const value = source[key]
  if (!isRecord(value)) return fail(`${path}.${key}`, "must be an object")
  return value
}

const readArray = (source: JsonRecord, key: string, path: string): readonly unknown[] => {
  const value = source[key]
  if (!Array.isArray(value)) return fail(`${path}.${key}`, "must be an array")
  return value
}

const readString = (source: JsonRecord, key: string, path: string): string => {
  const value = source[key]
  if (typeof value !== "string") return fail(`${path}.${key}`, "must be a string")
  return value
}

const readOptionalString = (source: JsonRecord, key: string): string => {
  const value = source[key]
  return typeof value === "string" ? value : ""
}

const readInteger = (source: JsonRecord, key: string, path: string): number => {
  const value = source[key]
  if (typeof value !== "number" || !Number.isInteger(value)) return fail(`${path}.${key}`, "must be an integer")
  return value
}

const readOptionalInteger = (source: JsonRecord, key: string, path: string): number | null => {
  const value = source[key]
  if (value === undefined || value === null) return null
  if (typeof value !== "number" || !Number.isInteger(value)) return fail(`${path}.${key}`, "must be an integer")
  return value
}

const parseAlgorithm = (value: string, path: string): OtpAlgorithm => {
  const normalized = value.trim().toUpperCase()
  if (!isAlgorithm(normalized)) return fail(path, `uses unsupported algorithm ${value}`)
  return normalized
}

const parseGcmParams = (raw: JsonRecord, path: string): GcmParams => ({
  nonce: readString(raw, "nonce", path),
  tag: readString(raw, "tag", path),
})

const parseSlot = (raw: unknown, path: string): VaultSlot => {
  if (!isRecord(raw)) return fail(path, "must be an object")
  const type = readInteger(raw, "type", path)
  // Non-password slots (biometric) carry no scrypt parameters.
  return {
    type,
    uuid: readOptionalString(raw, "uuid"),
    key: readString(raw, "key", path),
    keyParams: parseGcmParams(readRecord(raw, "key_params", path), `${path}.key_params`),
    n: readOptionalInteger(raw, "n", path) ?? 0,
    r: readOptionalInteger(raw, "r", path) ?? 0,
    p: readOptionalInteger(raw, "p", path) ?? 0,
    salt: readOptionalString(raw, "salt"),
    repaired: raw.repaired === true,
    isBackup: raw.is_backup === true,
  }
}

const parseHeader = (raw: JsonRecord, path: string): VaultHeader => {
  const slotsRaw = raw.slots
  const slots = Array.isArray(slotsRaw) ? slotsRaw.map((slot, index) => parseSlot(slot, `${path}.slots[${index}]`)) : []
  const params = isRecord(raw.params) ? parseGcmParams(raw.params, `${path}.params`) : null
  return { slots, params }
}

const parseInfo = (raw: JsonRecord, path: string): OtpInfo => ({
  secret: readString(raw, "secret", path),
  algo: parseAlgorithm(typeof raw.algo === "string" ? raw.algo : "SHA1", `${path}.algo`),
  digits: readOptionalInteger(raw, "digits", path) ?? 6,
  period: readOptionalInteger(raw, "period", path),
  counter: readOptionalInteger(raw, "counter", path),
  pin: typeof raw.pin === "string" ? raw.pin : null,
})

const parseEntry = (raw: unknown, path: string): VaultEntry => {
  if (!isRecord(raw)) return fail(path, "must be an object")
  const groupsRaw = raw.groups
  const groups = Array.isArray(groupsRaw)
    ? groupsRaw.filter((value): value is string => typeof value === "string")
    : typeof raw.group === "string" && raw.group.length > 0
      ? [raw.group]
      : []
  return {
    type: readString(raw, "type", path).toLowerCase(),
    uuid: readString(raw, "uuid", path),
    name: readOptionalString(raw, "name"),
    issuer: readOptionalString(raw, "issuer"),
    note: readOptionalString(raw, "note"),
    favorite: raw.favorite === true,
    info: parseInfo(readRecord(raw, "info", path), `${path}.info`),
    groups,
  }
}

const parseGroup = (raw: unknown, path: string): VaultGroup => {
  if (!isRecord(raw)) return fail(path, "must be an object")
  return { uuid: readString(raw, "uuid", path), name: readString(raw, "name", path) }
}

export const parseVaultDb = (raw: unknown, path = "db"): VaultDb => {
  if (!isRecord(raw)) return fail(path, "must be an object")
  const entries = readArray(raw, "entries", path).map((entry, index) => parseEntry(entry, `${path}.entries[${index}]`))
  const groups = Array.isArray(raw.groups)
    ? raw.groups.map((group, index) => parseGroup(group, `${path}.groups[${index}]`))
    : []
  const seen = new Set<string>()
  for (const entry of entries) {
    if (seen.has(entry.uuid)) fail(path, `contains duplicate entry uuid ${entry.uuid}`)
    seen.add(entry.uuid)
  }
  return { version: readOptionalInteger(raw, "version", path) ?? 1, entries, groups }
}

export const parseVaultFile = (raw: unknown): VaultFile => {
  if (!isRecord(raw)) return fail("<root>", "must be an object")
  const version = readInteger(raw, "version", "<root>")
  const header = parseHeader(readRecord(raw, "header", "<root>"), "header")
  if (typeof raw.db === "string") {
    if (header.params == null) return fail("header.params", "is required for an encrypted vault")
    return { kind: "encrypted", version, header, db: raw.db }
  }
  return { kind: "plain", version, header, db: parseVaultDb(raw.db) }
}

const serializeInfo = (info: OtpInfo): JsonRecord => ({
  secret: info.secret,
  algo: info.algo,
  digits: info.digits,
  ...(info.period != null ? { period: info.period } : {}),
  ...(info.counter != null ? { counter: info.counter } : {}),
  ...(info.pin != null ? { pin: info.pin } : {}),
})

export const serializeVaultDb = (db: VaultDb): JsonRecord => ({
  version: db.version,
  entries: db.entries.map((entry) => ({
    type: entry.type,
    uuid: entry.uuid,
    name: entry.name,
    issuer: entry.issuer,
    note: entry.note,
    icon: null,
    favorite: entry.favorite,
    info: serializeInfo(entry.info),
    groups: [...entry.groups],
  })),
  groups: db.groups.map((group) => ({ uuid: group.uuid, name: group.name })),
})
