import { createHash } from "node:crypto"
import { HOTP, Secret, TOTP } from "otpauth"
import { OtpComputationError } from "../errors.js"
import type { OtpAlgorithm, OtpInfo } from "../vault/types.js"

export const DEFAULT_PERIOD_SECONDS = 30
const DEFAULT_MOTP_PERIOD_SECONDS = 10
const STEAM_ALPHABET = "23456789BCDFGHJKMNPQRTVWXY"
// A 31-bit truncated HOTP value always fits in ten decimal digits, so a 10-digit HOTP is the raw value.
const RAW_TRUNCATION_DIGITS = 10

export type OtpResult =
  | {
      readonly kind: "time"
      readonly code: string
      /** Always in (0, periodMs]. */
      readonly msUntilNext: number
      readonly periodMs: number
    }
  | {
      readonly kind: "counter"
      readonly code: string
      readonly counter: number
    }

export interface OtpSource {
  readonly uuid: string
  readonly type: string
  readonly info: OtpInfo
}

export interface OtpProvider {
  compute(entry: OtpSource, now: number): OtpResult
}

type HmacAlgorithm = Exclude<OtpAlgorithm, "MD5">

const hmacAlgorithm = (entry: OtpSource): HmacAlgorithm => {
  if (entry.info.algo === "MD5") {
    throw new OtpComputationError(entry.uuid, `${entry.type} entries cannot use MD5`)
  }
  return entry.info.algo
}

const normalizeBase32 = (secret: string): string => secret.replace(/\s+/g, "").replace(/=+$/, "").toUpperCase()

export const msUntilNextWindow = (now: number, periodMs: number): number => periodMs - (((now % periodMs) + periodMs) % periodMs)

const periodMsOf = (info: OtpInfo, fallbackSeconds: number): number => {
  const seconds = info.period != null && info.period > 0 ? info.period : fallbackSeconds
  return seconds * 1000
}

const computeTotp = (entry: OtpSource, now: number): OtpResult => {
  const periodMs = periodMsOf(entry.info, DEFAULT_PERIOD_SECONDS)
  const code = TOTP.generate({
    secret: Secret.fromBase32(normalizeBase32(entry.info.secret)),
    algorithm: hmacAlgorithm(entry),
    digits: entry.info.digits,
    period: periodMs / 1000,
    timestamp: now,
  })
  return { kind: "time", code, msUntilNext: msUntilNextWindow(now, periodMs), periodMs }
}

const computeHotp = (entry: OtpSource): OtpResult => {
  const counter = entry.info.counter ?? 0
  const code = HOTP.generate({
    secret: Secret.fromBase32(normalizeBase32(entry.info.secret)),
    algorithm: hmacAlgorithm(entry),
    digits: entry.info.digits,
    counter,
  })
  return { kind: "counter", code, counter }
}

const computeSteam = (entry: OtpSource, now: number): OtpResult => {
  const periodMs = periodMsOf(entry.info, DEFAULT_PERIOD_SECONDS)
  const raw = HOTP.generate({
    secret: Secret.fromBase32(normalizeBase32(entry.info.secret)),
    algorithm: hmacAlgorithm(entry),
    digits: RAW_TRUNCATION_DIGITS,
    counter: Math.floor(now / periodMs),
  })
  let value = Number.parseInt(raw, 10)
  let code = ""
  for (let index = 0; index < entry.info.digits; index += 1) {
    code += STEAM_ALPHABET[value % STEAM_ALPHABET.length]
    value = Math.floor(value / STEAM_ALPHABET.length)
  }
  return { kind: "time", code, msUntilNext: msUntilNextWindow(now, periodMs), periodMs }
}

const computeMotp = (entry: OtpSource, now: number): OtpResult => {
  if (!/^[0-9a-fA-F]*$/.test(entry.info.secret) || entry.info.secret.length % 2 !== 0) {
    throw new OtpComputationError(entry.uuid, "mOTP secret must be hex encoded")
  }
  const periodMs = periodMsOf(entry.info, DEFAULT_MOTP_PERIOD_SECONDS)
  const counter = Math.floor(now / periodMs)
  const digest = createHash("md5")
    .update(`${counter}${entry.info.secret.toLowerCase()}${entry.info.pin ?? ""}`, "utf8")
    .digest("hex")
  return { kind: "time", code: digest.slice(0, entry.info.digits), msUntilNext: msUntilNextWindow(now, periodMs), periodMs }
}

export const computeOtp = (entry: OtpSource, now: number): OtpResult => {
  try {
    switch (entry.type) {
      case "totp":
        return computeTotp(entry, now)
      case "hotp":
        return computeHotp(entry)
      case "steam":
        return computeSteam(entry, now)
      case "motp":
        return computeMotp(entry, now)
      default:
        throw new OtpComputationError(entry.uuid, `Unsupported OTP type ${entry.type}`)
    }
  } catch (error) {
    if (error instanceof OtpComputationError) throw error
    const reason = error instanceof Error ? error.message : String(error)
    throw new OtpComputationError(entry.uuid, `Could not compute a code: ${reason}`, error)
  }
}

export const createOtpProvider = (): OtpProvider => ({ compute: computeOtp })
