import type { TuiConfigInput } from "./types.js"

export type ValidationIssue = {
  readonly severity: "error" | "warning"
  readonly path: string
  readonly message: string
}

type ValidationResult = {
  readonly config: TuiConfigInput
  readonly issues: readonly ValidationIssue[]
}

type ValidationOptions = {
  readonly strictUnknownKeys: boolean
}

const BOOL_TRUE = new Set(["1", "true", "yes", "on"])
const BOOL_FALSE = new Set(["0", "false", "no", "off"])

const KNOWN_KEYS = ["lowTimeSeconds", "listPollMs", "revealPollMs", "sortBy", "asciiOnly", "colorMode"] as const
const SORT_VALUES = ["vault", "name"] as const
const COLOR_MODES = ["auto", "none"] as const

const MIN_POLL_MS = 10
const MAX_POLL_MS = 1_000

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value != null && !Array.isArray(value)

export const parseBooleanLike = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") return value
  if (typeof value !== "string") return undefined
  const normalized = value.trim().toLowerCase()
  if (BOOL_TRUE.has(normalized)) return true
  if (BOOL_FALSE.has(normalized)) return false
  return undefined
}

const present = (source: Record<string, unknown>, key: string): boolean => key in source && source[key] != null

const readBoolean = (source: Record<string, unknown>, key: string, issues: ValidationIssue[]): boolean | undefined => {
  if (!present(source, key)) return undefined
  const parsed = parseBooleanLike(source[key])
  if (parsed == null) {
    issues.push({ severity: "error", path: key, message: "Expected boolean (or bool-like string)." })
  }
  return parsed
}

const readInteger = (
  source: Record<string, unknown>,
  key: string,
  min: number,
  issues: ValidationIssue[],
): number | undefined => {
  if (!present(source, key)) return undefined
  const value = source[key]
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : Number.NaN
  if (!Number.isInteger(parsed) || parsed < min) {
    issues.push({ severity: "error", path: key, message: `Expected integer >= ${min}.` })
    return undefined
  }
  return parsed
}

const readPollMs = (source: Record<string, unknown>, key: string, issues: ValidationIssue[]): number | undefined => {
  const value = readInteger(source, key, MIN_POLL_MS, issues)
  if (value != null && value > MAX_POLL_MS) {
    issues.push({ severity: "warning", path: key, message: `Values above ${MAX_POLL_MS} make the countdown lag; using ${MAX_POLL_MS}.` })
    return MAX_POLL_MS
  }
  return value
}

const readEnum = <T extends string>(
  source: Record<string, unknown>,
  key: string,
  values: readonly T[],
  issues: ValidationIssue[],
): T | undefined => {
  if (!present(source, key)) return undefined
  const raw = source[key]
  const match = values.find((value) => value === raw)
  if (match === undefined) {
    issues.push({ severity: "error", path: key, message: `Expected one of ${values.join(", ")}.` })
  }
  return match
}

export const validateTuiConfigInput = (input: unknown, options: ValidationOptions): ValidationResult => {
  const issues: ValidationIssue[] = []
  // An empty YAML document parses to null.
  if (input == null) return { config: {}, issues }
  if (!isRecord(input)) {
    issues.push({ severity: "error", path: "<root>", message: "Expected top-level object." })
    return { config: {}, issues }
  }
  for (const key of Object.keys(input)) {
    if (KNOWN_KEYS.some((known) => known === key)) continue
    issues.push({ severity: options.strictUnknownKeys ? "error" : "warning", path: key, message: "Unknown key." })
  }

  const config: TuiConfigInput = {}
  const lowTimeSeconds = readInteger(input, "lowTimeSeconds", 0, issues)
  if (lowTimeSeconds != null) config.lowTimeSeconds = lowTimeSeconds
  const listPollMs = readPollMs(input, "listPollMs", issues)
  if (listPollMs != null) config.listPollMs = listPollMs
  const revealPollMs = readPollMs(input, "revealPollMs", issues)
  if (revealPollMs != null) config.revealPollMs = revealPollMs
  const sortBy = readEnum(input, "sortBy", SORT_VALUES, issues)
  if (sortBy != null) config.sortBy = sortBy
  const asciiOnly = readBoolean(input, "asciiOnly", issues)
  if (asciiOnly != null) config.asciiOnly = asciiOnly
  const colorMode = readEnum(input, "colorMode", COLOR_MODES, issues)
  if (colorMode != null) config.colorMode = colorMode
  return { config, issues }
}

export const formatValidationIssues = (issues: readonly ValidationIssue[]): string[] =>
  issues.map((issue) => `[${issue.severity}] ${issue.path}: ${issue.message}`)
