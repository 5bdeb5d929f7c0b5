import { promises as fs } from "node:fs"
import os from "node:os"
import path from "node:path"
import { parse } from "yaml"
import { ConfigError } from "../errors.js"
import { formatValidationIssues, parseBooleanLike, validateTuiConfigInput } from "./schema.js"
import type { ResolvedTuiConfig, ResolvedTuiConfigOptions, TuiConfigInput } from "./types.js"

export const DEFAULT_TUI_CONFIG: Omit<ResolvedTuiConfig, "meta"> = {
  lowTimeSeconds: 10,
  listPollMs: 100,
  revealPollMs: 50,
  sortBy: "vault",
  asciiOnly: false,
  colorMode: "auto",
}

const ENV_PREFIX = "OTPVIEW_TUI_"

const errnoCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined

const readYamlInput = async (filePath: string, strictUnknownKeys: boolean): Promise<{ config: TuiConfigInput; warnings: string[] }> => {
  let raw: string
  try {
    raw = await fs.readFile(filePath, "utf8")
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return { config: {}, warnings: [] }
    }
    throw new ConfigError(`Cannot read display config at ${filePath}: ${error instanceof Error ? error.message : String(error)}`)
  }
  let parsed: unknown
  try {
    parsed = parse(raw)
  } catch (error) {
    throw new ConfigError(`Invalid YAML in display config at ${filePath}: ${error instanceof Error ? error.message : String(error)}`)
  }
  const validated = validateTuiConfigInput(parsed, { strictUnknownKeys })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    throw new ConfigError(`Invalid display config at ${filePath}\n${formatValidationIssues(errors).join("\n")}`)
  }
  const warnings = formatValidationIssues(validated.issues.filter((issue) => issue.severity === "warning"))
  return { config: validated.config, warnings }
}

const resolveUserConfigPath = (): string => path.join(os.homedir(), ".config", "otpview", "tui.yaml")

// Environment values go through the same validator as the files, so bad values fail the same way.
const envConfigLayer = (strictUnknownKeys: boolean): TuiConfigInput => {
  const raw: Record<string, unknown> = {}
  const read = (suffix: string) => process.env[`${ENV_PREFIX}${suffix}`]?.trim() || undefined
  raw.lowTimeSeconds = read("LOW_TIME_SECONDS")
  raw.listPollMs = read("LIST_POLL_MS")
  raw.revealPollMs = read("REVEAL_POLL_MS")
  raw.sortBy = read("SORT_BY")
  raw.asciiOnly = read("ASCII_ONLY")
  raw.colorMode = read("COLOR_MODE")
  const validated = validateTuiConfigInput(raw, { strictUnknownKeys })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    const lines = errors.map((issue) => `[error] ${ENV_PREFIX}${issue.path.replace(/[A-Z]/g, (char) => `_${char}`).toUpperCase()}: ${issue.message}`)
    throw new ConfigError(`Invalid display config in the environment\n${lines.join("\n")}`)
  }
  return validated.config
}

export const resolveTuiConfig = async (options: ResolvedTuiConfigOptions = {}): Promise<ResolvedTuiConfig> => {
  const strictFromEnv = parseBooleanLike(process.env.OTPVIEW_TUI_CONFIG_STRICT)
  const strict = options.cliStrict ?? strictFromEnv ?? false
  const warnings: string[] = []
  const sources: string[] = ["defaults"]
  let merged: TuiConfigInput = {}

  const applyLayer = (layer: TuiConfigInput, source: string) => {
    if (Object.keys(layer).length === 0) return
    merged = { ...merged, ...layer }
    sources.push(source)
  }

  const workspace = options.workspace?.trim() || process.cwd()
  const repoConfigPath = path.join(workspace, "otpview.tui.yaml")
  const repoLayer = await readYamlInput(repoConfigPath, strict)
  warnings.push(...repoLayer.warnings.map((line) => `${repoConfigPath}: ${line}`))
  applyLayer(repoLayer.config, `repo:${repoConfigPath}`)

  const userConfigPath = resolveUserConfigPath()
  const userLayer = await readYamlInput(userConfigPath, strict)
  warnings.push(...userLayer.warnings.map((line) => `${userConfigPath}: ${line}`))
  applyLayer(userLayer.config, `user:${userConfigPath}`)

  const cliConfigPath = options.cliConfigPath?.trim()
  if (cliConfigPath) {
    const resolvedCliPath = path.isAbsolute(cliConfigPath) ? cliConfigPath : path.resolve(process.cwd(), cliConfigPath)
    const cliLayer = await readYamlInput(resolvedCliPath, strict)
    warnings.push(...cliLayer.warnings.map((line) => `${resolvedCliPath}: ${line}`))
    applyLayer(cliLayer.config, `cli-config:${resolvedCliPath}`)
  }

  applyLayer(envConfigLayer(strict), "env")
  applyLayer(options.cliOverrides ?? {}, "cli")

  const colorAllowed = options.colorAllowed ?? true
  const noColorRequested = Boolean(process.env.NO_COLOR)
  const requestedColorMode = merged.colorMode ?? DEFAULT_TUI_CONFIG.colorMode
  return {
    lowTimeSeconds: merged.lowTimeSeconds ?? DEFAULT_TUI_CONFIG.lowTimeSeconds,
    listPollMs: merged.listPollMs ?? DEFAULT_TUI_CONFIG.listPollMs,
    revealPollMs: merged.revealPollMs ?? DEFAULT_TUI_CONFIG.revealPollMs,
    sortBy: merged.sortBy ?? DEFAULT_TUI_CONFIG.sortBy,
    asciiOnly: merged.asciiOnly ?? DEFAULT_TUI_CONFIG.asciiOnly,
    colorMode: !colorAllowed || noColorRequested ? "none" : requestedColorMode,
    meta: { strict, warnings, sources },
  }
}
