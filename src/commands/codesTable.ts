import { filterEntries } from "../browser/filter.js"
import { displayedSeconds } from "../browser/revealSession.js"
import { DEFAULT_PERIOD_SECONDS, msUntilNextWindow, type OtpProvider } from "../otp/provider.js"
import type { EntryIndex } from "../vault/entryIndex.js"
import type { CommandSelection } from "./selection.js"

export interface CodeRow {
  readonly uuid: string
  readonly issuer: string
  readonly name: string
  readonly code: string
  readonly group: string
  readonly note: string
  /** Null for counter-based entries. */
  readonly msUntilNext: number | null
}

export const buildCodeRows = (
  index: EntryIndex,
  provider: OtpProvider,
  now: number,
  selection: CommandSelection,
): CodeRow[] => {
  const entries = selection.entry ? [selection.entry] : filterEntries(index, "", selection.group).rows.map((row) => row.entry)
  return entries.map((entry) => {
    let code = "Error"
    let msUntilNext: number | null = null
    try {
      const result = provider.compute(entry, now)
      code = result.code
      msUntilNext = result.kind === "time" ? result.msUntilNext : null
    } catch {
      // The row stays in the listing with "Error" in place of the code.
    }
    return {
      uuid: entry.uuid,
      issuer: entry.issuer,
      name: entry.name,
      code,
      group: entry.groupLabel,
      note: entry.note,
      msUntilNext,
    }
  })
}

export const formatCodesTable = (rows: readonly CodeRow[], now: number): string => {
  if (rows.length === 0) {
    return "No entries found."
  }
  const headers = ["Issuer", "Name", "Code", "Group", "Note"]
  const data = rows.map((row) => [row.issuer, row.name, row.code, row.group, row.note])
  const widths = headers.map((header, index) => Math.max(header.length, ...data.map((row) => row[index]?.length ?? 0)))
  const formatRow = (cells: readonly string[]) =>
    cells
      .map((cell, index) => cell.padEnd(widths[index] ?? 0, " "))
      .join("  ")
      .trimEnd()
  const lines = [formatRow(headers), formatRow(widths.map((width) => "".padEnd(width, "-")))]
  for (const row of data) {
    lines.push(formatRow(row))
  }
  const seconds = displayedSeconds(msUntilNextWindow(now, DEFAULT_PERIOD_SECONDS * 1000))
  lines.push("", `Time until next refresh: ${seconds}s`)
  return lines.join("\n")
}

export const formatCodesJson = (rows: readonly CodeRow[]): string => JSON.stringify(rows, null, 2)
