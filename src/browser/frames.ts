import stripAnsi from "strip-ansi"
import type { EntryIndex, IndexedEntry } from "../vault/entryIndex.js"
import type { SceneLine, Scene, SurfaceSize } from "./renderGate.js"
import { displayedSeconds, type RevealSession } from "./revealSession.js"
import { activeGroupOf, groupChoicesOf, viewOf, type SelectionState } from "./selectionController.js"
import type { BrowserTheme } from "./theme.js"
import { createListWindow, formatListRange, listViewportHeight } from "./viewport.js"

const visibleLength = (text: string): number => [...stripAnsi(text)].length

const cell = (text: string, width: number): string => {
  const chars = [...text]
  if (width <= 0) return ""
  return chars.length > width ? chars.slice(0, width).join("") : text + " ".repeat(width - chars.length)
}

const padVisible = (styled: string, width: number): string => {
  const length = visibleLength(styled)
  if (length > width) return cell(stripAnsi(styled), width)
  return styled + " ".repeat(width - length)
}

const innerWidth = (size: SurfaceSize) => Math.max(0, size.columns - 4)

const boxTop = (theme: BrowserTheme, size: SurfaceSize) =>
  theme.glyphs.topLeft + theme.glyphs.horizontal.repeat(Math.max(0, size.columns - 2)) + theme.glyphs.topRight

const boxBottom = (theme: BrowserTheme, size: SurfaceSize) =>
  theme.glyphs.bottomLeft + theme.glyphs.horizontal.repeat(Math.max(0, size.columns - 2)) + theme.glyphs.bottomRight

const boxLine = (theme: BrowserTheme, size: SurfaceSize, content: string) =>
  `${theme.glyphs.vertical} ${padVisible(content, innerWidth(size))} ${theme.glyphs.vertical}`

const boxRule = (theme: BrowserTheme, size: SurfaceSize) => boxLine(theme, size, theme.glyphs.horizontal.repeat(innerWidth(size)))

const padRows = (rows: string[], count: number, blank: string): string[] => {
  while (rows.length < count) rows.push(blank)
  return rows
}

export interface ListFrameInput {
  readonly state: SelectionState
  readonly index: EntryIndex
  readonly theme: BrowserTheme
  readonly vaultLabel: string
}

interface ColumnLayout {
  readonly number: number
  readonly issuer: number
  readonly name: number
  readonly group: number
}

const columnLayout = (size: SurfaceSize, total: number): ColumnLayout => {
  const number = Math.max(2, String(total).length)
  // Marker, space, and one space after each of the number, issuer and name columns.
  const rest = Math.max(0, innerWidth(size) - number - 5)
  const issuer = Math.floor(rest * 0.35)
  const group = Math.floor(rest * 0.25)
  return { number, issuer, name: rest - issuer - group, group }
}

const listTitle = (input: ListFrameInput): string => {
  const group = activeGroupOf(input.state, input.index)
  const title = `otpview: ${input.vaultLabel}${group ? ` (group: ${group.name})` : ""}`
  return input.theme.chalk.bold(title)
}

export const buildListScene = (input: ListFrameInput, size: SurfaceSize): Scene => {
  const { state, index, theme } = input
  const view = viewOf(state, index)
  const height = listViewportHeight(size.rows)
  const window = createListWindow(view.rows, state.scrollOffset, height)
  const layout = columnLayout(size, view.rows.length)
  const header = `  ${cell("#", layout.number)} ${cell("Issuer", layout.issuer)} ${cell("Name", layout.name)} ${cell("Group", layout.group)}`
  const rows = window.visible.map((row, offset) => {
    const selected = window.start + offset === state.selectedRow
    const marker = selected ? theme.glyphs.select : " "
    const text = `${marker} ${String(row.rowNumber).padStart(layout.number)} ${cell(row.entry.issuer, layout.issuer)} ${cell(
      row.entry.name,
      layout.name,
    )} ${cell(row.entry.groupLabel, layout.group)}`
    return boxLine(theme, size, selected ? theme.chalk.inverse(text) : text)
  })
  if (view.rows.length === 0) {
    rows.push(boxLine(theme, size, theme.chalk.dim("No matching entries")))
  }
  const help = `${theme.glyphs.up}/${theme.glyphs.down} move  Enter reveal  Ctrl+G groups  Esc clear  Ctrl+C quit  ${formatListRange(window)}`
  const prompt = `Search: ${state.searchTerm}`
  return {
    lines: [
      listTitle(input),
      boxTop(theme, size),
      boxLine(theme, size, theme.chalk.bold(header)),
      boxRule(theme, size),
      ...padRows(rows, height, boxLine(theme, size, "")),
      boxBottom(theme, size),
      theme.chalk.dim(help),
      prompt,
    ],
    countdown: null,
  }
}

export const buildGroupScene = (input: ListFrameInput, size: SurfaceSize): Scene => {
  const { state, index, theme } = input
  const choices = groupChoicesOf(state, index)
  const height = listViewportHeight(size.rows)
  const window = createListWindow(choices, state.groupScrollOffset, height)
  const rows = window.visible.map((choice, offset) => {
    const selected = window.start + offset === state.groupSelectedRow
    const active = (choice.group?.uuid ?? null) === state.activeGroupUuid
    const text = `${selected ? theme.glyphs.select : " "} ${choice.label}${active ? " *" : ""}`
    return boxLine(theme, size, selected ? theme.chalk.inverse(text) : text)
  })
  return {
    lines: [
      theme.chalk.bold(`otpview: ${input.vaultLabel} (select group)`),
      boxTop(theme, size),
      boxLine(theme, size, theme.chalk.bold("  Group")),
      boxRule(theme, size),
      ...padRows(rows, height, boxLine(theme, size, "")),
      boxBottom(theme, size),
      theme.chalk.dim(`${theme.glyphs.up}/${theme.glyphs.down} move  Enter apply  Esc/Ctrl+G back  Ctrl+C quit  ${formatListRange(window)}`),
      `Group filter: ${state.groupSearchTerm}`,
    ],
    countdown: null,
  }
}

export interface RevealFrameInput {
  readonly entry: IndexedEntry
  readonly session: RevealSession
  readonly theme: BrowserTheme
  readonly vaultLabel: string
  readonly lowTimeSeconds: number
  readonly notice?: string | null
}

export const REVEAL_CODE_ROW = 6
export const REVEAL_TIME_ROW = 7

const codeLine = (input: RevealFrameInput): string => {
  const { session, theme } = input
  if (!session.code.ok) return `Code:   ${theme.chalk.red.bold("Error")}`
  return `Code:   ${theme.chalk.bold(session.code.result.code)}`
}

const timeLine = (input: RevealFrameInput): string => {
  const { session, theme } = input
  if (!session.code.ok) return theme.chalk.red(session.code.error)
  const result = session.code.result
  if (result.kind === "counter") return `Counter: ${result.counter}`
  const seconds = displayedSeconds(session.msUntilNext)
  const paint = seconds < input.lowTimeSeconds ? theme.chalk.red.bold : theme.chalk.green
  return `Time until next refresh: ${paint(`${seconds}s`)}`
}

export const buildRevealScene = (input: RevealFrameInput, size: SurfaceSize): Scene => {
  const { entry, theme } = input
  const countdown: SceneLine[] = [
    { row: REVEAL_CODE_ROW, text: boxLine(theme, size, codeLine(input)) },
    { row: REVEAL_TIME_ROW, text: boxLine(theme, size, timeLine(input)) },
  ]
  const help = `Esc/Backspace back  c copy  Ctrl+C quit${input.notice ? `  ${input.notice}` : ""}`
  return {
    lines: [
      theme.chalk.bold(`otpview: ${input.vaultLabel}`),
      boxTop(theme, size),
      boxLine(theme, size, `Issuer: ${entry.issuer}`),
      boxLine(theme, size, `Name:   ${entry.name}`),
      boxLine(theme, size, `Group:  ${entry.groupLabel || "-"}`),
      boxLine(theme, size, `Note:   ${entry.note || "-"}`),
      ...countdown.map((line) => line.text),
      boxBottom(theme, size),
      theme.chalk.dim(help),
    ],
    countdown: input.session.code.ok && input.session.code.result.kind === "time" ? countdown : null,
  }
}
