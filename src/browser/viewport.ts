export interface ListWindow<T> {
  readonly total: number
  readonly viewport: number
  readonly maxScroll: number
  readonly scroll: number
  readonly start: number
  readonly end: number
  readonly visible: ReadonlyArray<T>
}

// Title, box top, column header, rule, box bottom, help line, prompt.
const LIST_CHROME_ROWS = 7

export const listViewportHeight = (terminalRows: number): number => {
  const rows = Number.isFinite(terminalRows) ? Math.floor(terminalRows) : 0
  return Math.max(1, rows - LIST_CHROME_ROWS)
}

const wholeOrZero = (value: number): number => (Number.isFinite(value) ? Math.floor(value) : 0)

/**
 * Keeps the selected row inside `[scroll, scroll + height)` while the offset stays within
 * `[0, max(0, total - height)]`. A selection of -1 (empty view) only clamps the offset.
 */
export const clampScroll = (scrollOffset: number, selectedRow: number, viewportHeight: number, totalRows: number): number => {
  const height = Math.max(1, wholeOrZero(viewportHeight))
  const total = Math.max(0, wholeOrZero(totalRows))
  const maxScroll = Math.max(0, total - height)
  let scroll = Math.max(0, Math.min(wholeOrZero(scrollOffset), maxScroll))
  if (total === 0) return 0
  const selected = Math.max(0, Math.min(wholeOrZero(selectedRow), total - 1))
  if (selected < scroll) scroll = selected
  if (selected >= scroll + height) scroll = selected - height + 1
  return Math.max(0, Math.min(scroll, maxScroll))
}

export const createListWindow = <T>(rows: ReadonlyArray<T>, scrollOffset: number, viewportHeight: number): ListWindow<T> => {
  const total = rows.length
  const viewport = Math.max(1, wholeOrZero(viewportHeight))
  const maxScroll = Math.max(0, total - viewport)
  const scroll = Math.max(0, Math.min(wholeOrZero(scrollOffset), maxScroll))
  const end = Math.min(total, scroll + viewport)
  return { total, viewport, maxScroll, scroll, start: scroll, end, visible: rows.slice(scroll, end) }
}

export const formatListRange = (window: ListWindow<unknown>): string => {
  if (window.total <= 0) return "0-0 of 0"
  return `${window.start + 1}-${window.end} of ${window.total}`
}
