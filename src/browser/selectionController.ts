import type { EntryIndex } from "../vault/entryIndex.js"
import type { VaultGroup } from "../vault/types.js"
import { filterEntries, filterGroups, type FilteredView, type GroupChoice } from "./filter.js"
import type { InputEvent } from "./keys.js"
import { clampScroll } from "./viewport.js"

export type BrowserMode = "list" | "groupSelect" | "reveal"

export interface SelectionState {
  readonly mode: BrowserMode
  readonly searchTerm: string
  /** -1 exactly when the filtered view is empty. */
  readonly selectedRow: number
  readonly scrollOffset: number
  readonly activeGroupUuid: string | null
  readonly revealedUuid: string | null
  /** Set by cursor keys and numeric jumps; cleared whenever the search term or group changes. */
  readonly cursorExplicit: boolean
  readonly groupSearchTerm: string
  readonly groupSelectedRow: number
  readonly groupScrollOffset: number
}

export interface ControllerContext {
  readonly index: EntryIndex
  readonly viewportHeight: number
}

export type RedrawRequest = "none" | "dirty" | "full"

export type ControllerEffect =
  | { readonly kind: "reveal"; readonly uuid: string }
  | { readonly kind: "copy"; readonly uuid: string }

export interface TransitionResult {
  readonly state: SelectionState
  readonly redraw: RedrawRequest
  readonly quit: boolean
  readonly effects: readonly ControllerEffect[]
}

export const activeGroupOf = (state: SelectionState, index: EntryIndex): VaultGroup | null =>
  state.activeGroupUuid ? index.groupByUuid(state.activeGroupUuid) ?? null : null

export const viewOf = (state: SelectionState, index: EntryIndex): FilteredView =>
  filterEntries(index, state.searchTerm, activeGroupOf(state, index))

export const groupChoicesOf = (state: SelectionState, index: EntryIndex): readonly GroupChoice[] =>
  filterGroups(index.groups, state.groupSearchTerm)

export const selectedEntryUuid = (state: SelectionState, index: EntryIndex): string | null => {
  if (state.selectedRow < 0) return null
  return viewOf(state, index).rows[state.selectedRow]?.entry.uuid ?? null
}

const clampRow = (row: number, total: number): number => (total === 0 ? -1 : Math.max(0, Math.min(row, total - 1)))

/** Re-establishes the selection and scroll invariants against the current view and viewport height. */
export const settle = (state: SelectionState, context: ControllerContext): SelectionState => {
  const view = viewOf(state, context.index)
  const selectedRow = clampRow(state.selectedRow, view.rows.length)
  const scrollOffset = clampScroll(state.scrollOffset, selectedRow, context.viewportHeight, view.rows.length)
  const choices = groupChoicesOf(state, context.index)
  const groupSelectedRow = clampRow(state.groupSelectedRow, choices.length)
  const groupScrollOffset = clampScroll(state.groupScrollOffset, groupSelectedRow, context.viewportHeight, choices.length)
  if (
    selectedRow === state.selectedRow &&
    scrollOffset === state.scrollOffset &&
    groupSelectedRow === state.groupSelectedRow &&
    groupScrollOffset === state.groupScrollOffset
  ) {
    return state
  }
  return { ...state, selectedRow, scrollOffset, groupSelectedRow, groupScrollOffset }
}

export interface InitialSelection {
  readonly activeGroupUuid?: string | null
  readonly revealedUuid?: string | null
}

export const createInitialState = (context: ControllerContext, initial: InitialSelection = {}): SelectionState =>
  settle(
    {
      mode: initial.revealedUuid ? "reveal" : "list",
      searchTerm: "",
      selectedRow: 0,
      scrollOffset: 0,
      activeGroupUuid: initial.activeGroupUuid ?? null,
      revealedUuid: initial.revealedUuid ?? null,
      cursorExplicit: false,
      groupSearchTerm: "",
      groupSelectedRow: 0,
      groupScrollOffset: 0,
    },
    context,
  )

/** Enter reveals an explicitly selected row, or the only row left by a non-empty search. */
export const canReveal = (state: SelectionState, view: FilteredView): boolean => {
  if (view.rows.length === 0 || state.selectedRow < 0) return false
  if (state.cursorExplicit) return true
  return view.rows.length === 1 && state.searchTerm.length > 0
}

const unchanged = (state: SelectionState): TransitionResult => ({ state, redraw: "none", quit: false, effects: [] })

const result = (
  state: SelectionState,
  context: ControllerContext,
  redraw: RedrawRequest,
  effects: readonly ControllerEffect[] = [],
): TransitionResult => ({ state: settle(state, context), redraw, quit: false, effects })

// A new search term or group resets the cursor to the top, or to the row a numeric term names.
const withSearch = (state: SelectionState, context: ControllerContext, searchTerm: string, activeGroupUuid: string | null): SelectionState => {
  const next = { ...state, searchTerm, activeGroupUuid, scrollOffset: 0 }
  const view = viewOf(next, context.index)
  return {
    ...next,
    selectedRow: view.jumpRow ?? (view.rows.length > 0 ? 0 : -1),
    cursorExplicit: view.jumpRow !== null,
  }
}

const moveCursor = (state: SelectionState, context: ControllerContext, delta: number): TransitionResult => {
  const total = viewOf(state, context.index).rows.length
  if (total === 0) return unchanged(state)
  return result({ ...state, selectedRow: clampRow(state.selectedRow + delta, total), cursorExplicit: true }, context, "dirty")
}

const listTransition = (state: SelectionState, input: InputEvent, context: ControllerContext): TransitionResult => {
  switch (input.kind) {
    case "char":
      return result(withSearch(state, context, state.searchTerm + input.char, state.activeGroupUuid), context, "dirty")
    case "backspace":
      if (state.searchTerm.length === 0) return unchanged(state)
      return result(withSearch(state, context, [...state.searchTerm].slice(0, -1).join(""), state.activeGroupUuid), context, "dirty")
    case "up":
      return moveCursor(state, context, -1)
    case "down":
      return moveCursor(state, context, 1)
    case "pageUp":
      return moveCursor(state, context, -Math.max(1, context.viewportHeight))
    case "pageDown":
      return moveCursor(state, context, Math.max(1, context.viewportHeight))
    case "enter": {
      const view = viewOf(state, context.index)
      if (!canReveal(state, view)) return unchanged(state)
      const uuid = view.rows[state.selectedRow]?.entry.uuid
      if (uuid === undefined) return unchanged(state)
      return result({ ...state, mode: "reveal", revealedUuid: uuid }, context, "full", [{ kind: "reveal", uuid }])
    }
    case "escape":
      if (state.searchTerm.length === 0 && state.activeGroupUuid === null) return unchanged(state)
      return result(withSearch(state, context, "", null), context, "dirty")
    case "toggleGroups":
      return result(
        { ...state, mode: "groupSelect", groupSearchTerm: "", groupSelectedRow: 0, groupScrollOffset: 0 },
        context,
        "full",
      )
    default:
      return unchanged(state)
  }
}

const backToList = (state: SelectionState, context: ControllerContext, activeGroupUuid: string | null): TransitionResult =>
  result(
    { ...withSearch(state, context, "", activeGroupUuid), mode: "list", revealedUuid: null, groupSearchTerm: "" },
    context,
    "full",
  )

const groupTransition = (state: SelectionState, input: InputEvent, context: ControllerContext): TransitionResult => {
  const choices = groupChoicesOf(state, context.index)
  const moveGroup = (delta: number): TransitionResult =>
    result({ ...state, groupSelectedRow: clampRow(state.groupSelectedRow + delta, choices.length) }, context, "dirty")
  switch (input.kind) {
    case "up":
      return moveGroup(-1)
    case "down":
      return moveGroup(1)
    case "pageUp":
      return moveGroup(-Math.max(1, context.viewportHeight))
    case "pageDown":
      return moveGroup(Math.max(1, context.viewportHeight))
    case "char":
      return result(
        { ...state, groupSearchTerm: state.groupSearchTerm + input.char, groupSelectedRow: 0, groupScrollOffset: 0 },
        context,
        "dirty",
      )
    case "backspace":
      if (state.groupSearchTerm.length === 0) return unchanged(state)
      return result(
        { ...state, groupSearchTerm: [...state.groupSearchTerm].slice(0, -1).join(""), groupSelectedRow: 0, groupScrollOffset: 0 },
        context,
        "dirty",
      )
    case "enter": {
      const choice = choices[state.groupSelectedRow]
      if (!choice) return unchanged(state)
      return backToList(state, context, choice.group?.uuid ?? null)
    }
    case "escape":
    case "toggleGroups":
      return backToList(state, context, null)
    default:
      return unchanged(state)
  }
}

const revealTransition = (state: SelectionState, input: InputEvent, context: ControllerContext): TransitionResult => {
  switch (input.kind) {
    case "escape":
    case "backspace": {
      const rows = viewOf(state, context.index).rows
      const revealedRow = rows.findIndex((row) => row.entry.uuid === state.revealedUuid)
      return result(
        {
          ...state,
          mode: "list",
          revealedUuid: null,
          selectedRow: revealedRow >= 0 ? revealedRow : state.selectedRow,
        },
        context,
        "full",
      )
    }
    case "char":
      if (input.char.toLowerCase() === "c" && state.revealedUuid) {
        return { state, redraw: "none", quit: false, effects: [{ kind: "copy", uuid: state.revealedUuid }] }
      }
      return unchanged(state)
    default:
      return unchanged(state)
  }
}

/** Total over every state and input: never throws, always leaves the selection invariants intact. */
export const transition = (state: SelectionState, input: InputEvent, context: ControllerContext): TransitionResult => {
  if (input.kind === "quit") return { state, redraw: "none", quit: true, effects: [] }
  if (input.kind === "resize") return result(state, context, "full")
  switch (state.mode) {
    case "list":
      return listTransition(state, input, context)
    case "groupSelect":
      return groupTransition(state, input, context)
    case "reveal":
      return revealTransition(state, input, context)
  }
}
