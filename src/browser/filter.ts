import type { EntryIndex, IndexedEntry } from "../vault/entryIndex.js"
import type { VaultGroup } from "../vault/types.js"

export interface FilteredRow {
  readonly entry: IndexedEntry
  /** 1-based and contiguous within the view. */
  readonly rowNumber: number
}

export interface FilteredView {
  readonly rows: readonly FilteredRow[]
  /** Zero-based row picked by a numeric search term, or null when the term is matched as text. */
  readonly jumpRow: number | null
}

const NUMERIC_TERM = /^\d+$/

const numberRows = (entries: readonly IndexedEntry[]): FilteredRow[] =>
  entries.map((entry, index) => ({ entry, rowNumber: index + 1 }))

/**
 * Pure view derivation: group restriction, then either a numeric row jump or a
 * case-insensitive substring match over issuer, name, group names and note.
 */
export const filterEntries = (
  index: EntryIndex,
  searchTerm: string,
  activeGroup: VaultGroup | null,
): FilteredView => {
  const scoped = activeGroup
    ? index.entries.filter((entry) => entry.groupIds.includes(activeGroup.uuid))
    : index.entries
  if (searchTerm.length === 0) {
    return { rows: numberRows(scoped), jumpRow: null }
  }
  if (NUMERIC_TERM.test(searchTerm)) {
    const requested = Number.parseInt(searchTerm, 10)
    if (requested >= 1 && requested <= scoped.length) {
      return { rows: numberRows(scoped), jumpRow: requested - 1 }
    }
  }
  const needle = searchTerm.toLowerCase()
  return { rows: numberRows(scoped.filter((entry) => entry.searchText.includes(needle))), jumpRow: null }
}

export const ALL_GROUPS_LABEL = "-- All OTPs --"

export interface GroupChoice {
  /** null is the synthetic "All OTPs" choice that clears the group filter. */
  readonly group: VaultGroup | null
  readonly label: string
}

/** Group picker rows: "All OTPs" first, then groups whose name contains the term. */
export const filterGroups = (groups: readonly VaultGroup[], searchTerm: string): readonly GroupChoice[] => {
  const needle = searchTerm.toLowerCase()
  const matching = groups.filter((group) => group.name.toLowerCase().includes(needle))
  return [{ group: null, label: ALL_GROUPS_LABEL }, ...matching.map((group) => ({ group, label: group.name }))]
}
