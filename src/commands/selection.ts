import { UsageError } from "../errors.js"
import { findGroupByName, type EntryIndex, type IndexedEntry } from "../vault/entryIndex.js"
import type { VaultGroup } from "../vault/types.js"

export interface CommandSelection {
  readonly group: VaultGroup | null
  readonly entry: IndexedEntry | null
}

/** Resolves `--group` (case-insensitive name) and `--uuid` against the opened vault. */
export const resolveCommandSelection = (
  index: EntryIndex,
  groupName: string | null,
  uuid: string | null,
): CommandSelection => {
  let group: VaultGroup | null = null
  if (groupName != null) {
    group = findGroupByName(index, groupName) ?? null
    if (group === null) {
      const available = index.groups.map((candidate) => candidate.name)
      throw new UsageError(
        available.length > 0
          ? `Unknown group "${groupName}". Available groups: ${available.join(", ")}`
          : `Unknown group "${groupName}". The vault has no groups.`,
      )
    }
  }
  let entry: IndexedEntry | null = null
  if (uuid != null) {
    entry = index.byUuid(uuid) ?? null
    if (entry === null) throw new UsageError(`No entry with uuid ${uuid}`)
  }
  return { group, entry }
}
