import type { OtpInfo, VaultDb, VaultGroup } from "./types.js"

export type EntrySort = "vault" | "name"

export interface IndexedEntry {
  readonly uuid: string
  readonly type: string
  readonly issuer: string
  readonly name: string
  readonly groupIds: readonly string[]
  /** Resolved group names joined with ", "; unknown uuids fall back to the uuid itself. */
  readonly groupLabel: string
  readonly note: string
  /** Position in the vault file. */
  readonly originalIndex: number
  readonly info: OtpInfo
  /** Lower-cased haystack for incremental search. */
  readonly searchText: string
}

export interface EntryIndex {
  readonly entries: readonly IndexedEntry[]
  readonly groups: readonly VaultGroup[]
  byUuid(uuid: string): IndexedEntry | undefined
  groupByUuid(uuid: string): VaultGroup | undefined
}

export const buildEntryIndex = (db: VaultDb, options: { sortBy?: EntrySort } = {}): EntryIndex => {
  const groupNames = new Map(db.groups.map((group) => [group.uuid, group.name]))
  const indexed = db.entries.map((entry, originalIndex): IndexedEntry => {
    const groupLabel = entry.groups.map((id) => groupNames.get(id) ?? id).join(", ")
    return Object.freeze({
      uuid: entry.uuid,
      type: entry.type,
      issuer: entry.issuer,
      name: entry.name,
      groupIds: Object.freeze([...entry.groups]),
      groupLabel,
      note: entry.note,
      originalIndex,
      info: entry.info,
      searchText: [entry.issuer, entry.name, groupLabel, entry.note].join(" ").toLowerCase(),
    })
  })
  if (options.sortBy === "name") {
    indexed.sort((a, b) => {
      const left = a.name.toLowerCase()
      const right = b.name.toLowerCase()
      if (left === right) return a.originalIndex - b.originalIndex
      return left < right ? -1 : 1
    })
  }
  const entries = Object.freeze(indexed)
  const groups = Object.freeze(
    [...db.groups].sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase())),
  )
  const entryMap = new Map(entries.map((entry) => [entry.uuid, entry]))
  const groupMap = new Map(groups.map((group) => [group.uuid, group]))
  return {
    entries,
    groups,
    byUuid: (uuid) => entryMap.get(uuid),
    groupByUuid: (uuid) => groupMap.get(uuid),
  }
}

export const findGroupByName = (index: EntryIndex, name: string): VaultGroup | undefined => {
  const wanted = name.trim().toLowerCase()
  return index.groups.find((group) => group.name.toLowerCase() === wanted)
}
