import { describe, expect, it } from "vitest"
import { buildEntryIndex } from "../../vault/entryIndex.js"
import { ALL_GROUPS_LABEL, filterEntries, filterGroups } from "../filter.js"
import { PERSONAL_GROUP, WORK_GROUP, sampleVaultDb } from "../../../tests/fixtures/sampleVault.js"

const index = buildEntryIndex(sampleVaultDb())
const uuids = (term: string, group: typeof WORK_GROUP | null = null) =>
  filterEntries(index, term, group).rows.map((row) => row.entry.uuid)

describe("filterEntries", () => {
  it("keeps every entry in vault order for an empty term", () => {
    const view = filterEntries(index, "", null)
    expect(view.rows.map((row) => row.rowNumber)).toEqual([1, 2, 3, 4])
    expect(view.rows.map((row) => row.entry.uuid)).toEqual(["entry-github", "entry-dropbox", "entry-google", "entry-counter"])
    expect(view.jumpRow).toBeNull()
  })

  it("matches issuer, name, group name and note case-insensitively", () => {
    expect(uuids("GOOGLE")).toEqual(["entry-google"])
    expect(uuids("alice")).toEqual(["entry-github", "entry-dropbox", "entry-google"])
    expect(uuids("work")).toEqual(["entry-github"])
    expect(uuids("shared")).toEqual(["entry-dropbox"])
    expect(uuids("nothing-like-this")).toEqual([])
  })

  it("renumbers the remaining rows contiguously", () => {
    const view = filterEntries(index, "personal", null)
    expect(view.rows.map((row) => [row.rowNumber, row.entry.uuid])).toEqual([
      [1, "entry-dropbox"],
      [2, "entry-google"],
    ])
  })

  it("treats an in-range number as a row jump over the unchanged view", () => {
    const view = filterEntries(index, "3", null)
    expect(view.rows).toHaveLength(4)
    expect(view.jumpRow).toBe(2)
  })

  it("falls back to text matching for out-of-range numbers", () => {
    expect(filterEntries(index, "0", null).jumpRow).toBeNull()
    expect(filterEntries(index, "5", null)).toEqual({ rows: [], jumpRow: null })
  })

  it("bounds numeric jumps by the group-restricted view", () => {
    expect(filterEntries(index, "2", PERSONAL_GROUP).jumpRow).toBe(1)
    expect(filterEntries(index, "2", WORK_GROUP).jumpRow).toBeNull()
  })

  it("restricts to the active group before matching", () => {
    expect(uuids("", PERSONAL_GROUP)).toEqual(["entry-dropbox", "entry-google"])
    expect(uuids("alice", WORK_GROUP)).toEqual(["entry-github"])
  })

  it("always yields an ordered subset and is idempotent", () => {
    const terms = ["", "a", "al", "e", "oo", "x", "1", "4", "9", "card"]
    for (const term of terms) {
      const first = filterEntries(index, term, null)
      const second = filterEntries(index, term, null)
      expect(second).toEqual(first)
      const positions = first.rows.map((row) => row.entry.originalIndex)
      expect([...positions].sort((a, b) => a - b)).toEqual(positions)
      expect(first.rows.map((row) => row.rowNumber)).toEqual(first.rows.map((_, idx) => idx + 1))
    }
  })
})

describe("filterGroups", () => {
  it("puts the All OTPs choice first and filters group names", () => {
    expect(filterGroups(index.groups, "").map((choice) => choice.label)).toEqual([ALL_GROUPS_LABEL, "Personal", "Work"])
    expect(filterGroups(index.groups, "WO").map((choice) => choice.label)).toEqual([ALL_GROUPS_LABEL, "Work"])
    expect(filterGroups(index.groups, "zzz")).toEqual([{ group: null, label: ALL_GROUPS_LABEL }])
  })
})
