import { describe, expect, it } from "vitest"
import { OtpComputationError } from "../../errors.js"
import type { OtpProvider } from "../../otp/provider.js"
import { buildEntryIndex } from "../../vault/entryIndex.js"
import { buildCodeRows, formatCodesJson, formatCodesTable, type CodeRow } from "../codesTable.js"
import { windowProvider } from "../../../tests/fixtures/fakes.js"
import { PERSONAL_GROUP, sampleVaultDb } from "../../../tests/fixtures/sampleVault.js"

const index = buildEntryIndex(sampleVaultDb())

const row = (overrides: Partial<CodeRow>): CodeRow => ({
  uuid: "entry",
  issuer: "",
  name: "",
  code: "",
  group: "",
  note: "",
  msUntilNext: 4_500,
  ...overrides,
})

describe("buildCodeRows", () => {
  it("lists the active group's entries with their current codes", () => {
    const rows = buildCodeRows(index, windowProvider, 25_500, { group: PERSONAL_GROUP, entry: null })
    expect(rows).toEqual([
      {
        uuid: "entry-dropbox",
        issuer: "Dropbox",
        name: "alice",
        code: "code-0",
        group: "Personal",
        note: "shared folder",
        msUntilNext: 4_500,
      },
      {
        uuid: "entry-google",
        issuer: "Google",
        name: "alice@gmail.com",
        code: "code-0",
        group: "Personal",
        note: "",
        msUntilNext: 4_500,
      },
    ])
  })

  it("limits the listing to one entry and marks failures", () => {
    const failing: OtpProvider = {
      compute: (entry) => {
        throw new OtpComputationError(entry.uuid, "bad secret")
      },
    }
    const entry = index.byUuid("entry-counter") ?? null
    const rows = buildCodeRows(index, failing, 0, { group: null, entry })
    expect(rows).toHaveLength(1)
    expect(rows[0]).toMatchObject({ uuid: "entry-counter", code: "Error", msUntilNext: null })
  })
})

describe("formatCodesTable", () => {
  it("aligns columns and ends with the refresh countdown", () => {
    const table = formatCodesTable(
      [
        row({ issuer: "GitHub", name: "alice@example.com", code: "123456", group: "Work" }),
        row({ issuer: "Dropbox", name: "alice", code: "654321", group: "Personal", note: "shared folder" }),
      ],
      25_500,
    )
    expect(table.split("\n")).toEqual([
      "Issuer   Name               Code    Group     Note",
      "-------  -----------------  ------  --------  -------------",
      "GitHub   alice@example.com  123456  Work",
      "Dropbox  alice              654321  Personal  shared folder",
      "",
      "Time until next refresh: 4s",
    ])
  })

  it("reports an empty listing", () => {
    expect(formatCodesTable([], 0)).toBe("No entries found.")
  })
})

describe("formatCodesJson", () => {
  it("prints the rows as a JSON array", () => {
    const rows = [row({ uuid: "entry-github", code: "123456", msUntilNext: null })]
    expect(JSON.parse(formatCodesJson(rows))).toEqual(rows)
  })
})
