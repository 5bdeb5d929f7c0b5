import { describe, expect, it } from "vitest"
import { VaultFormatError } from "../../errors.js"
import { parseVaultDb, parseVaultFile, serializeVaultDb } from "../parse.js"
import { sampleVaultDb } from "../../../tests/fixtures/sampleVault.js"

const entry = (overrides: Record<string, unknown> = {}) => ({
  type: "TOTP",
  uuid: "entry-1",
  name: "alice",
  issuer: "Example",
  info: { secret: "JBSWY3DPEHPK3PXP", algo: "sha256", digits: 8, period: 60 },
  ...overrides,
})

describe("parseVaultDb", () => {
  it("normalizes type and algorithm and fills optional fields", () => {
    const db = parseVaultDb({ version: 2, entries: [entry()] })
    expect(db).toEqual({
      version: 2,
      groups: [],
      entries: [
        {
          type: "totp",
          uuid: "entry-1",
          name: "alice",
          issuer: "Example",
          note: "",
          favorite: false,
          info: { secret: "JBSWY3DPEHPK3PXP", algo: "SHA256", digits: 8, period: 60, counter: null, pin: null },
          groups: [],
        },
      ],
    })
  })

  it("accepts the single-group field of older exports", () => {
    const db = parseVaultDb({ entries: [entry({ group: "Work" })] })
    expect(db.entries[0]?.groups).toEqual(["Work"])
    expect(db.version).toBe(1)
  })

  it("names the offending path", () => {
    expect(() => parseVaultDb({ entries: [entry({ info: { secret: "A", algo: "SHA3" } })] })).toThrow(
      new VaultFormatError("Invalid vault: db.entries[0].info.algo uses unsupported algorithm SHA3"),
    )
    expect(() => parseVaultDb({ entries: "none" })).toThrow("Invalid vault: db.entries must be an array")
    expect(() => parseVaultDb({ entries: [entry(), entry()] })).toThrow("contains duplicate entry uuid entry-1")
  })

  it("reads back what it serializes", () => {
    expect(parseVaultDb(serializeVaultDb(sampleVaultDb()))).toEqual(sampleVaultDb())
  })
})

describe("parseVaultFile", () => {
  it("tells encrypted and plain vaults apart by the db field", () => {
    const header = { slots: [], params: { nonce: "00", tag: "11" } }
    expect(parseVaultFile({ version: 1, header, db: "c2VjcmV0" }).kind).toBe("encrypted")
    expect(parseVaultFile({ version: 1, header: { slots: null, params: null }, db: { entries: [] } }).kind).toBe("plain")
  })

  it("requires database parameters for encrypted vaults", () => {
    expect(() => parseVaultFile({ version: 1, header: { slots: [] }, db: "c2VjcmV0" })).toThrow(
      "Invalid vault: header.params is required for an encrypted vault",
    )
  })
})
