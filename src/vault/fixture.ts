import { randomInt, randomUUID } from "node:crypto"
import type { VaultDb, VaultEntry, VaultGroup } from "./types.js"

const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567"
const WORD_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789"

export interface FixtureRandom {
  readonly int: (maxExclusive: number) => number
  readonly uuid: () => string
}

export const CRYPTO_RANDOM: FixtureRandom = { int: (max) => randomInt(max), uuid: () => randomUUID() }

const pick = (alphabet: string, length: number, random: FixtureRandom): string =>
  Array.from({ length }, () => alphabet[random.int(alphabet.length)] ?? "").join("")

/** 80-bit base32 secret without padding. */
export const randomBase32Secret = (random: FixtureRandom = CRYPTO_RANDOM): string => pick(BASE32_ALPHABET, 16, random)

/**
 * Random TOTP entries spread over `max(1, count / 5)` groups, each entry in exactly one group.
 */
export const buildRandomVaultDb = (count: number, random: FixtureRandom = CRYPTO_RANDOM): VaultDb => {
  const groups: VaultGroup[] = Array.from({ length: Math.max(1, Math.floor(count / 5)) }, () => ({
    uuid: random.uuid(),
    name: pick(WORD_ALPHABET, 8, random),
  }))
  const entries: VaultEntry[] = Array.from({ length: count }, () => ({
    type: "totp",
    uuid: random.uuid(),
    name: pick(WORD_ALPHABET, 12, random),
    issuer: pick(WORD_ALPHABET, 10, random),
    note: pick(WORD_ALPHABET, 25, random),
    favorite: false,
    info: { secret: randomBase32Secret(random), algo: "SHA1", digits: 6, period: 30, counter: null, pin: null },
    groups: [groups[random.int(groups.length)]?.uuid ?? ""],
  }))
  return { version: 2, entries, groups }
}
