export type KeyEvent =
  | { readonly kind: "char"; readonly char: string }
  | { readonly kind: "backspace" }
  | { readonly kind: "enter" }
  | { readonly kind: "escape" }
  | { readonly kind: "up" }
  | { readonly kind: "down" }
  | { readonly kind: "pageUp" }
  | { readonly kind: "pageDown" }
  | { readonly kind: "toggleGroups" }
  | { readonly kind: "quit" }

export type InputEvent = KeyEvent | { readonly kind: "resize" }

const ESC = "\u001b"
const CTRL_C = "\u0003"
const CTRL_G = "\u0007"

const CSI_KEYS: Record<string, KeyEvent> = {
  A: { kind: "up" },
  B: { kind: "down" },
  "5~": { kind: "pageUp" },
  "6~": { kind: "pageDown" },
}

const isPrintable = (char: string) => char >= " " && char !== "\u007f"

// Reads one escape sequence starting at `start` (which holds ESC). Returns the key, if any, and its length.
const readEscape = (chunk: string, start: number): { key: KeyEvent | null; length: number } => {
  const lead = chunk[start + 1]
  if (lead === undefined) return { key: { kind: "escape" }, length: 1 }
  if (lead === "O") {
    const final = chunk[start + 2]
    if (final === undefined) return { key: null, length: 2 }
    return { key: CSI_KEYS[final] ?? null, length: 3 }
  }
  if (lead !== "[") return { key: { kind: "escape" }, length: 1 }
  let cursor = start + 2
  while (cursor < chunk.length) {
    const code = chunk.charCodeAt(cursor)
    // Final byte of a CSI sequence.
    if (code >= 0x40 && code <= 0x7e) break
    cursor += 1
  }
  const body = chunk.slice(start + 2, cursor + 1)
  return { key: CSI_KEYS[body] ?? null, length: cursor + 1 - start }
}

const isCsiParameter = (code: number) => code >= 0x20 && code <= 0x3f

/**
 * Length of an escape sequence left unfinished at the end of `chunk`: a lone ESC, `ESC O`,
 * or `ESC [` with no final byte yet. Returns 0 when the chunk ends on a complete key.
 */
export const trailingEscapeLength = (chunk: string): number => {
  const start = chunk.lastIndexOf(ESC)
  if (start === -1) return 0
  const tail = chunk.slice(start + 1)
  if (tail === "" || tail === "O") return chunk.length - start
  if (tail[0] !== "[") return 0
  for (let index = 1; index < tail.length; index += 1) {
    if (!isCsiParameter(tail.charCodeAt(index))) return 0
  }
  return chunk.length - start
}

/** Decodes one stdin chunk into key events. Unknown escape sequences are dropped. */
export const decodeKeys = (chunk: string): KeyEvent[] => {
  const events: KeyEvent[] = []
  let index = 0
  while (index < chunk.length) {
    const char = String.fromCodePoint(chunk.codePointAt(index) ?? 0)
    if (char === ESC) {
      const { key, length } = readEscape(chunk, index)
      if (key) events.push(key)
      index += length
      continue
    }
    index += char.length
    if (char === CTRL_C) {
      events.push({ kind: "quit" })
    } else if (char === CTRL_G) {
      events.push({ kind: "toggleGroups" })
    } else if (char === "\r" || char === "\n") {
      if (char === "\r" && chunk[index] === "\n") index += 1
      events.push({ kind: "enter" })
    } else if (char === "\u007f" || char === "\b") {
      events.push({ kind: "backspace" })
    } else if (isPrintable(char)) {
      events.push({ kind: "char", char })
    }
  }
  return events
}
