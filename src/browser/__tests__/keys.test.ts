import { describe, expect, it } from "vitest"
import { decodeKeys, trailingEscapeLength } from "../keys.js"

describe("decodeKeys", () => {
  it("maps control characters to commands", () => {
    expect(decodeKeys("\u0003")).toEqual([{ kind: "quit" }])
    expect(decodeKeys("\u0007")).toEqual([{ kind: "toggleGroups" }])
    expect(decodeKeys("\r")).toEqual([{ kind: "enter" }])
    expect(decodeKeys("\r\n")).toEqual([{ kind: "enter" }])
    expect(decodeKeys("\u007f\b")).toEqual([{ kind: "backspace" }, { kind: "backspace" }])
  })

  it("decodes arrow and paging sequences in both cursor modes", () => {
    expect(decodeKeys("\u001b[A\u001b[B")).toEqual([{ kind: "up" }, { kind: "down" }])
    expect(decodeKeys("\u001bOA\u001bOB")).toEqual([{ kind: "up" }, { kind: "down" }])
    expect(decodeKeys("\u001b[5~\u001b[6~")).toEqual([{ kind: "pageUp" }, { kind: "pageDown" }])
  })

  it("reads a lone ESC as escape and drops unknown sequences", () => {
    expect(decodeKeys("\u001b")).toEqual([{ kind: "escape" }])
    expect(decodeKeys("\u001b[C\u001b[1;5D")).toEqual([])
  })

  it("splits typed text into printable characters", () => {
    expect(decodeKeys("go\u001b[Bé")).toEqual([
      { kind: "char", char: "g" },
      { kind: "char", char: "o" },
      { kind: "down" },
      { kind: "char", char: "é" },
    ])
  })

  it("ignores other control bytes", () => {
    expect(decodeKeys("\u0001\u0002x")).toEqual([{ kind: "char", char: "x" }])
  })
})

describe("trailingEscapeLength", () => {
  it("measures an escape sequence cut off at the end of a chunk", () => {
    expect(trailingEscapeLength("ab\u001b")).toBe(1)
    expect(trailingEscapeLength("\u001bO")).toBe(2)
    expect(trailingEscapeLength("x\u001b[")).toBe(2)
    expect(trailingEscapeLength("\u001b[6")).toBe(3)
  })

  it("returns 0 when the chunk ends on a complete key", () => {
    expect(trailingEscapeLength("abc")).toBe(0)
    expect(trailingEscapeLength("\u001b[B")).toBe(0)
    expect(trailingEscapeLength("\u001b[6~")).toBe(0)
    expect(trailingEscapeLength("\u001bOA")).toBe(0)
    expect(trailingEscapeLength("\u001bx")).toBe(0)
  })
})
