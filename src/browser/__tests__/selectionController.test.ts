import { describe, expect, it } from "vitest"
import { buildEntryIndex } from "../../vault/entryIndex.js"
import type { InputEvent } from "../keys.js"
import {
  createInitialState,
  groupChoicesOf,
  selectedEntryUuid,
  transition,
  viewOf,
  type ControllerContext,
  type SelectionState,
  type TransitionResult,
} from "../selectionController.js"
import { PERSONAL_GROUP, manyEntriesDb, sampleVaultDb } from "../../../tests/fixtures/sampleVault.js"

const context: ControllerContext = { index: buildEntryIndex(sampleVaultDb()), viewportHeight: 10 }

const typed = (text: string): InputEvent[] => [...text].map((char): InputEvent => ({ kind: "char", char }))

const run = (inputs: InputEvent[], start: SelectionState = createInitialState(context), ctx = context): TransitionResult => {
  let last: TransitionResult = { state: start, redraw: "none", quit: false, effects: [] }
  for (const input of inputs) {
    last = transition(last.state, input, ctx)
  }
  return last
}

describe("selection controller: list mode", () => {
  it("starts on the first row with no reveal", () => {
    const state = createInitialState(context)
    expect(state.mode).toBe("list")
    expect(state.selectedRow).toBe(0)
    expect(viewOf(state, context.index).rows).toHaveLength(4)
  })

  it("does not reveal on Enter with an empty search term", () => {
    const result = run([{ kind: "enter" }])
    expect(result.state.mode).toBe("list")
    expect(result.redraw).toBe("none")
    expect(result.effects).toEqual([])
  })

  it("reveals the only match of a non-empty search", () => {
    const result = run([...typed("google"), { kind: "enter" }])
    expect(result.state.mode).toBe("reveal")
    expect(result.state.revealedUuid).toBe("entry-google")
    expect(result.redraw).toBe("full")
    expect(result.effects).toEqual([{ kind: "reveal", uuid: "entry-google" }])
  })

  it("does not reveal when several rows match and the cursor never moved", () => {
    const result = run([...typed("alice"), { kind: "enter" }])
    expect(result.state.mode).toBe("list")
  })

  it("reveals the row chosen with the cursor", () => {
    const result = run([{ kind: "down" }, { kind: "down" }, { kind: "enter" }])
    expect(result.state.revealedUuid).toBe("entry-google")
  })

  it("forgets an explicit cursor once the search term changes", () => {
    const moved = run([{ kind: "down" }, ...typed("a")])
    expect(moved.state.cursorExplicit).toBe(false)
    expect(moved.state.selectedRow).toBe(0)
    expect(run([{ kind: "enter" }], moved.state).state.mode).toBe("list")
  })

  it("jumps to a numbered row and treats it as explicit", () => {
    const jumped = run(typed("4"))
    expect(jumped.state.selectedRow).toBe(3)
    expect(jumped.state.cursorExplicit).toBe(true)
    expect(run([{ kind: "enter" }], jumped.state).state.revealedUuid).toBe("entry-counter")
  })

  it("clamps cursor movement at both ends", () => {
    expect(run([{ kind: "up" }]).state.selectedRow).toBe(0)
    expect(run([{ kind: "down" }, { kind: "down" }, { kind: "down" }, { kind: "down" }, { kind: "down" }]).state.selectedRow).toBe(3)
  })

  it("pages by the viewport height and keeps the selection visible", () => {
    const ctx: ControllerContext = { index: buildEntryIndex(manyEntriesDb(30)), viewportHeight: 5 }
    const paged = run([{ kind: "pageDown" }, { kind: "pageDown" }, { kind: "down" }], createInitialState(ctx), ctx)
    expect(paged.state.selectedRow).toBe(11)
    expect(paged.state.scrollOffset).toBe(7)
    const back = run([{ kind: "pageUp" }], paged.state, ctx)
    expect(back.state.selectedRow).toBe(6)
    expect(back.state.scrollOffset).toBe(6)
  })

  it("marks the empty view with selection -1 and ignores Enter and cursor keys", () => {
    const empty = run(typed("zzz"))
    expect(empty.state.selectedRow).toBe(-1)
    expect(run([{ kind: "down" }]).state.selectedRow).toBe(1)
    expect(run([{ kind: "down" }], empty.state).redraw).toBe("none")
    expect(run([{ kind: "enter" }], empty.state).state.mode).toBe("list")
  })

  it("pops one character on Backspace and ignores it on an empty term", () => {
    const result = run([...typed("goo"), { kind: "backspace" }])
    expect(result.state.searchTerm).toBe("go")
    expect(result.redraw).toBe("dirty")
    expect(run([{ kind: "backspace" }]).redraw).toBe("none")
  })

  it("clears search and group on ESC", () => {
    const filtered = run(typed("google"), { ...createInitialState(context), activeGroupUuid: PERSONAL_GROUP.uuid })
    const cleared = run([{ kind: "escape" }], filtered.state)
    expect(cleared.state.searchTerm).toBe("")
    expect(cleared.state.activeGroupUuid).toBeNull()
    expect(viewOf(cleared.state, context.index).rows).toHaveLength(4)
  })

  it("quits on Ctrl+C from every mode", () => {
    expect(run([{ kind: "quit" }]).quit).toBe(true)
    expect(run([{ kind: "toggleGroups" }, { kind: "quit" }]).quit).toBe(true)
    expect(run([...typed("google"), { kind: "enter" }, { kind: "quit" }]).quit).toBe(true)
  })

  it("requests a full redraw on resize without touching the selection", () => {
    const moved = run([{ kind: "down" }])
    const resized = transition(moved.state, { kind: "resize" }, context)
    expect(resized.redraw).toBe("full")
    expect(resized.state.selectedRow).toBe(1)
  })

  it("reclamps the scroll offset when the viewport shrinks", () => {
    const ctx: ControllerContext = { index: buildEntryIndex(manyEntriesDb(30)), viewportHeight: 20 }
    const deep = run(typed("18"), createInitialState(ctx), ctx)
    expect(deep.state.scrollOffset).toBe(0)
    const resized = transition(deep.state, { kind: "resize" }, { ...ctx, viewportHeight: 5 })
    expect(resized.state.selectedRow).toBe(17)
    expect(resized.state.scrollOffset).toBe(13)
  })
})

describe("selection controller: group select", () => {
  it("lists All OTPs first and applies the chosen group", () => {
    const opened = run([...typed("git"), { kind: "toggleGroups" }])
    expect(opened.state.mode).toBe("groupSelect")
    expect(groupChoicesOf(opened.state, context.index).map((choice) => choice.label)).toEqual([
      "-- All OTPs --",
      "Personal",
      "Work",
    ])
    const chosen = run([{ kind: "down" }, { kind: "enter" }], opened.state)
    expect(chosen.state.mode).toBe("list")
    expect(chosen.state.activeGroupUuid).toBe(PERSONAL_GROUP.uuid)
    expect(chosen.state.searchTerm).toBe("")
    expect(viewOf(chosen.state, context.index).rows.map((row) => row.entry.uuid)).toEqual(["entry-dropbox", "entry-google"])
  })

  it("clears the group and search term when All OTPs is chosen", () => {
    const grouped = { ...createInitialState(context), activeGroupUuid: PERSONAL_GROUP.uuid }
    const result = run([...typed("drop"), { kind: "toggleGroups" }, { kind: "enter" }], grouped)
    expect(result.state.mode).toBe("list")
    expect(result.state.activeGroupUuid).toBeNull()
    expect(result.state.searchTerm).toBe("")
    expect(viewOf(result.state, context.index).rows).toHaveLength(4)
  })

  it("filters group names as the user types", () => {
    const result = run([{ kind: "toggleGroups" }, ...typed("wor"), { kind: "down" }, { kind: "enter" }])
    expect(result.state.activeGroupUuid).toBe("group-work")
  })

  it("leaves with the filter cleared on ESC or Ctrl+G", () => {
    const grouped = { ...createInitialState(context), activeGroupUuid: PERSONAL_GROUP.uuid }
    for (const exit of [{ kind: "escape" }, { kind: "toggleGroups" }] satisfies InputEvent[]) {
      const result = run([{ kind: "toggleGroups" }, exit], grouped)
      expect(result.state.mode).toBe("list")
      expect(result.state.activeGroupUuid).toBeNull()
    }
  })
})

describe("selection controller: reveal", () => {
  const revealed = run([...typed("google"), { kind: "enter" }]).state

  it("returns to the list with search term and selection preserved", () => {
    for (const exit of [{ kind: "escape" }, { kind: "backspace" }] satisfies InputEvent[]) {
      const result = transition(revealed, exit, context)
      expect(result.state.mode).toBe("list")
      expect(result.state.searchTerm).toBe("google")
      expect(result.state.revealedUuid).toBeNull()
      expect(selectedEntryUuid(result.state, context.index)).toBe("entry-google")
      expect(result.redraw).toBe("full")
    }
  })

  it("emits a copy effect for the revealed entry on c", () => {
    const result = transition(revealed, { kind: "char", char: "c" }, context)
    expect(result.effects).toEqual([{ kind: "copy", uuid: "entry-google" }])
    expect(result.state).toBe(revealed)
  })

  it("ignores navigation and typing while revealed", () => {
    for (const input of [{ kind: "down" }, { kind: "enter" }, { kind: "char", char: "x" }, { kind: "toggleGroups" }] satisfies InputEvent[]) {
      const result = transition(revealed, input, context)
      expect(result.state).toBe(revealed)
      expect(result.redraw).toBe("none")
    }
  })

  it("can start directly in reveal mode", () => {
    const direct = createInitialState(context, { revealedUuid: "entry-dropbox" })
    expect(direct.mode).toBe("reveal")
    const back = transition(direct, { kind: "escape" }, context)
    expect(selectedEntryUuid(back.state, context.index)).toBe("entry-dropbox")
  })
})
