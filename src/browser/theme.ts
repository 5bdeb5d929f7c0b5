import { Chalk, type ChalkInstance } from "chalk"

export type ColorMode = "auto" | "none"

export interface BrowserTheme {
  readonly chalk: ChalkInstance
  readonly asciiOnly: boolean
  readonly glyphs: {
    readonly select: string
    readonly horizontal: string
    readonly vertical: string
    readonly topLeft: string
    readonly topRight: string
    readonly bottomLeft: string
    readonly bottomRight: string
    readonly up: string
    readonly down: string
  }
}

export interface ThemeOptions {
  readonly colorMode: ColorMode
  readonly asciiOnly: boolean
  /** Color level to use when colors are on; defaults to basic 16 colors. */
  readonly colorLevel?: 1 | 2 | 3
}

export const createTheme = (options: ThemeOptions): BrowserTheme => {
  const ascii = options.asciiOnly
  return {
    chalk: new Chalk({ level: options.colorMode === "none" ? 0 : options.colorLevel ?? 1 }),
    asciiOnly: ascii,
    glyphs: {
      select: ascii ? ">" : "▶",
      horizontal: ascii ? "-" : "─",
      vertical: ascii ? "|" : "│",
      topLeft: ascii ? "+" : "┌",
      topRight: ascii ? "+" : "┐",
      bottomLeft: ascii ? "+" : "└",
      bottomRight: ascii ? "+" : "┘",
      up: ascii ? "^" : "↑",
      down: ascii ? "v" : "↓",
    },
  }
}

export const PLAIN_THEME = createTheme({ colorMode: "none", asciiOnly: true })
