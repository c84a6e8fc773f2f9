import { Chalk, type ChalkInstance } from "chalk"
import type { Segment, StyledLine, Tone } from "./segments.js"

export type ColorMode = "truecolor" | "ansi256" | "ansi16" | "none"

export const COLOR_MODES: readonly ColorMode[] = ["truecolor", "ansi256", "ansi16", "none"]

export interface GroupMarkers {
  readonly first: string
  readonly middle: string
  readonly last: string
  readonly single: string
}

export interface Glyphs {
  readonly arrow: string
  readonly ellipsis: string
  readonly divider: string
  readonly markers: GroupMarkers
}

export const UNICODE_GLYPHS: Glyphs = {
  arrow: "→",
  ellipsis: "…",
  divider: " │ ",
  markers: { first: "┳", middle: "┫", last: "┛", single: "━" },
}

export const ASCII_GLYPHS: Glyphs = {
  arrow: "->",
  ellipsis: "...",
  divider: " | ",
  markers: { first: "+", middle: "|", last: "`", single: "-" },
}

export const resolveGlyphs = (asciiOnly: boolean): Glyphs => (asciiOnly ? ASCII_GLYPHS : UNICODE_GLYPHS)

export const THEME_COLORS = {
  title: "#ed840f",
  key: "#e6e6eb",
  action: "#dcdce1",
  modifier: "#8c8c96",
  muted: "#64646e",
  border: "#3c3c46",
  summary: "#4da3ff",
} as const

export type Palette = Record<Tone, (text: string) => string>

const CHALK_LEVELS: Record<ColorMode, 0 | 1 | 2 | 3> = {
  none: 0,
  ansi16: 1,
  ansi256: 2,
  truecolor: 3,
}

export const createPalette = (colorMode: ColorMode): Palette => {
  const chalk: ChalkInstance = new Chalk({ level: CHALK_LEVELS[colorMode] })
  const identity = (text: string) => text
  return {
    modifier: (text) => chalk.hex(THEME_COLORS.modifier)(text),
    key: (text) => chalk.bold.hex(THEME_COLORS.key)(text),
    arrow: (text) => chalk.hex(THEME_COLORS.muted)(text),
    action: (text) => chalk.hex(THEME_COLORS.action)(text),
    separator: identity,
    marker: (text) => chalk.hex(THEME_COLORS.muted)(text),
    title: (text) => chalk.bold.hex(THEME_COLORS.title)(text),
    border: (text) => chalk.hex(THEME_COLORS.border)(text),
    summary: (text) => chalk.italic.hex(THEME_COLORS.summary)(text),
    muted: (text) => chalk.hex(THEME_COLORS.muted)(text),
    plain: identity,
  }
}

const paintSegment = (segment: Segment, palette: Palette): string =>
  segment.text.length > 0 ? palette[segment.tone](segment.text) : ""

export const paintLine = (line: StyledLine, palette: Palette): string =>
  line.map((segment) => paintSegment(segment, palette)).join("")

export const paintLines = (lines: ReadonlyArray<StyledLine>, palette: Palette): string[] =>
  lines.map((line) => paintLine(line, palette))
