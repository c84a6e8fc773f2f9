import { formatModifiers } from "../keybinds/trigger.js"
import type { ActiveBinding, ActiveSet, RenderedView, Viewport } from "../keybinds/types.js"
import { lineWidth, plainLines, plainText, truncateLine, type Segment, type StyledLine } from "./segments.js"
import { singleLine, sliceToWidth, stringWidth } from "./text.js"
import { UNICODE_GLYPHS } from "./theme.js"

export interface FlowOptions {
  readonly separator: string
  readonly arrow: string
  readonly ellipsis: string
}

export const DEFAULT_FLOW_OPTIONS: FlowOptions = {
  separator: "  ",
  arrow: UNICODE_GLYPHS.arrow,
  ellipsis: UNICODE_GLYPHS.ellipsis,
}

const toCells = (value: number): number => (Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0)

export const normalizeViewport = (viewport: Viewport): Viewport => ({
  width: toCells(viewport.width),
  height: toCells(viewport.height),
})

export const triggerSegments = (entry: ActiveBinding): Segment[] => {
  const modifiers = formatModifiers(entry.trigger)
  const key: Segment = { text: singleLine(entry.trigger.key), tone: "key" }
  return modifiers ? [{ text: modifiers, tone: "modifier" }, key] : [key]
}

export const entrySegments = (entry: ActiveBinding, arrow: string = DEFAULT_FLOW_OPTIONS.arrow): StyledLine => [
  ...triggerSegments(entry),
  { text: ` ${arrow} `, tone: "arrow" },
  { text: singleLine(entry.action), tone: "action" },
]

export const formatEntry = (entry: ActiveBinding, arrow: string = DEFAULT_FLOW_OPTIONS.arrow): string =>
  plainText(entrySegments(entry, arrow))

export const moreSummary = (count: number): string => `+${count} more`

/**
 * Order in which entries give way when the view overflows: Global entries
 * first, most recently declared first, then mode entries from the tail.
 */
export const elisionOrder = (activeSet: ActiveSet): number[] => {
  const fromTail = activeSet.map((_, index) => index).reverse()
  const isGlobal = (index: number) => activeSet[index]?.source === "global"
  return [...fromTail.filter(isGlobal), ...fromTail.filter((index) => !isGlobal(index))]
}

const packLines = (entries: ReadonlyArray<StyledLine>, width: number, separator: string): Segment[][] => {
  const separatorWidth = stringWidth(separator)
  const lines: Segment[][] = []
  let current: Segment[] | null = null
  let currentWidth = 0
  for (const segments of entries) {
    const entryWidth = lineWidth(segments)
    if (current && currentWidth + separatorWidth + entryWidth <= width) {
      current.push({ text: separator, tone: "separator" }, ...segments)
      currentWidth += separatorWidth + entryWidth
    } else {
      current = [...segments]
      lines.push(current)
      currentWidth = entryWidth
    }
  }
  return lines
}

/**
 * Packs the active set into at most `viewport.height` lines of at most
 * `viewport.width` cells. When it does not fit, entries give way in
 * `elisionOrder` until the rest fits above a closing `+N more` line.
 */
export const renderStyled = (
  activeSet: ActiveSet,
  viewport: Viewport,
  options: Partial<FlowOptions> = {},
): StyledLine[] => {
  const { separator, arrow, ellipsis } = { ...DEFAULT_FLOW_OPTIONS, ...options }
  const { width, height } = normalizeViewport(viewport)
  if (height === 0 || activeSet.length === 0) return []
  if (width < stringWidth(ellipsis) + 1) {
    return [[{ text: sliceToWidth(ellipsis, width), tone: "muted" }]]
  }

  const entries = activeSet.map((entry) => truncateLine(entrySegments(entry, arrow), width, ellipsis))
  const lines = packLines(entries, width, separator)
  if (lines.length <= height) return lines

  const keptLines = height - 1
  const kept = new Set(entries.keys())
  const packKept = () => packLines(entries.filter((_, index) => kept.has(index)), width, separator)
  let visible = lines
  for (const index of elisionOrder(activeSet)) {
    kept.delete(index)
    visible = packKept()
    if (visible.length <= keptLines) break
  }
  const summary = truncateLine([{ text: moreSummary(activeSet.length - kept.size), tone: "summary" }], width, ellipsis)
  return [...visible, summary]
}

export const render = (
  activeSet: ActiveSet,
  viewport: Viewport,
  options: Partial<FlowOptions> = {},
): RenderedView => plainLines(renderStyled(activeSet, viewport, options))
