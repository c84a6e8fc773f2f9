import type { ActiveSet, RenderedView, Viewport } from "../keybinds/types.js"
import { elisionOrder, moreSummary, normalizeViewport, renderStyled, triggerSegments } from "./render.js"
import { lineWidth, padLine, plainLines, truncateLine, type Segment, type StyledLine } from "./segments.js"
import { singleLine, stringWidth } from "./text.js"
import { UNICODE_GLYPHS, type GroupMarkers } from "./theme.js"

export interface PanelSection {
  readonly title: string
  readonly entries: ActiveSet
}

export interface PanelOptions {
  readonly divider: string
  readonly ellipsis: string
  readonly arrow: string
  readonly separator: string
  readonly markers: GroupMarkers
}

export const DEFAULT_PANEL_OPTIONS: PanelOptions = {
  divider: UNICODE_GLYPHS.divider,
  ellipsis: UNICODE_GLYPHS.ellipsis,
  arrow: UNICODE_GLYPHS.arrow,
  separator: "  ",
  markers: UNICODE_GLYPHS.markers,
}

export const MIN_PANEL_WIDTH = 12

const groupMarker = (entries: ActiveSet, index: number, markers: GroupMarkers): { marker: string; repeated: boolean } => {
  const action = entries[index]?.action
  const prevSame = index > 0 && entries[index - 1]?.action === action
  const nextSame = index < entries.length - 1 && entries[index + 1]?.action === action
  if (!prevSame && nextSame) return { marker: markers.first, repeated: false }
  if (prevSame && nextSame) return { marker: markers.middle, repeated: true }
  if (prevSame) return { marker: markers.last, repeated: true }
  return { marker: markers.single, repeated: false }
}

const panelRows = (entries: ActiveSet, markers: GroupMarkers): StyledLine[] => {
  const triggerWidth = entries.reduce((max, entry) => Math.max(max, lineWidth(triggerSegments(entry))), 0)
  return entries.map((entry, index) => {
    const { marker, repeated } = groupMarker(entries, index, markers)
    const trigger = padLine(triggerSegments(entry), triggerWidth)
    const row: Segment[] = [...trigger, { text: " ", tone: "plain" }, { text: marker, tone: "marker" }]
    if (!repeated) row.push({ text: " ", tone: "plain" }, { text: singleLine(entry.action), tone: "action" })
    return row
  })
}

const renderPanel = (section: PanelSection, width: number, height: number, options: PanelOptions): StyledLine[] => {
  const title = truncateLine([{ text: singleLine(section.title), tone: "title" }], width, options.ellipsis)
  const budget = height - 1
  if (budget <= 0) return [title]

  const rows = panelRows(section.entries, options.markers)
  const fitted = rows.map((row) => truncateLine(row, width, options.ellipsis))
  if (fitted.length <= budget) return [title, ...fitted]

  const kept = new Set(fitted.keys())
  for (const index of elisionOrder(section.entries).slice(0, fitted.length - (budget - 1))) kept.delete(index)
  const summary = truncateLine([{ text: moreSummary(fitted.length - kept.size), tone: "summary" }], width, options.ellipsis)
  return [title, ...fitted.filter((_, index) => kept.has(index)), summary]
}

/**
 * Lays titled sections out side by side in equal-width panels. Falls back to a
 * single flow view when the viewport is too narrow to give every panel
 * `MIN_PANEL_WIDTH` cells.
 */
export const renderPanelsStyled = (
  sections: ReadonlyArray<PanelSection>,
  viewport: Viewport,
  options: Partial<PanelOptions> = {},
): StyledLine[] => {
  const resolved = { ...DEFAULT_PANEL_OPTIONS, ...options }
  const { width, height } = normalizeViewport(viewport)
  if (height === 0 || sections.length === 0) return []

  const dividerWidth = stringWidth(resolved.divider)
  const panelWidth = Math.floor((width - dividerWidth * (sections.length - 1)) / sections.length)
  if (panelWidth < MIN_PANEL_WIDTH) {
    const flattened = sections.flatMap((section) => section.entries)
    return renderStyled(flattened, { width, height }, resolved)
  }

  const panels = sections.map((section) => renderPanel(section, panelWidth, height, resolved))
  const rowCount = panels.reduce((max, panel) => Math.max(max, panel.length), 0)
  const lines: StyledLine[] = []
  for (let row = 0; row < rowCount; row += 1) {
    const line: Segment[] = []
    panels.forEach((panel, index) => {
      const cell = panel[row] ?? []
      if (index === panels.length - 1) {
        line.push(...cell)
        return
      }
      line.push(...padLine(cell, panelWidth), { text: resolved.divider, tone: "border" })
    })
    lines.push(line)
  }
  return lines
}

export const renderPanels = (
  sections: ReadonlyArray<PanelSection>,
  viewport: Viewport,
  options: Partial<PanelOptions> = {},
): RenderedView => plainLines(renderPanelsStyled(sections, viewport, options))
