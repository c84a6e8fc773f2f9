import { lookupMode, normalizeModeName, resolve } from "../keybinds/resolve.js"
import { partitionShared, sortByAction } from "../keybinds/shared.js"
import type { ActiveSet, KeybindConfiguration, Viewport } from "../keybinds/types.js"
import { renderPanelsStyled, type PanelSection } from "./panels.js"
import { renderStyled } from "./render.js"
import type { StyledLine } from "./segments.js"
import { titleCase } from "./text.js"
import { resolveGlyphs } from "./theme.js"

export type LayoutStyle = "flow" | "panels"
export type SortOrder = "declared" | "action"

export const LAYOUT_STYLES: readonly LayoutStyle[] = ["flow", "panels"]
export const SORT_ORDERS: readonly SortOrder[] = ["declared", "action"]

export const isLayoutStyle = (value: unknown): value is LayoutStyle =>
  typeof value === "string" && LAYOUT_STYLES.some((style) => style === value)

export const isSortOrder = (value: unknown): value is SortOrder =>
  typeof value === "string" && SORT_ORDERS.some((order) => order === value)

export interface LayoutSettings {
  readonly style: LayoutStyle
  readonly sort: SortOrder
  readonly separator: string
  readonly sharedMinModes: number
  readonly asciiOnly: boolean
}

export const SHARED_TITLE = "Shared"

const applySort = (entries: ActiveSet, sort: SortOrder): ActiveSet => (sort === "action" ? sortByAction(entries) : entries)

export const buildPanelSections = (
  configuration: KeybindConfiguration,
  mode: string,
  settings: Pick<LayoutSettings, "sort" | "sharedMinModes">,
): PanelSection[] => {
  const partition = partitionShared(configuration, mode, { minSharedModes: settings.sharedMinModes })
  const sections: PanelSection[] = []
  if (lookupMode(configuration, mode)) {
    sections.push({ title: titleCase(normalizeModeName(mode)), entries: applySort(partition.mode, settings.sort) })
  }
  sections.push({ title: SHARED_TITLE, entries: applySort(partition.shared, settings.sort) })
  return sections
}

/** Resolves `mode` and lays the result out the way `settings` asks for. */
export const composeView = (
  configuration: KeybindConfiguration,
  mode: string,
  viewport: Viewport,
  settings: LayoutSettings,
): StyledLine[] => {
  const glyphs = resolveGlyphs(settings.asciiOnly)
  if (settings.style === "panels") {
    return renderPanelsStyled(buildPanelSections(configuration, mode, settings), viewport, {
      divider: glyphs.divider,
      ellipsis: glyphs.ellipsis,
      arrow: glyphs.arrow,
      separator: settings.separator,
      markers: glyphs.markers,
    })
  }
  return renderStyled(applySort(resolve(configuration, mode), settings.sort), viewport, {
    separator: settings.separator,
    arrow: glyphs.arrow,
    ellipsis: glyphs.ellipsis,
  })
}
