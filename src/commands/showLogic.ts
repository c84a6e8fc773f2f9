import { loadAppConfig } from "../config/appConfig.js"
import { listModes, lookupMode, normalizeModeName, resolve } from "../keybinds/resolve.js"
import { formatTrigger } from "../keybinds/trigger.js"
import type { ActiveSet, KeybindConfiguration, Viewport } from "../keybinds/types.js"
import { composeView, type LayoutSettings, type LayoutStyle, type SortOrder } from "../layout/compose.js"
import { normalizeViewport } from "../layout/render.js"
import { plainLines } from "../layout/segments.js"
import { createPalette, paintLines, type ColorMode } from "../layout/theme.js"
import { loadKeybindConfiguration, resolveKeybindsPath, resolveSettings, toLayoutSettings } from "../keys_config/load.js"
import type { ResolvedSettings } from "../keys_config/types.js"

export interface LoadOptions {
  readonly keybindsPath?: string | null
  readonly settingsPath?: string | null
  readonly workspace?: string | null
  readonly preset?: string | null
  readonly strict?: boolean | null
  readonly plain?: boolean
}

export interface LoadedContext {
  readonly settings: ResolvedSettings
  readonly keybindsPath: string
  readonly configuration: KeybindConfiguration
  readonly warnings: readonly string[]
}

/** Resolves settings, then finds and reads the keybind file they point at. */
export const loadContext = async (options: LoadOptions): Promise<LoadedContext> => {
  const settings = await resolveSettings({
    workspace: options.workspace ?? null,
    cliPreset: options.preset ?? null,
    cliSettingsPath: options.settingsPath ?? null,
    cliStrict: options.strict ?? null,
    colorAllowed: !options.plain,
  })
  const keybindsPath = await resolveKeybindsPath({
    cliPath: options.keybindsPath ?? null,
    settings,
    workspace: options.workspace ?? null,
  })
  if (!keybindsPath) {
    throw new Error(
      "No keybind file found. Pass --keybinds, set MODEKEYS_KEYBINDS, or create .modekeys/keybinds.yaml in the workspace.",
    )
  }
  const loaded = await loadKeybindConfiguration(keybindsPath, settings.meta.strict)
  return {
    settings,
    keybindsPath,
    configuration: loaded.configuration,
    warnings: [...settings.meta.warnings, ...loaded.warnings.map((line) => `${keybindsPath}: ${line}`)],
  }
}

export interface ViewOverrides {
  readonly layout?: LayoutStyle | null
  readonly sort?: SortOrder | null
}

export const applyOverrides = (settings: ResolvedSettings, overrides: ViewOverrides): LayoutSettings => {
  const base = toLayoutSettings(settings)
  return {
    ...base,
    style: overrides.layout ?? base.style,
    sort: overrides.sort ?? base.sort,
  }
}

type TerminalSize = {
  readonly columns?: number
  readonly rows?: number
  readonly isTTY?: boolean
}

/** Explicit sizes win; otherwise the terminal size, otherwise the configured fallback. */
export const resolveViewport = (
  width: number | null | undefined,
  height: number | null | undefined,
  terminal: TerminalSize | undefined = process.stdout,
): Viewport => {
  const fallback = loadAppConfig().fallbackViewport
  const tty = terminal?.isTTY === true
  return normalizeViewport({
    width: width ?? (tty && terminal?.columns ? terminal.columns : fallback.width),
    height: height ?? (tty && terminal?.rows ? terminal.rows : fallback.height),
  })
}

export const resolveModeName = (requested: string | null | undefined, settings: ResolvedSettings): string =>
  normalizeModeName(requested?.trim() || settings.defaultMode)

export interface ShowOptions extends LoadOptions, ViewOverrides {
  readonly mode?: string | null
  readonly width?: number | null
  readonly height?: number | null
  readonly terminal?: TerminalSize
}

export interface ShowResult {
  readonly mode: string
  readonly modeKnown: boolean
  readonly viewport: Viewport
  readonly colorMode: ColorMode
  readonly lines: readonly string[]
  readonly painted: readonly string[]
  readonly warnings: readonly string[]
}

export const runShow = async (options: ShowOptions): Promise<ShowResult> => {
  const context = await loadContext(options)
  const mode = resolveModeName(options.mode, context.settings)
  const viewport = resolveViewport(options.width, options.height, options.terminal)
  const styled = composeView(context.configuration, mode, viewport, applyOverrides(context.settings, options))
  const colorMode = context.settings.display.colorMode
  return {
    mode,
    modeKnown: lookupMode(context.configuration, mode) != null,
    viewport,
    colorMode,
    lines: plainLines(styled),
    painted: paintLines(styled, createPalette(colorMode)),
    warnings: context.warnings,
  }
}

export interface ResolveResult {
  readonly mode: string
  readonly modeKnown: boolean
  readonly activeSet: ActiveSet
  readonly warnings: readonly string[]
}

export const runResolve = async (options: LoadOptions & { readonly mode?: string | null }): Promise<ResolveResult> => {
  const context = await loadContext(options)
  const mode = resolveModeName(options.mode, context.settings)
  return {
    mode,
    modeKnown: lookupMode(context.configuration, mode) != null,
    activeSet: resolve(context.configuration, mode),
    warnings: context.warnings,
  }
}

export const formatActiveSetText = (activeSet: ActiveSet): string[] =>
  activeSet.map((entry) => `${formatTrigger(entry.trigger)}\t${entry.action}\t${entry.source}`)

export const activeSetToJson = (activeSet: ActiveSet) =>
  activeSet.map((entry) => ({
    key: formatTrigger(entry.trigger),
    trigger: entry.trigger,
    action: entry.action,
    source: entry.source,
  }))

export interface ModeSummary {
  readonly name: string
  readonly bindings: number
}

export const summarizeModes = (configuration: KeybindConfiguration): { modes: ModeSummary[]; global: number } => ({
  modes: listModes(configuration).map((name) => ({ name, bindings: lookupMode(configuration, name)?.length ?? 0 })),
  global: configuration.global.length,
})

export const formatModeSummary = (summary: { modes: readonly ModeSummary[]; global: number }): string[] => {
  const width = summary.modes.reduce((max, mode) => Math.max(max, mode.name.length), "(global)".length)
  return [
    ...summary.modes.map((mode) => `${mode.name.padEnd(width)}  ${mode.bindings}`),
    `${"(global)".padEnd(width)}  ${summary.global}`,
  ]
}
