import { promises as fs } from "node:fs"
import os from "node:os"
import path from "node:path"
import { parse } from "yaml"
import type { KeybindConfiguration } from "../keybinds/types.js"
import { isLayoutStyle, isSortOrder, type LayoutSettings } from "../layout/compose.js"
import type { ColorMode } from "../layout/theme.js"
import { debugLog } from "../utils/debug.js"
import { BUILTIN_PRESETS, DEFAULT_PRESET, DEFAULT_RESOLVED_SETTINGS, PRESET_IDS, isBuiltinPreset } from "./presets.js"
import { formatValidationIssues, parseBooleanLike, validateKeybindInput, validateSettingsInput } from "./schema.js"
import type { PresetId, ResolveSettingsOptions, ResolvedSettings, SettingsInput } from "./types.js"

const CONFIG_DIR_NAME = "modekeys"
const SETTINGS_FILE = "settings.yaml"
const KEYBINDS_FILE = "keybinds.yaml"

export const isNotFoundError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT"

const mergeSettingsInput = (base: SettingsInput, patch: SettingsInput): SettingsInput => ({
  ...base,
  ...patch,
  layout: { ...(base.layout ?? {}), ...(patch.layout ?? {}) },
  display: { ...(base.display ?? {}), ...(patch.display ?? {}) },
})

const readYamlFile = async (filePath: string, label: string): Promise<unknown> => {
  const raw = await fs.readFile(filePath, "utf8")
  try {
    return parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to parse ${label} at ${filePath}: ${message}`)
  }
}

const readSettingsFile = async (
  filePath: string,
  strict: boolean,
): Promise<{ config: SettingsInput; warnings: string[] }> => {
  let parsed: unknown
  try {
    parsed = await readYamlFile(filePath, "settings")
  } catch (error) {
    if (isNotFoundError(error)) {
      return { config: {}, warnings: [] }
    }
    throw error
  }
  const validated = validateSettingsInput(parsed, { strictUnknownKeys: strict })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    const formatted = formatValidationIssues(errors).join("\n")
    throw new Error(`Invalid settings at ${filePath}\n${formatted}`)
  }
  const warnings = formatValidationIssues(validated.issues.filter((issue) => issue.severity === "warning"))
  return { config: validated.config, warnings }
}

const firstExisting = async (candidates: readonly string[]): Promise<string | null> => {
  for (const candidate of candidates) {
    try {
      // eslint-disable-next-line no-await-in-loop
      await fs.access(candidate)
      return candidate
    } catch {
      // Keep searching.
    }
  }
  return null
}

const workspaceRoot = (workspace?: string | null): string => workspace?.trim() || process.cwd()

export const resolveConfigHome = (): string => {
  const xdg = process.env.XDG_CONFIG_HOME?.trim()
  return path.join(xdg || path.join(os.homedir(), ".config"), CONFIG_DIR_NAME)
}

const resolveRepoSettingsPath = (workspace?: string | null): Promise<string | null> => {
  const root = workspaceRoot(workspace)
  return firstExisting([path.join(root, ".modekeys", SETTINGS_FILE), path.join(root, "modekeys.settings.yaml")])
}

const toAbsolute = (filePath: string): string =>
  path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath)

const COLOR_MODE_ALIASES = new Map<string, ColorMode>([
  ["0", "none"],
  ["none", "none"],
  ["off", "none"],
  ["false", "none"],
  ["16", "ansi16"],
  ["ansi16", "ansi16"],
  ["basic", "ansi16"],
  ["256", "ansi256"],
  ["ansi256", "ansi256"],
  ["truecolor", "truecolor"],
  ["24bit", "truecolor"],
])

export const parseColorMode = (raw: string): ColorMode | null => COLOR_MODE_ALIASES.get(raw.trim().toLowerCase()) ?? null

const envSettingsLayer = (): { config: SettingsInput; warnings: string[] } => {
  const env = process.env
  const warnings: string[] = []
  const layout: NonNullable<SettingsInput["layout"]> = {}
  const display: NonNullable<SettingsInput["display"]> = {}
  const config: SettingsInput = {}

  if (env.MODEKEYS_KEYBINDS?.trim()) config.keybinds = env.MODEKEYS_KEYBINDS.trim()
  if (env.MODEKEYS_MODE?.trim()) config.defaultMode = env.MODEKEYS_MODE.trim().toLowerCase()

  const style = env.MODEKEYS_LAYOUT?.trim().toLowerCase()
  if (style) {
    if (isLayoutStyle(style)) layout.style = style
    else warnings.push(`MODEKEYS_LAYOUT: ignoring unknown layout "${style}".`)
  }
  const sort = env.MODEKEYS_SORT?.trim().toLowerCase()
  if (sort) {
    if (isSortOrder(sort)) layout.sort = sort
    else warnings.push(`MODEKEYS_SORT: ignoring unknown sort order "${sort}".`)
  }
  if (env.MODEKEYS_SEPARATOR) layout.separator = env.MODEKEYS_SEPARATOR
  if (env.MODEKEYS_SHARED_MIN_MODES?.trim()) {
    const parsed = Number.parseInt(env.MODEKEYS_SHARED_MIN_MODES, 10)
    if (Number.isFinite(parsed) && parsed > 0) layout.sharedMinModes = parsed
    else warnings.push("MODEKEYS_SHARED_MIN_MODES: expected positive integer.")
  }

  const asciiOnly = parseBooleanLike(env.MODEKEYS_ASCII)
  if (asciiOnly != null) display.asciiOnly = asciiOnly
  if (env.MODEKEYS_COLOR_MODE?.trim()) {
    const colorMode = parseColorMode(env.MODEKEYS_COLOR_MODE)
    if (colorMode) display.colorMode = colorMode
    else warnings.push(`MODEKEYS_COLOR_MODE: ignoring unknown color mode "${env.MODEKEYS_COLOR_MODE.trim()}".`)
  }

  if (Object.keys(layout).length > 0) config.layout = layout
  if (Object.keys(display).length > 0) config.display = display
  return { config, warnings }
}

/**
 * Resolves display settings in layers: defaults, preset, repo file, user file,
 * `--settings` file, then environment. Later layers win key by key; a layer
 * naming a preset first re-applies that preset underneath itself.
 */
export const resolveSettings = async (options: ResolveSettingsOptions = {}): Promise<ResolvedSettings> => {
  const strictFromEnv = parseBooleanLike(process.env.MODEKEYS_CONFIG_STRICT)
  const strict = options.cliStrict ?? strictFromEnv ?? false
  const warnings: string[] = []
  const sources: string[] = ["defaults"]
  let merged: SettingsInput = {}
  let selectedPreset: PresetId = DEFAULT_PRESET

  const applyLayer = (layer: SettingsInput, source: string) => {
    if (Object.keys(layer).length === 0) return
    if (layer.preset) {
      if (!isBuiltinPreset(layer.preset)) {
        throw new Error(`Unknown preset "${layer.preset}" in ${source}. Expected one of ${PRESET_IDS.join(", ")}.`)
      }
      selectedPreset = layer.preset
      merged = mergeSettingsInput(merged, BUILTIN_PRESETS[selectedPreset])
      sources.push(`preset:${selectedPreset}`)
    }
    merged = mergeSettingsInput(merged, layer)
    sources.push(source)
  }

  const initialPreset = options.cliPreset?.trim() || process.env.MODEKEYS_PRESET?.trim() || DEFAULT_PRESET
  if (!isBuiltinPreset(initialPreset)) {
    throw new Error(`Unknown preset "${initialPreset}". Expected one of ${PRESET_IDS.join(", ")}.`)
  }
  applyLayer({ preset: initialPreset }, "preset-select")

  const fileLayers: Array<{ filePath: string | null; source: string }> = [
    { filePath: await resolveRepoSettingsPath(options.workspace), source: "repo" },
    { filePath: path.join(resolveConfigHome(), SETTINGS_FILE), source: "user" },
  ]
  const cliSettingsPath = options.cliSettingsPath?.trim()
  if (cliSettingsPath) fileLayers.push({ filePath: toAbsolute(cliSettingsPath), source: "cli-settings" })

  for (const { filePath, source } of fileLayers) {
    if (!filePath) continue
    // eslint-disable-next-line no-await-in-loop
    const layer = await readSettingsFile(filePath, strict)
    warnings.push(...layer.warnings.map((line) => `${filePath}: ${line}`))
    // A relative keybinds path belongs to the file that names it.
    const keybinds = layer.config.keybinds?.trim()
    const config = keybinds ? { ...layer.config, keybinds: path.resolve(path.dirname(filePath), keybinds) } : layer.config
    applyLayer(config, `${source}:${filePath}`)
  }

  const envLayer = envSettingsLayer()
  warnings.push(...envLayer.warnings)
  applyLayer(envLayer.config, "env")

  const validated = validateSettingsInput(merged, { strictUnknownKeys: strict })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    throw new Error(`Invalid resolved settings\n${formatValidationIssues(errors).join("\n")}`)
  }
  merged = validated.config
  debugLog("config", `sources: ${sources.join(" -> ")}`)

  const colorAllowed = options.colorAllowed ?? true
  const noColorRequested = Boolean(process.env.NO_COLOR)
  const requestedColorMode = merged.display?.colorMode ?? DEFAULT_RESOLVED_SETTINGS.display.colorMode
  const defaults = DEFAULT_RESOLVED_SETTINGS

  return {
    preset: selectedPreset,
    keybinds: merged.keybinds ?? null,
    defaultMode: merged.defaultMode ?? defaults.defaultMode,
    layout: {
      style: merged.layout?.style ?? defaults.layout.style,
      sort: merged.layout?.sort ?? defaults.layout.sort,
      separator: merged.layout?.separator ?? defaults.layout.separator,
      sharedMinModes: merged.layout?.sharedMinModes ?? defaults.layout.sharedMinModes,
    },
    display: {
      asciiOnly: merged.display?.asciiOnly ?? defaults.display.asciiOnly,
      colorMode: !colorAllowed || noColorRequested ? "none" : requestedColorMode,
    },
    meta: {
      strict,
      warnings,
      sources,
    },
  }
}

export const toLayoutSettings = (settings: ResolvedSettings): LayoutSettings => ({
  style: settings.layout.style,
  sort: settings.layout.sort,
  separator: settings.layout.separator,
  sharedMinModes: settings.layout.sharedMinModes,
  asciiOnly: settings.display.asciiOnly,
})

export type KeybindsPathOptions = {
  readonly cliPath?: string | null
  readonly settings?: Pick<ResolvedSettings, "keybinds"> | null
  readonly workspace?: string | null
}

/**
 * Locates the keybind file: `--keybinds`, then the settings/env value, then the
 * workspace and user defaults when they exist. Null when nothing is found.
 */
export const resolveKeybindsPath = async (options: KeybindsPathOptions = {}): Promise<string | null> => {
  const explicit = options.cliPath?.trim() || options.settings?.keybinds?.trim()
  if (explicit) return toAbsolute(explicit)
  return firstExisting([
    path.join(workspaceRoot(options.workspace), ".modekeys", KEYBINDS_FILE),
    path.join(resolveConfigHome(), KEYBINDS_FILE),
  ])
}

export type LoadedKeybinds = {
  readonly configuration: KeybindConfiguration
  readonly warnings: readonly string[]
}

export const buildKeybindConfiguration = (raw: unknown, label: string, strict = false): LoadedKeybinds => {
  const validated = validateKeybindInput(raw, { strictUnknownKeys: strict })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    throw new Error(`Invalid keybinds in ${label}\n${formatValidationIssues(errors).join("\n")}`)
  }
  return {
    configuration: validated.configuration,
    warnings: formatValidationIssues(validated.issues.filter((issue) => issue.severity === "warning")),
  }
}

/** Reads a YAML or JSON keybind file into a configuration snapshot. */
export const loadKeybindConfiguration = async (filePath: string, strict = false): Promise<LoadedKeybinds> => {
  let parsed: unknown
  try {
    parsed = await readYamlFile(filePath, "keybinds")
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new Error(`Keybind file not found: ${filePath}`)
    }
    throw error
  }
  const loaded = buildKeybindConfiguration(parsed, filePath, strict)
  debugLog("config", `loaded ${loaded.configuration.global.length} global bindings and ${loaded.configuration.modes.size} modes from ${filePath}`)
  return loaded
}
