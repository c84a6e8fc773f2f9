import type { ResolvedSettings, PresetId, SettingsInput } from "./types.js"

export const BUILTIN_PRESETS: Record<PresetId, SettingsInput> = {
  compact: {
    layout: {
      style: "flow",
      sort: "declared",
      separator: "  ",
    },
  },
  zellij: {
    layout: {
      style: "panels",
      sort: "action",
      separator: "  ",
      sharedMinModes: 2,
    },
  },
  plain: {
    layout: {
      style: "flow",
      sort: "declared",
      separator: " | ",
    },
    display: {
      asciiOnly: true,
      colorMode: "none",
    },
  },
}

export const DEFAULT_PRESET: PresetId = "compact"

export const PRESET_IDS = Object.keys(BUILTIN_PRESETS)

export const isBuiltinPreset = (value: string): value is PresetId =>
  value === "compact" || value === "zellij" || value === "plain"

export const DEFAULT_MODE = "normal"

export const DEFAULT_RESOLVED_SETTINGS: ResolvedSettings = {
  preset: DEFAULT_PRESET,
  keybinds: null,
  defaultMode: DEFAULT_MODE,
  layout: {
    style: "flow",
    sort: "declared",
    separator: "  ",
    sharedMinModes: 2,
  },
  display: {
    asciiOnly: false,
    colorMode: "truecolor",
  },
  meta: {
    strict: false,
    warnings: [],
    sources: ["defaults"],
  },
}
