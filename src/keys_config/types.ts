import type { LayoutStyle, SortOrder } from "../layout/compose.js"
import type { ColorMode } from "../layout/theme.js"

export type PresetId = "compact" | "zellij" | "plain"

export type SettingsInput = {
  preset?: string
  keybinds?: string
  defaultMode?: string
  layout?: {
    style?: LayoutStyle
    sort?: SortOrder
    separator?: string
    sharedMinModes?: number
  }
  display?: {
    asciiOnly?: boolean
    colorMode?: ColorMode
  }
}

export type ResolvedSettings = {
  readonly preset: PresetId
  readonly keybinds: string | null
  readonly defaultMode: string
  readonly layout: {
    readonly style: LayoutStyle
    readonly sort: SortOrder
    readonly separator: string
    readonly sharedMinModes: number
  }
  readonly display: {
    readonly asciiOnly: boolean
    readonly colorMode: ColorMode
  }
  readonly meta: {
    readonly strict: boolean
    readonly warnings: readonly string[]
    readonly sources: readonly string[]
  }
}

export type ResolveSettingsOptions = {
  readonly workspace?: string | null
  readonly cliPreset?: string | null
  readonly cliSettingsPath?: string | null
  readonly cliStrict?: boolean | null
  /** False forces `colorMode: none` regardless of files and environment. */
  readonly colorAllowed?: boolean
}

export type ValidationIssue = {
  readonly severity: "error" | "warning"
  readonly path: string
  readonly message: string
}

export type ValidationOptions = {
  readonly strictUnknownKeys: boolean
}
