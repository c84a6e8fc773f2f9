import { Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { LAYOUT_STYLES, SORT_ORDERS } from "../layout/compose.js"
import type { LoadOptions } from "./showLogic.js"

export const keybindsOption = Options.text("keybinds").pipe(Options.optional)
export const settingsOption = Options.text("settings").pipe(Options.optional)
export const workspaceOption = Options.text("workspace").pipe(Options.optional)
export const presetOption = Options.text("preset").pipe(Options.optional)
export const strictOption = Options.boolean("strict")
export const modeOption = Options.text("mode").pipe(Options.optional)
export const widthOption = Options.integer("width").pipe(Options.optional)
export const heightOption = Options.integer("height").pipe(Options.optional)
export const layoutOption = Options.choice("layout", LAYOUT_STYLES).pipe(Options.optional)
export const sortOption = Options.choice("sort", SORT_ORDERS).pipe(Options.optional)
export const plainOption = Options.boolean("plain")

export const loadOptions = {
  keybinds: keybindsOption,
  settings: settingsOption,
  workspace: workspaceOption,
  preset: presetOption,
  strict: strictOption,
}

export type LoadOptionValues = {
  readonly keybinds: Option.Option<string>
  readonly settings: Option.Option<string>
  readonly workspace: Option.Option<string>
  readonly preset: Option.Option<string>
  readonly strict: boolean
}

export const toLoadOptions = (values: LoadOptionValues): LoadOptions => ({
  keybindsPath: Option.getOrNull(values.keybinds),
  settingsPath: Option.getOrNull(values.settings),
  workspace: Option.getOrNull(values.workspace) ?? process.cwd(),
  preset: Option.getOrNull(values.preset),
  // Absent flag defers to MODEKEYS_CONFIG_STRICT.
  strict: values.strict ? true : null,
})

export const reportWarnings = (warnings: readonly string[]): void => {
  for (const warning of warnings) {
    console.error(`warning: ${warning}`)
  }
}

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)))

/** Runs a command body, printing its failure message before the CLI exits non-zero. */
export const runCommand = (body: () => Promise<void>): Effect.Effect<void, Error> =>
  Effect.tryPromise({ try: body, catch: toError }).pipe(Effect.tapError((error) => Console.error(error.message)))
