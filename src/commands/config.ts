import { Command, Options } from "@effect/cli"
import { Option } from "effect"
import { stringify } from "yaml"
import { resolveKeybindsPath, resolveSettings } from "../keys_config/load.js"
import type { ResolvedSettings } from "../keys_config/types.js"
import { plainOption, presetOption, runCommand, settingsOption, strictOption, workspaceOption } from "./options.js"

const outputOption = Options.choice("output", ["json", "yaml", "summary"] as const).pipe(Options.withDefault("json"))

export const formatSettingsSummary = (resolved: ResolvedSettings, keybindsPath: string | null): string[] => {
  const lines = [
    "Effective modekeys settings",
    `preset: ${resolved.preset}`,
    `keybinds: ${keybindsPath ?? "(not found)"}`,
    `defaultMode: ${resolved.defaultMode}`,
    `layout.style: ${resolved.layout.style}`,
    `layout.sort: ${resolved.layout.sort}`,
    `layout.separator: ${JSON.stringify(resolved.layout.separator)}`,
    `layout.sharedMinModes: ${resolved.layout.sharedMinModes}`,
    `display.asciiOnly: ${resolved.display.asciiOnly}`,
    `display.colorMode: ${resolved.display.colorMode}`,
    `meta.strict: ${resolved.meta.strict}`,
    `meta.sources: ${resolved.meta.sources.join(" -> ")}`,
  ]
  if (resolved.meta.warnings.length > 0) {
    lines.push("meta.warnings:", ...resolved.meta.warnings.map((warning) => `- ${warning}`))
  }
  return lines
}

export const configCommand = Command.make(
  "config",
  {
    workspace: workspaceOption,
    preset: presetOption,
    settings: settingsOption,
    strict: strictOption,
    plain: plainOption,
    output: outputOption,
  },
  ({ workspace, preset, settings, strict, plain, output }) =>
    runCommand(async () => {
      const workspaceValue = Option.getOrNull(workspace) ?? process.cwd()
      const resolved = await resolveSettings({
        workspace: workspaceValue,
        cliPreset: Option.getOrNull(preset),
        cliSettingsPath: Option.getOrNull(settings),
        cliStrict: strict ? true : null,
        colorAllowed: !plain,
      })
      const keybindsPath = await resolveKeybindsPath({ settings: resolved, workspace: workspaceValue })

      if (output === "yaml") {
        console.log(stringify({ ...resolved, keybindsPath }))
        return
      }
      if (output === "summary") {
        for (const line of formatSettingsSummary(resolved, keybindsPath)) {
          console.log(line)
        }
        return
      }
      console.log(JSON.stringify({ ...resolved, keybindsPath }, null, 2))
    }),
)
