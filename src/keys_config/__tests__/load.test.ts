import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { promises as fs } from "node:fs"
import os from "node:os"
import path from "node:path"
import { loadKeybindConfiguration, resolveKeybindsPath, resolveSettings } from "../load.js"

const envKeys = [
  "HOME",
  "XDG_CONFIG_HOME",
  "MODEKEYS_PRESET",
  "MODEKEYS_KEYBINDS",
  "MODEKEYS_MODE",
  "MODEKEYS_LAYOUT",
  "MODEKEYS_SORT",
  "MODEKEYS_SEPARATOR",
  "MODEKEYS_SHARED_MIN_MODES",
  "MODEKEYS_ASCII",
  "MODEKEYS_COLOR_MODE",
  "MODEKEYS_CONFIG_STRICT",
  "NO_COLOR",
]

let snapshot = new Map<string, string | undefined>()
let root = ""
let workspace = ""
let configHome = ""

beforeEach(async () => {
  snapshot = new Map(envKeys.map((key) => [key, process.env[key]]))
  for (const key of envKeys) delete process.env[key]
  root = await fs.mkdtemp(path.join(os.tmpdir(), "modekeys-config-"))
  workspace = path.join(root, "workspace")
  configHome = path.join(root, "xdg")
  await fs.mkdir(path.join(workspace, ".modekeys"), { recursive: true })
  await fs.mkdir(path.join(configHome, "modekeys"), { recursive: true })
  process.env.XDG_CONFIG_HOME = configHome
})

afterEach(async () => {
  for (const key of envKeys) {
    const value = snapshot.get(key)
    if (value == null) delete process.env[key]
    else process.env[key] = value
  }
  await fs.rm(root, { recursive: true, force: true })
})

const write = async (filePath: string, lines: string[]) => {
  await fs.writeFile(filePath, lines.join("\n"), "utf8")
  return filePath
}

describe("resolveSettings", () => {
  it("applies defaults -> preset -> repo -> user -> cli -> env", async () => {
    const repoPath = await write(path.join(workspace, ".modekeys", "settings.yaml"), [
      "defaultMode: Pane",
      "layout:",
      "  style: panels",
      "  separator: ' · '",
    ])
    const userPath = await write(path.join(configHome, "modekeys", "settings.yaml"), ["layout:", "  sort: action"])
    const cliPath = await write(path.join(root, "cli.yaml"), ["display:", "  asciiOnly: true"])
    process.env.MODEKEYS_SEPARATOR = " / "
    process.env.MODEKEYS_COLOR_MODE = "256"

    const resolved = await resolveSettings({ workspace, cliSettingsPath: cliPath })

    expect(resolved.preset).toBe("compact")
    expect(resolved.defaultMode).toBe("pane")
    expect(resolved.layout).toEqual({ style: "panels", sort: "action", separator: " / ", sharedMinModes: 2 })
    expect(resolved.display).toEqual({ asciiOnly: true, colorMode: "ansi256" })
    expect(resolved.meta.sources).toEqual([
      "defaults",
      "preset:compact",
      "preset-select",
      `repo:${repoPath}`,
      `user:${userPath}`,
      `cli-settings:${cliPath}`,
      "env",
    ])
    expect(resolved.meta.warnings).toEqual([])
  })

  it("re-applies a preset named inside a file layer", async () => {
    await write(path.join(workspace, "modekeys.settings.yaml"), ["preset: plain", "layout:", "  separator: ' ~ '"])
    const resolved = await resolveSettings({ workspace })
    expect(resolved.preset).toBe("plain")
    expect(resolved.layout.separator).toBe(" ~ ")
    expect(resolved.display).toEqual({ asciiOnly: true, colorMode: "none" })
  })

  it("selects the preset from the cli or environment", async () => {
    process.env.MODEKEYS_PRESET = "plain"
    expect((await resolveSettings({ workspace })).preset).toBe("plain")
    expect((await resolveSettings({ workspace, cliPreset: "zellij" })).layout.style).toBe("panels")
    await expect(resolveSettings({ workspace, cliPreset: "fancy" })).rejects.toThrow(
      'Unknown preset "fancy". Expected one of compact, zellij, plain.',
    )
  })

  it("forces colour off for NO_COLOR and when colour is not allowed", async () => {
    expect((await resolveSettings({ workspace, colorAllowed: false })).display.colorMode).toBe("none")
    process.env.NO_COLOR = "1"
    expect((await resolveSettings({ workspace })).display.colorMode).toBe("none")
  })

  it("collects unknown keys as warnings unless strict", async () => {
    const repoPath = await write(path.join(workspace, ".modekeys", "settings.yaml"), ["colour: red"])
    const resolved = await resolveSettings({ workspace })
    expect(resolved.meta.warnings).toEqual([`${repoPath}: [warning] colour: Unknown key.`])
    await expect(resolveSettings({ workspace, cliStrict: true })).rejects.toThrow(
      `Invalid settings at ${repoPath}\n[error] colour: Unknown key.`,
    )
  })

  it("warns about unusable environment values", async () => {
    process.env.MODEKEYS_LAYOUT = "grid"
    const resolved = await resolveSettings({ workspace })
    expect(resolved.layout.style).toBe("flow")
    expect(resolved.meta.warnings).toEqual(['MODEKEYS_LAYOUT: ignoring unknown layout "grid".'])
  })

  it("rejects invalid values in settings files", async () => {
    const cliPath = await write(path.join(root, "bad.yaml"), ["layout:", "  style: grid"])
    await expect(resolveSettings({ workspace, cliSettingsPath: cliPath })).rejects.toThrow(
      `Invalid settings at ${cliPath}\n[error] layout.style: Expected one of flow, panels.`,
    )
  })
})

describe("settings-relative keybind paths", () => {
  it("resolves a relative keybinds path against the settings file that declares it", async () => {
    await write(path.join(workspace, ".modekeys", "settings.yaml"), ["keybinds: keys/main.yaml"])
    const resolved = await resolveSettings({ workspace })
    const expected = path.join(workspace, ".modekeys", "keys", "main.yaml")
    expect(resolved.keybinds).toBe(expected)
    expect(await resolveKeybindsPath({ workspace, settings: resolved })).toBe(expected)
  })

  it("leaves absolute keybinds paths alone", async () => {
    await write(path.join(workspace, ".modekeys", "settings.yaml"), ["keybinds: /opt/keys.yaml"])
    expect((await resolveSettings({ workspace })).keybinds).toBe("/opt/keys.yaml")
  })
})

describe("keybind files", () => {
  it("prefers the explicit path, then settings, then workspace and user files", async () => {
    expect(await resolveKeybindsPath({ workspace })).toBeNull()
    const userPath = await write(path.join(configHome, "modekeys", "keybinds.yaml"), ["global: []"])
    expect(await resolveKeybindsPath({ workspace })).toBe(userPath)
    const repoPath = await write(path.join(workspace, ".modekeys", "keybinds.yaml"), ["global: []"])
    expect(await resolveKeybindsPath({ workspace })).toBe(repoPath)
    expect(await resolveKeybindsPath({ workspace, settings: { keybinds: "/etc/keys.yaml" } })).toBe("/etc/keys.yaml")
    expect(await resolveKeybindsPath({ workspace, cliPath: "keys.json", settings: { keybinds: "/etc/keys.yaml" } })).toBe(
      path.resolve(process.cwd(), "keys.json"),
    )
  })

  it("loads YAML and JSON documents", async () => {
    const yamlPath = await write(path.join(root, "keys.yaml"), [
      "global:",
      "  - key: Ctrl+q",
      "    action: quit",
      "modes:",
      "  pane:",
      "    - { key: n, action: [NewPane, FocusNew] }",
    ])
    const loaded = await loadKeybindConfiguration(yamlPath)
    expect(loaded.warnings).toEqual([])
    expect(loaded.configuration.modes.get("pane")?.[0]?.action).toBe("NewPane, FocusNew")

    const jsonPath = await write(path.join(root, "keys.json"), ['{"global":[{"key":"F1","action":"help"}]}'])
    const json = await loadKeybindConfiguration(jsonPath)
    expect(json.configuration.global[0]?.trigger.key).toBe("F1")
  })

  it("reports missing, unparseable and invalid files", async () => {
    const missing = path.join(root, "missing.yaml")
    await expect(loadKeybindConfiguration(missing)).rejects.toThrow(`Keybind file not found: ${missing}`)
    const broken = await write(path.join(root, "broken.yaml"), ["global: [", "  - key: a"])
    await expect(loadKeybindConfiguration(broken)).rejects.toThrow(`Failed to parse keybinds at ${broken}:`)
    const invalid = await write(path.join(root, "invalid.yaml"), ["global:", "  - key: Hyper+x", "    action: x"])
    await expect(loadKeybindConfiguration(invalid)).rejects.toThrow(
      `Invalid keybinds in ${invalid}\n[error] global.0.key: Unrecognised key "Hyper+x".`,
    )
  })
})
