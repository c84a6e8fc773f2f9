import { normalizeModeName } from "../keybinds/resolve.js"
import { formatTrigger, parseTrigger, triggerId } from "../keybinds/trigger.js"
import { GLOBAL_MODE, type Binding, type KeybindConfiguration } from "../keybinds/types.js"
import { COLOR_MODES } from "../layout/theme.js"
import { LAYOUT_STYLES, SORT_ORDERS } from "../layout/compose.js"
import { singleLine } from "../layout/text.js"
import type { SettingsInput, ValidationIssue, ValidationOptions } from "./types.js"

type SettingsValidationResult = {
  readonly config: SettingsInput
  readonly issues: readonly ValidationIssue[]
}

type KeybindValidationResult = {
  readonly configuration: KeybindConfiguration
  readonly issues: readonly ValidationIssue[]
}

const BOOL_TRUE = new Set(["1", "true", "yes", "on"])
const BOOL_FALSE = new Set(["0", "false", "no", "off"])

const toPath = (parts: readonly string[]): string => (parts.length > 0 ? parts.join(".") : "<root>")

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value != null && !Array.isArray(value)

const describeType = (value: unknown): string => (Array.isArray(value) ? "list" : value === null ? "null" : typeof value)

export const parseBooleanLike = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") return value
  if (typeof value !== "string") return undefined
  const normalized = value.trim().toLowerCase()
  if (BOOL_TRUE.has(normalized)) return true
  if (BOOL_FALSE.has(normalized)) return false
  return undefined
}

const readRecord = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): Record<string, unknown> | undefined => {
  const value = source[key]
  if (value == null) return undefined
  if (!isRecord(value)) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected object, received ${describeType(value)}.`,
    })
    return undefined
  }
  return value
}

const readBoolean = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): boolean | undefined => {
  if (source[key] == null) return undefined
  const parsed = parseBooleanLike(source[key])
  if (parsed == null) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: "Expected boolean (or bool-like string).",
    })
    return undefined
  }
  return parsed
}

const readString = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): string | undefined => {
  const value = source[key]
  if (value == null) return undefined
  if (typeof value !== "string") {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected string, received ${describeType(value)}.`,
    })
    return undefined
  }
  return value
}

const readPositiveInt = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): number | undefined => {
  const value = source[key]
  if (value == null) return undefined
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string"
        ? Number.parseInt(value.trim(), 10)
        : Number.NaN
  if (!Number.isFinite(parsed) || parsed < 1 || !Number.isInteger(parsed)) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: "Expected positive integer.",
    })
    return undefined
  }
  return parsed
}

const readEnum = <T extends string>(
  source: Record<string, unknown>,
  key: string,
  values: readonly T[],
  path: readonly string[],
  issues: ValidationIssue[],
): T | undefined => {
  const raw = readString(source, key, path, issues)
  if (raw == null) return undefined
  const match = values.find((value) => value === raw)
  if (match == null) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected one of ${values.join(", ")}.`,
    })
  }
  return match
}

const detectUnknownKeys = (
  source: Record<string, unknown>,
  allowed: readonly string[],
  path: readonly string[],
  issues: ValidationIssue[],
  strictUnknownKeys: boolean,
) => {
  for (const key of Object.keys(source)) {
    if (allowed.includes(key)) continue
    issues.push({
      severity: strictUnknownKeys ? "error" : "warning",
      path: toPath([...path, key]),
      message: "Unknown key.",
    })
  }
}

export const validateSettingsInput = (input: unknown, options: ValidationOptions): SettingsValidationResult => {
  const issues: ValidationIssue[] = []
  if (input == null) return { config: {}, issues }
  if (!isRecord(input)) {
    issues.push({
      severity: "error",
      path: "<root>",
      message: "Expected top-level object.",
    })
    return { config: {}, issues }
  }

  const root = input
  detectUnknownKeys(root, ["preset", "keybinds", "defaultMode", "layout", "display"], [], issues, options.strictUnknownKeys)

  const config: SettingsInput = {}
  const preset = readString(root, "preset", [], issues)
  if (preset != null) config.preset = preset
  const keybinds = readString(root, "keybinds", [], issues)
  if (keybinds != null && keybinds.trim()) config.keybinds = keybinds.trim()
  const defaultMode = readString(root, "defaultMode", [], issues)
  if (defaultMode != null) {
    if (defaultMode.trim()) config.defaultMode = normalizeModeName(defaultMode)
    else issues.push({ severity: "error", path: "defaultMode", message: "Expected non-empty mode name." })
  }

  const layoutRaw = readRecord(root, "layout", [], issues)
  if (layoutRaw) {
    detectUnknownKeys(layoutRaw, ["style", "sort", "separator", "sharedMinModes"], ["layout"], issues, options.strictUnknownKeys)
    const layout: NonNullable<SettingsInput["layout"]> = {}
    const style = readEnum(layoutRaw, "style", LAYOUT_STYLES, ["layout"], issues)
    if (style != null) layout.style = style
    const sort = readEnum(layoutRaw, "sort", SORT_ORDERS, ["layout"], issues)
    if (sort != null) layout.sort = sort
    const separator = readString(layoutRaw, "separator", ["layout"], issues)
    if (separator != null) {
      if (separator.length > 0) layout.separator = separator
      else issues.push({ severity: "error", path: "layout.separator", message: "Expected non-empty separator." })
    }
    const sharedMinModes = readPositiveInt(layoutRaw, "sharedMinModes", ["layout"], issues)
    if (sharedMinModes != null) layout.sharedMinModes = sharedMinModes
    config.layout = layout
  }

  const displayRaw = readRecord(root, "display", [], issues)
  if (displayRaw) {
    detectUnknownKeys(displayRaw, ["asciiOnly", "colorMode"], ["display"], issues, options.strictUnknownKeys)
    const display: NonNullable<SettingsInput["display"]> = {}
    const asciiOnly = readBoolean(displayRaw, "asciiOnly", ["display"], issues)
    if (asciiOnly != null) display.asciiOnly = asciiOnly
    const colorMode = readEnum(displayRaw, "colorMode", COLOR_MODES, ["display"], issues)
    if (colorMode != null) display.colorMode = colorMode
    config.display = display
  }

  return { config, issues }
}

const readAction = (item: Record<string, unknown>, path: readonly string[], issues: ValidationIssue[]): string | null => {
  const raw = item.action
  const parts: unknown[] | null = typeof raw === "string" ? [raw] : Array.isArray(raw) ? raw : null
  if (parts == null || !parts.every((part): part is string => typeof part === "string")) {
    issues.push({
      severity: "error",
      path: toPath([...path, "action"]),
      message: raw == null ? "Missing action." : "Expected string or list of strings.",
    })
    return null
  }
  const action = parts
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(", ")
  if (!action) {
    issues.push({ severity: "error", path: toPath([...path, "action"]), message: "Expected non-empty action." })
    return null
  }
  const label = singleLine(action)
  if (label !== action) {
    issues.push({
      severity: "warning",
      path: toPath([...path, "action"]),
      message: "Control characters replaced with spaces.",
    })
  }
  return label
}

const readBindingList = (
  raw: unknown,
  path: readonly string[],
  seen: Set<string>,
  issues: ValidationIssue[],
  strictUnknownKeys: boolean,
): Binding[] => {
  if (raw == null) return []
  if (!Array.isArray(raw)) {
    issues.push({ severity: "error", path: toPath(path), message: `Expected list, received ${describeType(raw)}.` })
    return []
  }
  const bindings: Binding[] = []
  raw.forEach((item: unknown, index) => {
    const itemPath = [...path, String(index)]
    if (!isRecord(item)) {
      issues.push({
        severity: "error",
        path: toPath(itemPath),
        message: `Expected binding object, received ${describeType(item)}.`,
      })
      return
    }
    detectUnknownKeys(item, ["key", "action"], itemPath, issues, strictUnknownKeys)
    const key = readString(item, "key", itemPath, issues)
    if (key == null) {
      if (item.key == null) issues.push({ severity: "error", path: toPath([...itemPath, "key"]), message: "Missing key." })
      return
    }
    const trigger = parseTrigger(key)
    if (!trigger) {
      issues.push({ severity: "error", path: toPath([...itemPath, "key"]), message: `Unrecognised key "${key}".` })
      return
    }
    const action = readAction(item, itemPath, issues)
    if (action == null) return
    const id = triggerId(trigger)
    if (seen.has(id)) {
      issues.push({
        severity: "warning",
        path: toPath(itemPath),
        message: `Duplicate trigger ${formatTrigger(trigger)}; last declaration wins.`,
      })
    }
    seen.add(id)
    bindings.push({ trigger, action })
  })
  return bindings
}

/**
 * Validates a keybind document (`global` list plus `modes` map) and builds the
 * configuration snapshot from whatever parsed cleanly.
 */
export const validateKeybindInput = (input: unknown, options: ValidationOptions): KeybindValidationResult => {
  const issues: ValidationIssue[] = []
  if (!isRecord(input)) {
    issues.push({
      severity: "error",
      path: "<root>",
      message: "Expected top-level object.",
    })
    return { configuration: { global: [], modes: new Map() }, issues }
  }

  detectUnknownKeys(input, ["global", "modes"], [], issues, options.strictUnknownKeys)
  const global = readBindingList(input.global, ["global"], new Set(), issues, options.strictUnknownKeys)

  const modes = new Map<string, Binding[]>()
  const declaredNames = new Map<string, string>()
  const seenByMode = new Map<string, Set<string>>()
  const modesRaw = readRecord(input, "modes", [], issues) ?? {}
  for (const [rawName, rawBindings] of Object.entries(modesRaw)) {
    const name = normalizeModeName(rawName)
    const path = ["modes", rawName]
    if (!name) {
      issues.push({ severity: "error", path: toPath(path), message: "Mode name must not be empty." })
      continue
    }
    if (name === GLOBAL_MODE) {
      issues.push({
        severity: "error",
        path: toPath(path),
        message: `"${GLOBAL_MODE}" is reserved; declare shared bindings under the top-level global list.`,
      })
      continue
    }
    const previous = declaredNames.get(name)
    if (previous != null) {
      issues.push({
        severity: "warning",
        path: toPath(path),
        message: `Mode name collides with "${previous}" after case folding; bindings merged.`,
      })
    } else {
      declaredNames.set(name, rawName)
    }
    const seen = seenByMode.get(name) ?? new Set<string>()
    seenByMode.set(name, seen)
    const bindings = readBindingList(rawBindings, path, seen, issues, options.strictUnknownKeys)
    modes.set(name, [...(modes.get(name) ?? []), ...bindings])
  }

  return { configuration: { global, modes }, issues }
}

export const formatValidationIssues = (issues: readonly ValidationIssue[]): string[] =>
  issues.map((issue) => `[${issue.severity}] ${issue.path}: ${issue.message}`)
