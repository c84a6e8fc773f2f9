import type { KeyTrigger } from "./types.js"

const MODIFIER_ALIASES = new Map<string, "ctrl" | "alt" | "shift">([
  ["ctrl", "ctrl"],
  ["control", "ctrl"],
  ["ctl", "ctrl"],
  ["alt", "alt"],
  ["meta", "alt"],
  ["option", "alt"],
  ["opt", "alt"],
  ["shift", "shift"],
])

const NAMED_KEYS = new Map<string, string>([
  ["enter", "Enter"],
  ["return", "Enter"],
  ["space", "Space"],
  ["esc", "Esc"],
  ["escape", "Esc"],
  ["tab", "Tab"],
  ["backspace", "Backspace"],
  ["up", "Up"],
  ["down", "Down"],
  ["left", "Left"],
  ["right", "Right"],
  ["arrowup", "Up"],
  ["arrowdown", "Down"],
  ["arrowleft", "Left"],
  ["arrowright", "Right"],
  ["home", "Home"],
  ["end", "End"],
  ["pageup", "PageUp"],
  ["pgup", "PageUp"],
  ["pagedown", "PageDown"],
  ["pgdn", "PageDown"],
  ["insert", "Insert"],
  ["ins", "Insert"],
  ["delete", "Delete"],
  ["del", "Delete"],
])

const LITERAL_KEYS = new Map<string, string>([
  [" ", "Space"],
  ["\n", "Enter"],
  ["\r", "Enter"],
  ["\t", "Tab"],
  ["\u001b", "Esc"],
])

const FUNCTION_KEY_RE = /^f([1-9]|1[0-2])$/i
const LETTER_RE = /^[a-z]$/i

const normalizeKeyName = (token: string): string | null => {
  const literal = LITERAL_KEYS.get(token)
  if (literal) return literal
  if ([...token].length === 1) return token
  const lower = token.toLowerCase()
  const named = NAMED_KEYS.get(lower)
  if (named) return named
  const fn = lower.match(FUNCTION_KEY_RE)
  if (fn) return `F${fn[1]}`
  return null
}

/**
 * Parses `Ctrl+Alt+p`, `Shift+Tab`, `F5`, `+` and friends. Returns null for
 * unknown modifiers or key names.
 */
export const parseTrigger = (raw: string): KeyTrigger | null => {
  const literal = LITERAL_KEYS.get(raw)
  if (literal) {
    return { key: literal, ctrl: false, alt: false, shift: false }
  }
  const text = raw.trim()
  if (!text) return null

  let keyToken: string
  let modifierTokens: string[]
  if (text === "+") {
    keyToken = "+"
    modifierTokens = []
  } else if (text.endsWith("++")) {
    keyToken = "+"
    modifierTokens = text.slice(0, -2).split("+")
  } else {
    const tokens = text.split("+")
    keyToken = tokens.pop() ?? ""
    modifierTokens = tokens
  }

  const modifiers = { ctrl: false, alt: false, shift: false }
  for (const token of modifierTokens) {
    const modifier = MODIFIER_ALIASES.get(token.trim().toLowerCase())
    if (!modifier) return null
    modifiers[modifier] = true
  }

  const key = normalizeKeyName(keyToken.trim())
  if (!key) return null

  // Terminals report Ctrl/Alt letters without case.
  const foldCase = (modifiers.ctrl || modifiers.alt) && LETTER_RE.test(key)
  return {
    key: foldCase ? key.toLowerCase() : key,
    ...modifiers,
  }
}

export const triggerId = (trigger: KeyTrigger): string =>
  `${trigger.ctrl ? "C-" : ""}${trigger.alt ? "A-" : ""}${trigger.shift ? "S-" : ""}${trigger.key}`

export const sameTrigger = (a: KeyTrigger, b: KeyTrigger): boolean =>
  a.key === b.key && a.ctrl === b.ctrl && a.alt === b.alt && a.shift === b.shift

export const formatModifiers = (trigger: KeyTrigger): string => {
  const parts: string[] = []
  if (trigger.ctrl) parts.push("Ctrl")
  if (trigger.alt) parts.push("Alt")
  if (trigger.shift) parts.push("Shift")
  return parts.map((part) => `${part}+`).join("")
}

export const formatTrigger = (trigger: KeyTrigger): string => `${formatModifiers(trigger)}${trigger.key}`
