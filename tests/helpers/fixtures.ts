import { parseTrigger } from "../../src/keybinds/trigger.js"
import type { ActiveBinding, Binding, BindingSource, KeybindConfiguration } from "../../src/keybinds/types.js"

export const bind = (key: string, action: string): Binding => {
  const trigger = parseTrigger(key)
  if (!trigger) throw new Error(`bad test key ${key}`)
  return { trigger, action }
}

export const active = (key: string, action: string, source: BindingSource = "mode"): ActiveBinding => ({
  ...bind(key, action),
  source,
})

export const makeConfiguration = (
  global: Binding[],
  modes: Record<string, Binding[]> = {},
): KeybindConfiguration => ({
  global,
  modes: new Map(Object.entries(modes)),
})

/** Global quit, a pane mode overriding it, and a tab mode sharing pane's Esc. */
export const sampleConfiguration = (): KeybindConfiguration =>
  makeConfiguration([bind("Ctrl+q", "quit"), bind("Ctrl+g", "lock")], {
    pane: [bind("Ctrl+q", "close pane"), bind("n", "new pane"), bind("Esc", "normal")],
    tab: [bind("n", "new tab"), bind("Esc", "normal")],
    resize: [bind("Esc", "normal"), bind("+", "grow")],
  })
