import { triggerId } from "./trigger.js"
import { GLOBAL_MODE, type ActiveBinding, type ActiveSet, type Binding, type BindingSource, type KeybindConfiguration } from "./types.js"

export const normalizeModeName = (value: string): string => value.trim().toLowerCase()

/** Mode bindings for `mode`, or undefined for unknown modes and the Global pseudo-mode. */
export const lookupMode = (
  configuration: KeybindConfiguration,
  mode: string,
): ReadonlyArray<Binding> | undefined => {
  const name = normalizeModeName(mode)
  if (name === GLOBAL_MODE) return undefined
  return configuration.modes.get(name)
}

export const listModes = (configuration: KeybindConfiguration): string[] => [...configuration.modes.keys()]

// Last declaration wins, first declaration keeps its slot.
const dedupeBindings = (bindings: ReadonlyArray<Binding>, source: BindingSource): Map<string, ActiveBinding> => {
  const entries = new Map<string, ActiveBinding>()
  for (const binding of bindings) {
    entries.set(triggerId(binding.trigger), { trigger: binding.trigger, action: binding.action, source })
  }
  return entries
}

/**
 * Bindings in effect for `currentMode`: the Global bindings in declaration
 * order with the mode's bindings overlaid. A mode binding takes over the slot of
 * the Global binding it redefines; the rest follow in declaration order.
 * Unknown modes resolve to the Global bindings alone.
 */
export const resolve = (configuration: KeybindConfiguration, currentMode: string): ActiveSet => {
  const entries = dedupeBindings(configuration.global, "global")
  for (const [id, entry] of dedupeBindings(lookupMode(configuration, currentMode) ?? [], "mode")) {
    entries.set(id, entry)
  }
  return [...entries.values()]
}
