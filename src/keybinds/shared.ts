import { lookupMode, normalizeModeName, resolve } from "./resolve.js"
import { sameTrigger, triggerId } from "./trigger.js"
import type { ActiveBinding, ActiveSet, KeybindConfiguration } from "./types.js"

export const DEFAULT_SHARED_MIN_MODES = 2

export interface SharedPartition {
  readonly mode: ActiveSet
  readonly shared: ActiveSet
}

export interface PartitionOptions {
  readonly minSharedModes?: number
}

const countOtherModesBinding = (
  configuration: KeybindConfiguration,
  currentMode: string,
  entry: ActiveBinding,
): number => {
  let count = 0
  for (const [name, bindings] of configuration.modes) {
    if (name === currentMode) continue
    if (bindings.some((binding) => sameTrigger(binding.trigger, entry.trigger) && binding.action === entry.action)) {
      count += 1
    }
  }
  return count
}

/**
 * Splits the active set into bindings specific to `currentMode` and bindings the
 * mode shares with the rest of the configuration. Global bindings always land
 * in the shared half.
 */
export const partitionShared = (
  configuration: KeybindConfiguration,
  currentMode: string,
  options: PartitionOptions = {},
): SharedPartition => {
  const minSharedModes = Math.max(1, Math.trunc(options.minSharedModes ?? DEFAULT_SHARED_MIN_MODES))
  const active = resolve(configuration, currentMode)
  const modeName = lookupMode(configuration, currentMode) ? normalizeModeName(currentMode) : null
  const mode: ActiveBinding[] = []
  const shared: ActiveBinding[] = []
  for (const entry of active) {
    if (entry.source === "global" || modeName == null) {
      shared.push(entry)
    } else if (countOtherModesBinding(configuration, modeName, entry) >= minSharedModes) {
      shared.push(entry)
    } else {
      mode.push(entry)
    }
  }
  return { mode, shared }
}

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

/** Stable sort by action label, then trigger, so one action's keys sit together. */
export const sortByAction = (active: ActiveSet): ActiveSet =>
  [...active].sort(
    (a, b) => compareText(a.action, b.action) || compareText(triggerId(a.trigger), triggerId(b.trigger)),
  )
