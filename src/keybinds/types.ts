export const GLOBAL_MODE = "global"

export interface KeyTrigger {
  readonly key: string
  readonly ctrl: boolean
  readonly alt: boolean
  readonly shift: boolean
}

export interface Binding {
  readonly trigger: KeyTrigger
  readonly action: string
}

/**
 * Immutable snapshot of every binding the host knows about. Reloads replace the
 * whole snapshot; nothing in this package mutates one.
 */
export interface KeybindConfiguration {
  readonly global: ReadonlyArray<Binding>
  readonly modes: ReadonlyMap<string, ReadonlyArray<Binding>>
}

export type BindingSource = "mode" | "global"

export interface ActiveBinding {
  readonly trigger: KeyTrigger
  readonly action: string
  readonly source: BindingSource
}

export type ActiveSet = ReadonlyArray<ActiveBinding>

export interface Viewport {
  readonly width: number
  readonly height: number
}

export type RenderedView = ReadonlyArray<string>
