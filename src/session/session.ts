import { EventEmitter } from "node:events"
import { normalizeModeName, resolve } from "../keybinds/resolve.js"
import type { ActiveSet, KeybindConfiguration, RenderedView, Viewport } from "../keybinds/types.js"
import { composeView, type LayoutSettings } from "../layout/compose.js"
import { normalizeViewport } from "../layout/render.js"
import { plainLines, type StyledLine } from "../layout/segments.js"
import { debugLog } from "../utils/debug.js"

export type SessionEvent =
  | { readonly type: "mode"; readonly mode: string }
  | { readonly type: "resize"; readonly viewport: Viewport }
  | { readonly type: "configuration"; readonly configuration: KeybindConfiguration }

export interface SessionState {
  readonly mode: string
  readonly viewport: Viewport
  readonly activeSet: ActiveSet
  readonly lines: ReadonlyArray<StyledLine>
  readonly view: RenderedView
}

export type StateListener = (state: SessionState) => void

export interface KeybindSessionOptions {
  readonly configuration: KeybindConfiguration
  readonly mode: string
  readonly viewport: Viewport
  readonly settings: LayoutSettings
}

/**
 * Live view over one configuration snapshot. Every event recomputes the view
 * synchronously, so listeners always see the state after the latest event.
 */
export class KeybindSession extends EventEmitter {
  private configuration: KeybindConfiguration
  private mode: string
  private viewport: Viewport
  private settings: LayoutSettings
  private activeSet: ActiveSet = []
  private lines: ReadonlyArray<StyledLine> = []
  private revision = 0

  constructor(options: KeybindSessionOptions) {
    super()
    this.configuration = options.configuration
    this.mode = normalizeModeName(options.mode)
    this.viewport = normalizeViewport(options.viewport)
    this.settings = options.settings
    this.recompute()
  }

  getState(): SessionState {
    return {
      mode: this.mode,
      viewport: this.viewport,
      activeSet: this.activeSet,
      lines: this.lines,
      view: plainLines(this.lines),
    }
  }

  get revisionCount(): number {
    return this.revision
  }

  view(): RenderedView {
    return plainLines(this.lines)
  }

  handle(event: SessionEvent): RenderedView {
    switch (event.type) {
      case "mode":
        this.mode = normalizeModeName(event.mode)
        break
      case "resize":
        this.viewport = normalizeViewport(event.viewport)
        break
      case "configuration":
        this.configuration = event.configuration
        break
    }
    debugLog("session", `${event.type} -> mode=${this.mode} viewport=${this.viewport.width}x${this.viewport.height}`)
    this.recompute()
    this.emit("change", this.getState())
    return this.view()
  }

  updateSettings(settings: LayoutSettings): RenderedView {
    this.settings = settings
    this.recompute()
    this.emit("change", this.getState())
    return this.view()
  }

  onChange(listener: StateListener): () => void {
    this.on("change", listener)
    listener(this.getState())
    return () => {
      this.off("change", listener)
    }
  }

  private recompute(): void {
    this.activeSet = resolve(this.configuration, this.mode)
    this.lines = composeView(this.configuration, this.mode, this.viewport, this.settings)
    this.revision += 1
  }
}
