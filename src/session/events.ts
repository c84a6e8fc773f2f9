import { buildKeybindConfiguration } from "../keys_config/load.js"
import type { SessionEvent } from "./session.js"

export type HostEvent = SessionEvent | { readonly type: "reload" }

export type ParsedEventLine =
  | { readonly kind: "event"; readonly event: HostEvent; readonly warnings: readonly string[] }
  | { readonly kind: "skip" }
  | { readonly kind: "error"; readonly message: string }

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value != null && !Array.isArray(value)

const readCells = (payload: Record<string, unknown>, primary: string, alias: string): number | null => {
  const value = payload[primary] ?? payload[alias]
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : null
}

const failure = (message: string): ParsedEventLine => ({ kind: "error", message })

/**
 * Parses one newline-delimited JSON event. Blank lines and `#` comments are
 * skipped; anything malformed comes back as an error entry instead of throwing.
 */
export const parseEventLine = (line: string): ParsedEventLine => {
  const text = line.trim()
  if (!text || text.startsWith("#")) return { kind: "skip" }

  let payload: unknown
  try {
    payload = JSON.parse(text)
  } catch (error) {
    return failure(`Malformed event: ${error instanceof Error ? error.message : String(error)}`)
  }
  if (!isRecord(payload)) return failure("Malformed event: expected a JSON object.")

  switch (payload.type) {
    case "mode": {
      if (typeof payload.mode !== "string") return failure('Mode event requires a string "mode".')
      return { kind: "event", event: { type: "mode", mode: payload.mode }, warnings: [] }
    }
    case "resize": {
      const width = readCells(payload, "width", "cols")
      const height = readCells(payload, "height", "rows")
      if (width == null || height == null) {
        return failure("Resize event requires non-negative numeric width/height (or cols/rows).")
      }
      return { kind: "event", event: { type: "resize", viewport: { width, height } }, warnings: [] }
    }
    case "configuration": {
      try {
        const loaded = buildKeybindConfiguration(payload.keybinds, "configuration event")
        return {
          kind: "event",
          event: { type: "configuration", configuration: loaded.configuration },
          warnings: loaded.warnings,
        }
      } catch (error) {
        return failure(error instanceof Error ? error.message : String(error))
      }
    }
    case "reload":
      return { kind: "event", event: { type: "reload" }, warnings: [] }
    default:
      return failure(`Unknown event type ${JSON.stringify(payload.type ?? null)}.`)
  }
}
