import { createReadStream } from "node:fs"
import readline from "node:readline"
import type { Readable } from "node:stream"
import { debugLog } from "../utils/debug.js"
import { parseEventLine } from "./events.js"
import type { KeybindSession } from "./session.js"

export interface EventLoopHooks {
  /** Re-reads configuration from disk and applies it to the session; throws to keep the previous snapshot. */
  readonly reload: () => Promise<void>
  readonly report: (message: string) => void
}

export interface EventLoopSummary {
  readonly handled: number
  readonly failed: number
}

export const openEventInput = (filePath: string | null, stdin: Readable = process.stdin): Readable =>
  filePath ? createReadStream(filePath, { encoding: "utf8" }) : stdin

export const readLines = (input: Readable): readline.Interface =>
  readline.createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY })

/**
 * Feeds newline-delimited events into the session one at a time. Each event
 * finishes (including reloads) before the next line is read.
 */
export const runEventLoop = async (
  session: KeybindSession,
  lines: AsyncIterable<string>,
  hooks: EventLoopHooks,
): Promise<EventLoopSummary> => {
  let handled = 0
  let failed = 0
  let lineNumber = 0
  for await (const line of lines) {
    lineNumber += 1
    const parsed = parseEventLine(line)
    if (parsed.kind === "skip") continue
    if (parsed.kind === "error") {
      failed += 1
      hooks.report(`line ${lineNumber}: ${parsed.message}`)
      continue
    }
    for (const warning of parsed.warnings) hooks.report(`line ${lineNumber}: ${warning}`)
    if (parsed.event.type === "reload") {
      try {
        await hooks.reload()
        handled += 1
      } catch (error) {
        failed += 1
        hooks.report(`line ${lineNumber}: reload failed: ${error instanceof Error ? error.message : String(error)}`)
      }
      continue
    }
    session.handle(parsed.event)
    handled += 1
  }
  debugLog("host", `event stream ended after ${lineNumber} lines (${handled} handled, ${failed} failed)`)
  return { handled, failed }
}
