import { describe, expect, it } from "vitest"
import { formatTrigger, parseTrigger, sameTrigger, triggerId } from "../trigger.js"

describe("parseTrigger", () => {
  it("parses modifier chords", () => {
    expect(parseTrigger("Ctrl+q")).toEqual({ key: "q", ctrl: true, alt: false, shift: false })
    expect(parseTrigger("Shift+Tab")).toEqual({ key: "Tab", ctrl: false, alt: false, shift: true })
    expect(parseTrigger("meta+Left")).toEqual({ key: "Left", ctrl: false, alt: true, shift: false })
  })

  it("folds the case of ctrl and alt letters only", () => {
    expect(parseTrigger("Ctrl+Q")).toEqual(parseTrigger("ctrl+q"))
    expect(parseTrigger("Alt+N")?.key).toBe("n")
    expect(parseTrigger("N")?.key).toBe("N")
  })

  it("normalizes named and function keys", () => {
    expect(parseTrigger("escape")?.key).toBe("Esc")
    expect(parseTrigger("PgDn")?.key).toBe("PageDown")
    expect(parseTrigger("f12")?.key).toBe("F12")
    expect(parseTrigger(" ")?.key).toBe("Space")
  })

  it("treats a trailing plus as the plus key", () => {
    expect(parseTrigger("+")).toEqual({ key: "+", ctrl: false, alt: false, shift: false })
    expect(parseTrigger("Ctrl++")).toEqual({ key: "+", ctrl: true, alt: false, shift: false })
  })

  it("rejects unknown modifiers and key names", () => {
    expect(parseTrigger("Hyper+x")).toBeNull()
    expect(parseTrigger("F13")).toBeNull()
    expect(parseTrigger("ctrl+shift+")).toBeNull()
    expect(parseTrigger("")).toBeNull()
    expect(parseTrigger("toString")).toBeNull()
  })
})

describe("trigger identity", () => {
  it("builds ids and labels in modifier order", () => {
    const trigger = parseTrigger("shift+alt+ctrl+x")
    expect(trigger).not.toBeNull()
    if (!trigger) return
    expect(triggerId(trigger)).toBe("C-A-S-x")
    expect(formatTrigger(trigger)).toBe("Ctrl+Alt+Shift+x")
  })

  it("compares every field", () => {
    const a = { key: "n", ctrl: true, alt: false, shift: false }
    expect(sameTrigger(a, { ...a })).toBe(true)
    expect(sameTrigger(a, { ...a, alt: true })).toBe(false)
  })
})
