import { describe, expect, it } from "vitest"
import { bind, makeConfiguration, sampleConfiguration } from "../../../tests/helpers/fixtures.js"
import { listModes, lookupMode, resolve } from "../resolve.js"
import { formatTrigger, triggerId } from "../trigger.js"
import type { ActiveSet } from "../types.js"

const summarize = (set: ActiveSet) => set.map((entry) => `${formatTrigger(entry.trigger)}=${entry.action}@${entry.source}`)

describe("resolve", () => {
  const configuration = makeConfiguration([bind("Ctrl+q", "quit")], {
    pane: [bind("Ctrl+q", "close pane"), bind("Ctrl+n", "new pane")],
  })

  it("lets a mode binding shadow the global one", () => {
    expect(summarize(resolve(configuration, "pane"))).toEqual(["Ctrl+q=close pane@mode", "Ctrl+n=new pane@mode"])
  })

  it("falls back to global bindings for unknown modes", () => {
    expect(summarize(resolve(configuration, "unknown"))).toEqual(["Ctrl+q=quit@global"])
    expect(summarize(resolve(configuration, "global"))).toEqual(["Ctrl+q=quit@global"])
  })

  it("matches mode names case-insensitively", () => {
    expect(resolve(configuration, "  PANE ")).toEqual(resolve(configuration, "pane"))
  })

  it("overlays mode entries onto the global order", () => {
    expect(summarize(resolve(sampleConfiguration(), "pane"))).toEqual([
      "Ctrl+q=close pane@mode",
      "Ctrl+g=lock@global",
      "n=new pane@mode",
      "Esc=normal@mode",
    ])
  })

  it("keeps the first slot and the last action for repeated triggers", () => {
    const repeated = makeConfiguration([bind("a", "one"), bind("b", "two"), bind("a", "three")])
    expect(summarize(resolve(repeated, "normal"))).toEqual(["a=three@global", "b=two@global"])
  })

  it("never yields duplicate triggers", () => {
    const configuration = sampleConfiguration()
    for (const mode of [...listModes(configuration), "missing"]) {
      const ids = resolve(configuration, mode).map((entry) => triggerId(entry.trigger))
      expect(new Set(ids).size).toBe(ids.length)
    }
  })

  it("returns an empty set for an empty configuration", () => {
    expect(resolve(makeConfiguration([]), "pane")).toEqual([])
  })
})

describe("lookupMode", () => {
  it("does not treat global as a mode", () => {
    const configuration = sampleConfiguration()
    expect(lookupMode(configuration, "Global")).toBeUndefined()
    expect(lookupMode(configuration, "Tab")).toHaveLength(2)
    expect(listModes(configuration)).toEqual(["pane", "tab", "resize"])
  })
})
