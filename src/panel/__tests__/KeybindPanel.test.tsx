import React from "react"
import { describe, expect, it } from "vitest"
import { render } from "ink-testing-library"
import { bind, makeConfiguration } from "../../../tests/helpers/fixtures.js"
import { createPalette } from "../../layout/theme.js"
import { KeybindSession } from "../../session/session.js"
import { KeybindPanel } from "../KeybindPanel.js"

const flush = () => new Promise((resolve) => setTimeout(resolve, 0))

const createSession = () =>
  new KeybindSession({
    configuration: makeConfiguration([bind("Ctrl+q", "quit")], {
      pane: [bind("Ctrl+q", "close pane"), bind("Ctrl+n", "new pane")],
    }),
    mode: "normal",
    viewport: { width: 40, height: 3 },
    settings: { style: "flow", sort: "declared", separator: "  ", sharedMinModes: 2, asciiOnly: false },
  })

describe("KeybindPanel", () => {
  it("renders the current view and follows session events", async () => {
    const session = createSession()
    const { lastFrame, unmount } = render(<KeybindPanel session={session} palette={createPalette("none")} />)
    expect(lastFrame() ?? "").toBe("Ctrl+q → quit")

    session.handle({ type: "mode", mode: "pane" })
    await flush()
    expect(lastFrame() ?? "").toBe("Ctrl+q → close pane  Ctrl+n → new pane")

    session.handle({ type: "resize", viewport: { width: 20, height: 3 } })
    await flush()
    expect(lastFrame() ?? "").toBe("Ctrl+q → close pane\nCtrl+n → new pane")
    unmount()
  })

  it("sizes the session from the terminal when following it", async () => {
    const session = createSession()
    const { unmount } = render(<KeybindPanel session={session} palette={createPalette("none")} followTerminal />)
    await flush()
    expect(session.getState().viewport.width).toBe(100)
    unmount()
  })
})
