import React from "react"
import { Command, Options } from "@effect/cli"
import { Option } from "effect"
import { render } from "ink"
import { createPalette } from "../layout/theme.js"
import { KeybindPanel } from "../panel/KeybindPanel.js"
import { openEventInput, readLines, runEventLoop } from "../session/host.js"
import { KeybindSession } from "../session/session.js"
import { debugLog } from "../utils/debug.js"
import {
  heightOption,
  layoutOption,
  loadOptions,
  modeOption,
  plainOption,
  reportWarnings,
  runCommand,
  sortOption,
  toLoadOptions,
  widthOption,
} from "./options.js"
import { applyOverrides, loadContext, resolveModeName, resolveViewport } from "./showLogic.js"

const eventsOption = Options.text("events").pipe(Options.optional)

export const watchCommand = Command.make(
  "watch",
  {
    ...loadOptions,
    mode: modeOption,
    width: widthOption,
    height: heightOption,
    layout: layoutOption,
    sort: sortOption,
    plain: plainOption,
    events: eventsOption,
  },
  (values) =>
    runCommand(async () => {
      const loadOptionsValue = { ...toLoadOptions(values), plain: values.plain }
      const overrides = { layout: Option.getOrNull(values.layout), sort: Option.getOrNull(values.sort) }
      const width = Option.getOrNull(values.width)
      const height = Option.getOrNull(values.height)
      const context = await loadContext(loadOptionsValue)
      reportWarnings(context.warnings)

      const session = new KeybindSession({
        configuration: context.configuration,
        mode: resolveModeName(Option.getOrNull(values.mode), context.settings),
        viewport: resolveViewport(width, height),
        settings: applyOverrides(context.settings, overrides),
      })
      const followTerminal = width == null && height == null
      const renderPanel = (colorMode = context.settings.display.colorMode) => (
        <KeybindPanel session={session} palette={createPalette(colorMode)} followTerminal={followTerminal} />
      )
      const ink = render(renderPanel(), { exitOnCtrlC: false })

      const report = (message: string) => console.error(message)
      const reload = async () => {
        const next = await loadContext(loadOptionsValue)
        reportWarnings(next.warnings)
        session.handle({ type: "configuration", configuration: next.configuration })
        session.updateSettings(applyOverrides(next.settings, overrides))
        ink.rerender(renderPanel(next.settings.display.colorMode))
        debugLog("watch", `reloaded ${next.keybindsPath}`)
      }

      const lines = readLines(openEventInput(Option.getOrNull(values.events)))
      const sigintHandler = () => lines.close()
      const sighupHandler = () => {
        void reload().catch((error: unknown) => {
          report(`reload failed: ${error instanceof Error ? error.message : String(error)}`)
        })
      }
      process.once("SIGINT", sigintHandler)
      process.on("SIGHUP", sighupHandler)

      try {
        await runEventLoop(session, lines, { reload, report })
      } finally {
        process.off("SIGINT", sigintHandler)
        process.off("SIGHUP", sighupHandler)
        lines.close()
        ink.unmount()
      }
    }),
)
