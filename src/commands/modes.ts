import { Command, Options } from "@effect/cli"
import { loadOptions, reportWarnings, runCommand, toLoadOptions } from "./options.js"
import { formatModeSummary, loadContext, summarizeModes } from "./showLogic.js"

const outputOption = Options.choice("output", ["text", "json"] as const).pipe(Options.withDefault("text"))

export const modesCommand = Command.make("modes", { ...loadOptions, output: outputOption }, (values) =>
  runCommand(async () => {
    const context = await loadContext(toLoadOptions(values))
    reportWarnings(context.warnings)
    const summary = summarizeModes(context.configuration)
    if (values.output === "json") {
      console.log(JSON.stringify(summary, null, 2))
      return
    }
    for (const line of formatModeSummary(summary)) {
      console.log(line)
    }
  }),
)
