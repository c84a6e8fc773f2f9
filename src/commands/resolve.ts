import { Command, Options } from "@effect/cli"
import { Option } from "effect"
import { loadOptions, modeOption, reportWarnings, runCommand, toLoadOptions } from "./options.js"
import { activeSetToJson, formatActiveSetText, runResolve } from "./showLogic.js"

const outputOption = Options.choice("output", ["text", "json"] as const).pipe(Options.withDefault("text"))

export const resolveCommand = Command.make(
  "resolve",
  { ...loadOptions, mode: modeOption, output: outputOption },
  (values) =>
    runCommand(async () => {
      const result = await runResolve({ ...toLoadOptions(values), mode: Option.getOrNull(values.mode) })
      reportWarnings(result.warnings)
      if (!result.modeKnown) {
        console.error(`Mode "${result.mode}" is not configured; showing global bindings only.`)
      }
      if (values.output === "json") {
        console.log(JSON.stringify({ mode: result.mode, bindings: activeSetToJson(result.activeSet) }, null, 2))
        return
      }
      for (const line of formatActiveSetText(result.activeSet)) {
        console.log(line)
      }
    }),
)
