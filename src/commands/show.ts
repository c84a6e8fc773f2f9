import { Command, Options } from "@effect/cli"
import { Option } from "effect"
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
import { runShow } from "./showLogic.js"

const outputOption = Options.choice("output", ["text", "json"] as const).pipe(Options.withDefault("text"))

export const showCommand = Command.make(
  "show",
  {
    ...loadOptions,
    mode: modeOption,
    width: widthOption,
    height: heightOption,
    layout: layoutOption,
    sort: sortOption,
    plain: plainOption,
    output: outputOption,
  },
  (values) =>
    runCommand(async () => {
      const result = await runShow({
        ...toLoadOptions(values),
        mode: Option.getOrNull(values.mode),
        width: Option.getOrNull(values.width),
        height: Option.getOrNull(values.height),
        layout: Option.getOrNull(values.layout),
        sort: Option.getOrNull(values.sort),
        plain: values.plain,
      })
      reportWarnings(result.warnings)

      if (values.output === "json") {
        console.log(
          JSON.stringify(
            { mode: result.mode, modeKnown: result.modeKnown, viewport: result.viewport, lines: result.lines },
            null,
            2,
          ),
        )
        return
      }
      for (const line of result.painted) {
        console.log(line)
      }
    }),
)
