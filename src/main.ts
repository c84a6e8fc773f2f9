#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { configCommand } from "./commands/config.js"
import { modesCommand } from "./commands/modes.js"
import { resolveCommand } from "./commands/resolve.js"
import { showCommand } from "./commands/show.js"
import { watchCommand } from "./commands/watch.js"

const root = Command.make("modekeys", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([showCommand, resolveCommand, modesCommand, configCommand, watchCommand]),
)

const cli = Command.run(root, { name: "modekeys", version: "0.1.0" })

const argv = process.argv.length <= 2 ? [...process.argv.slice(0, 2), "show"] : process.argv

cli(argv).pipe(Effect.provide(NodeContext.layer), (effect) => NodeRuntime.runMain(effect, { disableErrorReporting: true }))
