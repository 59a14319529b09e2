#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { configCommand } from "./commands/config.js"
import { diffCommand } from "./commands/diff.js"
import { renderCommand } from "./commands/render.js"
import { themesCommand } from "./commands/themes.js"

const root = Command.make("chatpane", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([renderCommand, diffCommand, themesCommand, configCommand]),
)

const cli = Command.run(root, { name: "chatpane", version: "0.1.0" })

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
