import { Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { stringify } from "yaml"
import { loadPanelConfig } from "../config/panelConfig.js"
import type { ResolvedPanelConfig } from "../config/types.js"
import { colorModeOption, configOption, strictOption, themeOption } from "./shared.js"

const workspaceOption = Options.text("workspace").pipe(Options.optional)
const outputOption = Options.choice("output", ["json", "yaml", "summary"] as const).pipe(Options.withDefault("json"))

export const formatConfigSummary = (resolved: ResolvedPanelConfig): string[] => {
  const lines = [
    "Effective panel config",
    `theme: ${resolved.theme}`,
    `syntaxStyle: ${resolved.syntaxStyle ?? "(theme default)"}`,
    `display.colorMode: ${resolved.display.colorMode}`,
    `display.asciiOnly: ${resolved.display.asciiOnly}`,
    `layout.defaultWrapWidth: ${resolved.layout.defaultWrapWidth}`,
    `layout.minColumnWidth: ${resolved.layout.minColumnWidth}`,
    `selection.clickTolerance: ${resolved.selection.clickTolerance}`,
    `selection.multiClickWindowMs: ${resolved.selection.multiClickWindowMs}`,
    `selection.flashTickMs: ${resolved.selection.flashTickMs}`,
    `meta.strict: ${resolved.meta.strict}`,
    `meta.sources: ${resolved.meta.sources.join(" -> ")}`,
  ]
  if (resolved.meta.warnings.length > 0) {
    lines.push("meta.warnings:", ...resolved.meta.warnings.map((warning) => `- ${warning}`))
  }
  return lines
}

export const configCommand = Command.make(
  "config",
  {
    workspace: workspaceOption,
    config: configOption,
    theme: themeOption,
    colorMode: colorModeOption,
    configStrict: strictOption,
    output: outputOption,
  },
  ({ workspace, config, theme, colorMode, configStrict, output }) =>
    Effect.gen(function* () {
      const resolved = yield* loadPanelConfig({
        workspace: Option.getOrNull(workspace),
        cliConfigPath: Option.getOrNull(config),
        cliTheme: Option.getOrNull(theme),
        cliColorMode: Option.getOrNull(colorMode),
        cliStrict: Option.getOrNull(configStrict),
      })
      switch (output) {
        case "yaml":
          yield* Console.log(stringify(resolved))
          return
        case "summary":
          yield* Console.log(formatConfigSummary(resolved).join("\n"))
          return
        case "json":
          yield* Console.log(JSON.stringify(resolved, null, 2))
      }
    }),
)
