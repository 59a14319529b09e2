import { Command } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { loadPanelConfig } from "../config/panelConfig.js"
import { highlightDiff } from "../render/diff.js"
import { createPanelStyles } from "../theme/panelStyles.js"
import { colorModeOption, configOption, fileArg, readInput, themeOption } from "./shared.js"

export const diffCommand = Command.make(
  "diff",
  { file: fileArg, theme: themeOption, colorMode: colorModeOption, config: configOption },
  ({ file, theme, colorMode, config }) =>
    Effect.gen(function* () {
      const diff = yield* readInput(Option.getOrNull(file))
      const resolved = yield* loadPanelConfig({
        cliConfigPath: Option.getOrNull(config),
        cliTheme: Option.getOrNull(theme),
        cliColorMode: Option.getOrNull(colorMode),
      })
      const styles = createPanelStyles({
        theme: resolved.theme,
        colorMode: resolved.display.colorMode,
        asciiOnly: resolved.display.asciiOnly,
      })
      const output = highlightDiff(diff, styles)
      if (output) yield* Console.log(output)
    }),
)
