import { Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { loadPanelConfig } from "../config/panelConfig.js"
import { ChatPanel } from "../panel.js"
import { colorModeOption, configOption, fileArg, readInput, strictOption, themeOption } from "./shared.js"

const widthOption = Options.integer("width").pipe(Options.optional)

export const renderCommand = Command.make(
  "render",
  {
    file: fileArg,
    width: widthOption,
    theme: themeOption,
    colorMode: colorModeOption,
    config: configOption,
    configStrict: strictOption,
  },
  ({ file, width, theme, colorMode, config, configStrict }) =>
    Effect.gen(function* () {
      const content = yield* readInput(Option.getOrNull(file))
      const resolved = yield* loadPanelConfig({
        cliConfigPath: Option.getOrNull(config),
        cliTheme: Option.getOrNull(theme),
        cliColorMode: Option.getOrNull(colorMode),
        cliStrict: Option.getOrNull(configStrict),
      })
      const panel = new ChatPanel({ config: resolved })
      const targetWidth = Option.getOrNull(width) ?? process.stdout.columns ?? resolved.layout.defaultWrapWidth

      // First pass asks for any fence languages that are not loaded yet.
      yield* Effect.promise(() => panel.highlighter.load())
      panel.renderMarkdown(content, targetWidth)
      yield* Effect.promise(() => panel.highlighter.settle())

      const lines = panel.renderMarkdown(content, targetWidth)
      panel.dispose()
      yield* Console.log(lines.join("\n"))
    }),
)
