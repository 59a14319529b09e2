import { Command } from "@effect/cli"
import { Console } from "effect"
import { DEFAULT_THEME_ID, listThemeIds, resolveTheme } from "../theme/themeCatalog.js"

export const formatThemeList = (): string[] =>
  listThemeIds().map((id) => {
    const theme = resolveTheme(id)
    const marker = id === DEFAULT_THEME_ID ? "*" : " "
    return `${marker} ${id.padEnd(16)} ${theme.name} (syntax: ${theme.syntaxStyle})`
  })

export const themesCommand = Command.make("themes", {}, () => Console.log(formatThemeList().join("\n")))
