import themeData from "./themes.json" with { type: "json" }

export interface ThemePalette {
  readonly name: string
  readonly primary: string
  readonly secondary: string
  readonly bg: string
  /** Falls back to `primary` when absent. */
  readonly bgSelected?: string
  readonly text: string
  readonly textMuted: string
  readonly textInverse: string
  readonly user: string
  readonly assistant: string
  readonly warning: string
  readonly error: string
  readonly info: string
  readonly border: string
  /** Falls back to `primary` when absent. */
  readonly borderFocus?: string
  readonly diffAdded: string
  readonly diffRemoved: string
  readonly diffHeader: string
  readonly diffHunk: string
  readonly markdownH1: string
  readonly markdownH2: string
  readonly markdownH3: string
  readonly markdownCode: string
  readonly markdownCodeBg: string
  readonly markdownLink: string
  readonly markdownListItem: string
  /** Shiki theme used for fenced code blocks. */
  readonly syntaxStyle: string
}

export interface ResolvedTheme extends ThemePalette {
  readonly id: string
  readonly bgSelected: string
  readonly borderFocus: string
}

interface ThemeCatalogFile {
  readonly defaultTheme: string
  readonly themes: Readonly<Record<string, ThemePalette>>
}

const catalog: ThemeCatalogFile = themeData

export const DEFAULT_THEME_ID = catalog.defaultTheme

export const listThemeIds = (): string[] => Object.keys(catalog.themes)

export const isBuiltinTheme = (value: string): boolean => Object.hasOwn(catalog.themes, value)

export const normalizeThemeId = (value: string | null | undefined): string =>
  (value ?? "").trim().toLowerCase().replace(/[\s_]+/g, "-")

export const resolveTheme = (name?: string | null): ResolvedTheme => {
  const requested = normalizeThemeId(name)
  const id = requested && isBuiltinTheme(requested) ? requested : DEFAULT_THEME_ID
  const palette = catalog.themes[id] ?? catalog.themes[DEFAULT_THEME_ID]
  if (!palette) {
    throw new Error(`Theme catalog is missing the default theme "${DEFAULT_THEME_ID}".`)
  }
  return {
    ...palette,
    id,
    bgSelected: palette.bgSelected ?? palette.primary,
    borderFocus: palette.borderFocus ?? palette.primary,
  }
}
