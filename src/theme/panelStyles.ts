import { Chalk, type ChalkInstance } from "chalk"
import { chalkLevelFor, resolveAsciiOnly, resolveColorMode, type ColorMode } from "./colorMode.js"
import { resolveTheme, type ResolvedTheme } from "./themeCatalog.js"

export type StyleFn = (text: string) => string

/** Opening and closing SGR sequences of a style, for overlays that splice codes into styled text. */
export interface SgrSpan {
  readonly open: string
  readonly close: string
}

export interface BoxGlyphs {
  readonly horizontal: string
  readonly vertical: string
  readonly topLeft: string
  readonly topMid: string
  readonly topRight: string
  readonly midLeft: string
  readonly midMid: string
  readonly midRight: string
  readonly bottomLeft: string
  readonly bottomMid: string
  readonly bottomRight: string
}

export interface PanelGlyphs {
  readonly bullet: string
  readonly rule: string
  readonly quoteBar: string
  readonly box: BoxGlyphs
}

export interface PanelStyles {
  readonly theme: ResolvedTheme
  readonly colorMode: ColorMode
  readonly asciiOnly: boolean
  readonly glyphs: PanelGlyphs
  readonly h1: StyleFn
  readonly h2: StyleFn
  readonly h3: StyleFn
  readonly h4: StyleFn
  readonly bold: StyleFn
  readonly italic: StyleFn
  readonly inlineCode: StyleFn
  readonly link: StyleFn
  readonly listBullet: StyleFn
  readonly blockquote: StyleFn
  readonly quoteBar: StyleFn
  readonly rule: StyleFn
  readonly tableBorder: StyleFn
  readonly tableHeader: StyleFn
  readonly toolInProgress: StyleFn
  readonly toolComplete: StyleFn
  readonly diffAdded: StyleFn
  readonly diffRemoved: StyleFn
  readonly diffHeader: StyleFn
  readonly diffHunk: StyleFn
  readonly selection: SgrSpan
  readonly selectionFlash: SgrSpan
  /** Styles one syntax token from its hex color and shiki font-style bits. */
  readonly codeToken: (text: string, color: string | null, fontStyle: number) => string
}

export interface PanelStylesOptions {
  readonly theme?: string | null
  readonly colorMode?: ColorMode | null
  readonly asciiOnly?: boolean | null
}

export const UNICODE_GLYPHS: PanelGlyphs = {
  bullet: "•",
  rule: "─",
  quoteBar: "▎",
  box: {
    horizontal: "─",
    vertical: "│",
    topLeft: "┌",
    topMid: "┬",
    topRight: "┐",
    midLeft: "├",
    midMid: "┼",
    midRight: "┤",
    bottomLeft: "└",
    bottomMid: "┴",
    bottomRight: "┘",
  },
}

export const ASCII_GLYPHS: PanelGlyphs = {
  bullet: "*",
  rule: "-",
  quoteBar: "|",
  box: {
    horizontal: "-",
    vertical: "|",
    topLeft: "+",
    topMid: "+",
    topRight: "+",
    midLeft: "+",
    midMid: "+",
    midRight: "+",
    bottomLeft: "+",
    bottomMid: "+",
    bottomRight: "+",
  },
}

const SPLIT_MARKER = "\u0000"
// Without color the selection still has to show, so it falls back to inverse video.
const INVERSE_SPAN: SgrSpan = { open: "\u001b[7m", close: "\u001b[27m" }
const INVERSE_BOLD_SPAN: SgrSpan = { open: "\u001b[1m\u001b[7m", close: "\u001b[27m\u001b[22m" }

const toSgrSpan = (style: ChalkInstance): SgrSpan => {
  const [open = "", close = ""] = style(SPLIT_MARKER).split(SPLIT_MARKER)
  return { open, close }
}

const styleFn =
  (style: ChalkInstance): StyleFn =>
  (text) =>
    text.length > 0 ? style(text) : text

export const createPanelStyles = (options: PanelStylesOptions = {}): PanelStyles => {
  const theme = resolveTheme(options.theme)
  const colorMode = resolveColorMode(options.colorMode)
  const asciiOnly = resolveAsciiOnly(options.asciiOnly)
  const chalk = new Chalk({ level: chalkLevelFor(colorMode) })
  const muted = chalk.hex(theme.textMuted)

  return {
    theme,
    colorMode,
    asciiOnly,
    glyphs: asciiOnly ? ASCII_GLYPHS : UNICODE_GLYPHS,
    h1: styleFn(chalk.bold.hex(theme.markdownH1)),
    h2: styleFn(chalk.bold.hex(theme.markdownH2)),
    h3: styleFn(chalk.bold.hex(theme.markdownH3)),
    h4: styleFn(muted.bold),
    bold: styleFn(chalk.bold.hex(theme.text)),
    italic: styleFn(chalk.italic.hex(theme.text)),
    inlineCode: styleFn(chalk.hex(theme.markdownCode).bgHex(theme.markdownCodeBg)),
    link: styleFn(chalk.underline.hex(theme.markdownLink)),
    listBullet: styleFn(chalk.hex(theme.markdownListItem)),
    blockquote: styleFn(muted.italic),
    quoteBar: styleFn(muted),
    rule: styleFn(chalk.hex(theme.border)),
    tableBorder: styleFn(chalk.hex(theme.border)),
    tableHeader: styleFn(chalk.bold),
    toolInProgress: styleFn(chalk.hex(theme.text)),
    toolComplete: styleFn(chalk.hex(theme.secondary)),
    diffAdded: styleFn(chalk.hex(theme.diffAdded)),
    diffRemoved: styleFn(chalk.hex(theme.diffRemoved)),
    diffHeader: styleFn(chalk.bold.hex(theme.diffHeader)),
    diffHunk: styleFn(chalk.hex(theme.diffHunk)),
    selection: chalk.level > 0 ? toSgrSpan(chalk.hex(theme.textInverse).bgHex(theme.bgSelected)) : INVERSE_SPAN,
    selectionFlash: chalk.level > 0 ? toSgrSpan(chalk.hex(theme.textInverse).bgHex(theme.diffAdded)) : INVERSE_BOLD_SPAN,
    codeToken: (text, color, fontStyle) => {
      let styler = color ? chalk.hex(color) : chalk
      if (fontStyle & 1) styler = styler.italic
      if (fontStyle & 2) styler = styler.bold
      if (fontStyle & 4) styler = styler.underline
      return styler(text)
    },
  }
}
