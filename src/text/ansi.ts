import stringWidth from "string-width"
import stripAnsiCodes from "strip-ansi"

export interface Grapheme {
  readonly text: string
  /** String offset of the grapheme within the source text. */
  readonly offset: number
  readonly width: number
}

export type AnsiPiece =
  | { readonly kind: "escape"; readonly text: string }
  | { readonly kind: "grapheme"; readonly text: string; readonly width: number }

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" })

// CSI (colors, cursor) and OSC (hyperlinks, clipboard) sequences.
const ANSI_TOKEN = /\u001B(?:\[[0-?]*[ -/]*[@-~]|\][^\u0007\u001B]*(?:\u0007|\u001B\\))/y

export const stripAnsi = (value: string): string => stripAnsiCodes(value)

export const visibleWidth = (value: string): number => stringWidth(value)

export const readAnsiToken = (value: string, start: number): string | null => {
  if (value.charCodeAt(start) !== 0x1b) return null
  ANSI_TOKEN.lastIndex = start
  const match = ANSI_TOKEN.exec(value)
  return match ? match[0] : null
}

export const graphemes = (value: string): Grapheme[] => {
  const result: Grapheme[] = []
  for (const { segment, index } of graphemeSegmenter.segment(value)) {
    result.push({ text: segment, offset: index, width: stringWidth(segment) })
  }
  return result
}

/** Splits styled text into escape sequences and visible graphemes, in order. */
export const tokenizeAnsi = (value: string): AnsiPiece[] => {
  const pieces: AnsiPiece[] = []
  let plainStart = 0
  let index = 0
  const flushPlain = (end: number) => {
    if (end <= plainStart) return
    for (const grapheme of graphemes(value.slice(plainStart, end))) {
      pieces.push({ kind: "grapheme", text: grapheme.text, width: grapheme.width })
    }
  }
  while (index < value.length) {
    const token = value.charCodeAt(index) === 0x1b ? readAnsiToken(value, index) : null
    if (token) {
      flushPlain(index)
      pieces.push({ kind: "escape", text: token })
      index += token.length
      plainStart = index
      continue
    }
    index += 1
  }
  flushPlain(value.length)
  return pieces
}

/**
 * Visual column to string offset. A column inside a wide glyph resolves to
 * the glyph's first code unit; columns past the end resolve to the length.
 */
export const columnToOffset = (value: string, column: number): number => {
  if (column <= 0) return 0
  let current = 0
  for (const grapheme of graphemes(value)) {
    if (current + grapheme.width > column) return grapheme.offset
    current += grapheme.width
  }
  return value.length
}

export const offsetToColumn = (value: string, offset: number): number => {
  if (offset <= 0) return 0
  if (offset >= value.length) return visibleWidth(value)
  let current = 0
  for (const grapheme of graphemes(value)) {
    if (grapheme.offset >= offset) return current
    current += grapheme.width
  }
  return current
}

/**
 * Breaks styled text into chunks no wider than `width` columns. Escapes stay
 * attached to the chunk they occur in; a glyph wider than `width` gets a
 * chunk of its own.
 */
export const splitByColumns = (value: string, width: number): string[] => {
  if (width <= 0 || visibleWidth(value) <= width) return [value]
  const chunks: string[] = []
  let current = ""
  let currentWidth = 0
  for (const piece of tokenizeAnsi(value)) {
    if (piece.kind === "escape") {
      current += piece.text
      continue
    }
    if (currentWidth > 0 && currentWidth + piece.width > width) {
      chunks.push(current)
      current = ""
      currentWidth = 0
    }
    current += piece.text
    currentWidth += piece.width
  }
  chunks.push(current)
  return chunks
}

export const padToWidth = (value: string, width: number): string => {
  const gap = width - visibleWidth(value)
  return gap > 0 ? value + " ".repeat(gap) : value
}
