import { tokenizeAnsi } from "../text/ansi.js"
import type { SgrSpan } from "../theme/panelStyles.js"

export interface SelectionArea {
  readonly startCol: number
  readonly startLine: number
  readonly endCol: number
  readonly endLine: number
}

export interface ViewportSize {
  readonly width: number
  readonly height: number
}

const SGR_RESET = "\u001b[0m"
const SGR_PATTERN = /^\u001b\[[0-9;:]*m$/

const isReset = (code: string): boolean => code === SGR_RESET || code === "\u001b[m"

/**
 * Re-styles columns [xStart, xEnd) of one styled line. SGR codes met inside
 * the span are held back and replayed after it, so styling outside the span
 * comes out as it was. Lines shorter than the span are padded with
 * highlighted spaces.
 */
export const highlightColumns = (line: string, xStart: number, xEnd: number, highlight: SgrSpan): string => {
  const start = Math.max(0, xStart)
  if (xEnd <= start || !highlight.open) return line

  let out = ""
  let activeCodes = ""
  let column = 0
  let inSpan = false
  const closeSpan = () => {
    out += SGR_RESET + activeCodes
    inSpan = false
  }

  for (const piece of tokenizeAnsi(line)) {
    if (piece.kind === "escape") {
      const isSgr = SGR_PATTERN.test(piece.text)
      if (isSgr) activeCodes = isReset(piece.text) ? "" : activeCodes + piece.text
      if (!inSpan || !isSgr) out += piece.text
      continue
    }
    const selected = piece.width > 0 ? column >= start && column < xEnd : inSpan
    if (selected && !inSpan) {
      out += highlight.open
      inSpan = true
    } else if (!selected && inSpan) {
      closeSpan()
    }
    out += piece.text
    column += piece.width
  }

  if (column < xEnd) {
    if (column < start) {
      out += " ".repeat(start - column)
      column = start
    }
    if (!inSpan) {
      out += highlight.open
      inSpan = true
    }
    out += " ".repeat(xEnd - column)
  }
  if (inSpan) closeSpan()
  return out
}

/** Applies the selection overlay to every visible line the area touches. */
export const overlaySelection = (view: string, area: SelectionArea, size: ViewportSize, highlight: SgrSpan): string => {
  if (size.width <= 0 || size.height <= 0) return view
  const lines = view.split("\n")
  const lastLine = Math.min(area.endLine, size.height - 1, lines.length - 1)
  for (let y = Math.max(0, area.startLine); y <= lastLine; y += 1) {
    const line = lines[y]
    if (line === undefined) continue
    const isFirst = y === area.startLine
    const isLast = y === area.endLine
    const xStart = isFirst ? area.startCol : 0
    const xEnd = Math.min(isLast ? area.endCol : size.width, size.width)
    lines[y] = highlightColumns(line, xStart, xEnd, highlight)
  }
  return lines.join("\n")
}
