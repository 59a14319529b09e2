import { padToWidth, splitByColumns, visibleWidth } from "../text/ansi.js"
import type { BoxGlyphs, StyleFn } from "../theme/panelStyles.js"
import { wrapText } from "./wrap.js"

export const MIN_COLUMN_WIDTH = 3

export interface TableSpec {
  readonly rows: readonly (readonly string[])[]
  readonly hasHeader: boolean
}

export interface TableLayoutOptions {
  readonly box: BoxGlyphs
  readonly border: StyleFn
  readonly minColumnWidth?: number
  /** Applied to each wrapped line of a header cell. */
  readonly header?: StyleFn
}

const SEPARATOR_PATTERN = /^\|(?:\s*:?-+:?\s*\|)+$/

const countPipes = (value: string): number => {
  let count = 0
  for (const char of value) {
    if (char === "|") count += 1
  }
  return count
}

export const isTableRow = (line: string): boolean => {
  const trimmed = line.trim()
  if (!trimmed.startsWith("|") || !trimmed.endsWith("|")) return false
  return countPipes(trimmed) >= 3
}

export const isTableSeparator = (line: string): boolean => SEPARATOR_PATTERN.test(line.trim())

export const parseTableRow = (line: string): string[] => {
  let trimmed = line.trim()
  if (trimmed.startsWith("|")) trimmed = trimmed.slice(1)
  if (trimmed.endsWith("|")) trimmed = trimmed.slice(0, -1)
  return trimmed.split("|").map((cell) => cell.trim())
}

/**
 * Fits natural column widths into `available` columns. Narrow columns keep
 * their natural width; the wide ones share what remains. Every result is at
 * least `minColumnWidth`.
 */
export const distributeTableColumns = (
  naturalWidths: readonly number[],
  available: number,
  minColumnWidth = MIN_COLUMN_WIDTH,
): number[] => {
  const total = naturalWidths.reduce((sum, width) => sum + width, 0)
  if (total <= available) return [...naturalWidths]
  if (naturalWidths.length === 0) return []

  const average = Math.max(minColumnWidth, Math.floor(available / naturalWidths.length))
  let remaining = available
  let wideCount = 0
  for (const width of naturalWidths) {
    if (width <= average) remaining -= width
    else wideCount += 1
  }
  const share = wideCount > 0 ? Math.max(minColumnWidth, Math.floor(remaining / wideCount)) : minColumnWidth
  return naturalWidths.map((width) => Math.max(minColumnWidth, width <= average ? width : share))
}

export const naturalColumnWidths = (rows: readonly (readonly string[])[], minColumnWidth = MIN_COLUMN_WIDTH): number[] => {
  const columns = rows.reduce((max, row) => Math.max(max, row.length), 0)
  const widths: number[] = Array.from({ length: columns }, () => minColumnWidth)
  for (const row of rows) {
    row.forEach((cell, column) => {
      widths[column] = Math.max(widths[column] ?? minColumnWidth, visibleWidth(cell))
    })
  }
  return widths
}

const wrapCell = (cell: string, width: number): string[] =>
  wrapText(cell, width).flatMap((line) => splitByColumns(line, width))

const borderLine = (widths: readonly number[], left: string, mid: string, right: string, horizontal: string): string =>
  left + widths.map((width) => horizontal.repeat(width + 2)).join(mid) + right

/**
 * Draws already-formatted cells as a bordered table no wider than `width`
 * (unless every column is at its minimum). Cells wrap inside their column.
 */
export const layoutTable = (spec: TableSpec, width: number, options: TableLayoutOptions): string[] => {
  const minColumnWidth = options.minColumnWidth ?? MIN_COLUMN_WIDTH
  const columns = spec.rows.reduce((max, row) => Math.max(max, row.length), 0)
  if (columns === 0) return []

  const rows = spec.rows.map((row) => Array.from({ length: columns }, (_, column) => row[column] ?? ""))
  const natural = naturalColumnWidths(rows, minColumnWidth)
  const overhead = 3 * columns + 1
  const widths = distributeTableColumns(natural, Math.max(0, width - overhead), minColumnWidth)
  const { box, border } = options

  const renderRow = (row: readonly string[], isHeader: boolean): string[] => {
    const header = isHeader ? options.header : undefined
    const cells = row.map((cell, column) => {
      const lines = wrapCell(cell, widths[column] ?? minColumnWidth)
      return header ? lines.map((line) => header(line)) : lines
    })
    const height = cells.reduce((max, cellLines) => Math.max(max, cellLines.length), 1)
    const lines: string[] = []
    for (let index = 0; index < height; index += 1) {
      const parts = cells.map((cellLines, column) => padToWidth(cellLines[index] ?? "", widths[column] ?? minColumnWidth))
      lines.push(`${border(box.vertical)} ${parts.join(` ${border(box.vertical)} `)} ${border(box.vertical)}`)
    }
    return lines
  }

  const output = [border(borderLine(widths, box.topLeft, box.topMid, box.topRight, box.horizontal))]
  rows.forEach((row, index) => {
    output.push(...renderRow(row, index === 0 && spec.hasHeader))
    if (index === 0 && spec.hasHeader && rows.length > 1) {
      output.push(border(borderLine(widths, box.midLeft, box.midMid, box.midRight, box.horizontal)))
    }
  })
  output.push(border(borderLine(widths, box.bottomLeft, box.bottomMid, box.bottomRight, box.horizontal)))
  return output
}
