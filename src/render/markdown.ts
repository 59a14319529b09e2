import { isTableRow, isTableSeparator, layoutTable, MIN_COLUMN_WIDTH, parseTableRow } from "../layout/table.js"
import { wrapText } from "../layout/wrap.js"
import type { PanelStyles } from "../theme/panelStyles.js"
import { debugLog, describeError } from "../util/debugLog.js"
import type { SyntaxHighlighter } from "./highlight.js"
import { renderInline } from "./inline.js"

export const DEFAULT_WRAP_WIDTH = 80
export const BLOCKQUOTE_PREFIX_WIDTH = 2
export const LIST_PREFIX_WIDTH = 4
const RULE_WIDTH = 32
const FENCE = "```"
const DEFAULT_CACHE_SIZE = 64

/** Rendered terminal lines; each may carry SGR escapes. */
export type StyledDocument = readonly string[]

export interface MarkdownRenderContext {
  readonly styles: PanelStyles
  readonly highlighter: SyntaxHighlighter
  /** Overrides the theme's syntax style. */
  readonly syntaxStyle?: string | null
  readonly defaultWrapWidth?: number
  readonly minColumnWidth?: number
  readonly cacheSize?: number
}

interface CodeBlockSpan {
  readonly language: string
  readonly lines: string[]
}

const UNORDERED_ITEM = /^[-*] (.*)$/
const ORDERED_ITEM = /^(\d{1,2})\. (.*)$/
const HEADERS: ReadonlyArray<readonly [string, keyof Pick<PanelStyles, "h1" | "h2" | "h3" | "h4">]> = [
  ["#### ", "h4"],
  ["### ", "h3"],
  ["## ", "h2"],
  ["# ", "h1"],
]

/**
 * Renders the markdown subset used in assistant messages into width-bounded
 * terminal lines. Output is memoized per content and width; the memo is
 * dropped whenever the highlighter finishes loading something new.
 */
export class MarkdownRenderer {
  private readonly cache = new Map<string, StyledDocument>()
  private readonly unsubscribe: () => void

  constructor(private readonly context: MarkdownRenderContext) {
    this.unsubscribe = context.highlighter.subscribe(() => this.cache.clear())
  }

  get styles(): PanelStyles {
    return this.context.styles
  }

  dispose(): void {
    this.unsubscribe()
    this.cache.clear()
  }

  clearCache(): void {
    this.cache.clear()
  }

  render(content: string, width: number): StyledDocument {
    const effectiveWidth = width > 0 ? width : (this.context.defaultWrapWidth ?? DEFAULT_WRAP_WIDTH)
    const key = `${effectiveWidth}\u0000${content}`
    const cached = this.cache.get(key)
    if (cached) {
      this.cache.delete(key)
      this.cache.set(key, cached)
      return cached
    }
    const document = this.renderDocument(content, effectiveWidth)
    this.cache.set(key, document)
    const limit = this.context.cacheSize ?? DEFAULT_CACHE_SIZE
    while (this.cache.size > limit) {
      const oldest = this.cache.keys().next()
      if (oldest.done) break
      this.cache.delete(oldest.value)
    }
    return document
  }

  /** Renders one non-table, non-fence line. */
  renderLine(line: string, width: number): string[] {
    const { styles } = this.context
    const trimmed = line.trim()

    for (const [marker, level] of HEADERS) {
      if (trimmed.startsWith(marker)) return [styles[level](trimmed.slice(marker.length))]
    }

    if (trimmed === "---" || trimmed === "***" || trimmed === "___") {
      return [styles.rule(styles.glyphs.rule.repeat(Math.min(RULE_WIDTH, width)))]
    }

    if (trimmed === ">" || trimmed.startsWith("> ")) {
      const inner = trimmed.slice(2)
      const bar = `${styles.quoteBar(styles.glyphs.quoteBar)} `
      return this.renderLine(inner, Math.max(1, width - BLOCKQUOTE_PREFIX_WIDTH)).map(
        (quoted) => bar + styles.blockquote(quoted),
      )
    }

    const unordered = UNORDERED_ITEM.exec(trimmed)
    if (unordered) {
      const prefix = `  ${styles.listBullet(styles.glyphs.bullet)} `
      return this.renderListItem(prefix, LIST_PREFIX_WIDTH, unordered[1] ?? "", width)
    }

    const ordered = ORDERED_ITEM.exec(trimmed)
    if (ordered && Number(ordered[1]) >= 1) {
      const prefix = `  ${ordered[1]}. `
      return this.renderListItem(prefix, prefix.length, ordered[2] ?? "", width)
    }

    return wrapText(renderInline(line, styles), width)
  }

  private renderListItem(prefix: string, prefixWidth: number, content: string, width: number): string[] {
    const indent = " ".repeat(prefixWidth)
    return wrapText(renderInline(content, this.context.styles), Math.max(1, width - prefixWidth)).map((wrapped, index) =>
      index === 0 ? prefix + wrapped : indent + wrapped,
    )
  }

  private renderLineSafely(line: string, width: number): string[] {
    try {
      return this.renderLine(line, width)
    } catch (error) {
      debugLog("markdown", { lineRenderError: describeError(error) })
      return wrapText(line, width)
    }
  }

  private renderTable(rows: readonly string[][], hasHeader: boolean, width: number): string[] {
    const { styles } = this.context
    const formatted = rows.map((row) => row.map((cell) => renderInline(cell, styles)))
    return layoutTable({ rows: formatted, hasHeader }, width, {
      box: styles.glyphs.box,
      border: styles.tableBorder,
      header: styles.tableHeader,
      minColumnWidth: this.context.minColumnWidth ?? MIN_COLUMN_WIDTH,
    })
  }

  private highlightBlock(span: CodeBlockSpan): string[] {
    const { styles, highlighter, syntaxStyle } = this.context
    return highlighter
      .highlight(span.lines.join("\n"), span.language, {
        style: syntaxStyle ?? styles.theme.syntaxStyle,
        paint: styles.codeToken,
      })
      .split("\n")
  }

  private renderDocument(content: string, width: number): StyledDocument {
    const output: string[] = []
    let blankPending = false
    let code: CodeBlockSpan | null = null
    let tableRows: string[][] = []
    let tableHasHeader = false

    const push = (lines: readonly string[]) => {
      if (lines.length === 0) return
      if (blankPending && lines[0] !== "") output.push("")
      blankPending = false
      output.push(...lines)
    }

    const flushTable = () => {
      if (tableRows.length > 0) push(this.renderTable(tableRows, tableHasHeader, width))
      tableRows = []
      tableHasHeader = false
    }

    const emitCode = (span: CodeBlockSpan) => {
      const last = output[output.length - 1]
      if (last !== undefined && last !== "") output.push("")
      blankPending = false
      output.push(...this.highlightBlock(span))
      blankPending = true
    }

    for (const rawLine of content.split("\n")) {
      const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine
      const trimmed = line.trim()

      if (trimmed.startsWith(FENCE)) {
        if (code) {
          emitCode(code)
          code = null
        } else {
          flushTable()
          code = { language: trimmed.slice(FENCE.length).trim(), lines: [] }
        }
        continue
      }
      if (code) {
        code.lines.push(line)
        continue
      }

      if (isTableRow(trimmed)) {
        if (!isTableSeparator(trimmed)) {
          tableRows.push(parseTableRow(trimmed))
          continue
        }
        const headerRow = tableRows[tableRows.length - 1]
        if (headerRow && tableRows.length === 1) {
          tableHasHeader = true
          continue
        }
        if (headerRow) {
          // A separator further down starts a new table headed by the row above it.
          tableRows.pop()
          flushTable()
          tableRows = [headerRow]
          tableHasHeader = true
          continue
        }
      }

      flushTable()
      push(this.renderLineSafely(line, width))
    }

    flushTable()
    if (code) emitCode(code)

    while (output.length > 0 && output[output.length - 1] === "") output.pop()
    return output
  }
}
