import type { PanelStyles } from "../theme/panelStyles.js"

/** Tool-use markers the orchestrator places in message text. */
export const TOOL_USE_IN_PROGRESS = "○"
export const TOOL_USE_COMPLETE = "●"

export type InlineStyles = Pick<PanelStyles, "bold" | "italic" | "inlineCode" | "link" | "toolInProgress" | "toolComplete">

const CODE_PATTERN = /`([^`]+)`/g
const BOLD_PATTERN = /\*\*([^*]+)\*\*/g
const ITALIC_PATTERN = /(^|[^a-zA-Z0-9_])_([^_]+)_(?=[^a-zA-Z0-9_]|$)/g
// Brackets that open an escape sequence never start a link.
const LINK_PATTERN = /(?<!\u001B)\[([^\]]+)\]\(([^)\u001B]+)\)/g
const PLACEHOLDER_PATTERN = /\u0000CODE(\d+)\u0000/g

const placeholder = (index: number): string => `\u0000CODE${index}\u0000`

/**
 * Applies inline markdown: code spans, bold, italic, links and tool-use
 * markers. Code span contents are set aside first so no other pass touches
 * them; unmatched delimiters stay literal.
 */
export const renderInline = (text: string, styles: InlineStyles): string => {
  const codeSpans: string[] = []
  let line = text.replaceAll("\u0000", "")

  line = line.replace(CODE_PATTERN, (_match, code: string) => {
    codeSpans.push(code)
    return placeholder(codeSpans.length - 1)
  })
  line = line.replaceAll(TOOL_USE_IN_PROGRESS, styles.toolInProgress(TOOL_USE_IN_PROGRESS))
  line = line.replaceAll(TOOL_USE_COMPLETE, styles.toolComplete(TOOL_USE_COMPLETE))
  line = line.replace(BOLD_PATTERN, (_match, inner: string) => styles.bold(inner))
  line = line.replace(ITALIC_PATTERN, (_match, lead: string, inner: string) => lead + styles.italic(inner))
  line = line.replace(LINK_PATTERN, (_match, label: string, url: string) => `${styles.link(label)} (${styles.link(url)})`)
  return line.replace(PLACEHOLDER_PATTERN, (match, index: string) => {
    const code = codeSpans[Number(index)]
    return code === undefined ? match : styles.inlineCode(code)
  })
}
