import { tokenizeAnsi } from "../text/ansi.js"

interface WrapWord {
  readonly text: string
  readonly width: number
  /** Whitespace that preceded the word on the source line. */
  readonly gap: string
  readonly gapWidth: number
}

const isBreakingSpace = (grapheme: string): boolean => grapheme === " " || grapheme === "\t"

const splitWords = (line: string): { words: WrapWord[]; trailing: string } => {
  const words: WrapWord[] = []
  let gap = ""
  let gapWidth = 0
  let word = ""
  let wordWidth = 0
  let inWord = false
  let pendingEscapes = ""

  for (const piece of tokenizeAnsi(line)) {
    if (piece.kind === "escape") {
      if (inWord) word += piece.text
      else pendingEscapes += piece.text
      continue
    }
    if (isBreakingSpace(piece.text)) {
      if (inWord) {
        words.push({ text: word, width: wordWidth, gap, gapWidth })
        word = ""
        wordWidth = 0
        gap = ""
        gapWidth = 0
        inWord = false
      }
      gap += piece.text
      gapWidth += piece.text === "\t" ? 1 : piece.width
      continue
    }
    if (!inWord) {
      inWord = true
      word = pendingEscapes
      pendingEscapes = ""
    }
    word += piece.text
    wordWidth += piece.width
  }
  if (inWord) {
    words.push({ text: word, width: wordWidth, gap, gapWidth })
  }
  return { words, trailing: pendingEscapes }
}

const wrapLine = (line: string, width: number): string[] => {
  const { words, trailing } = splitWords(line)
  if (words.length === 0) return [trailing]

  const lines: string[] = []
  let current = ""
  let currentWidth = 0
  for (const word of words) {
    if (current.length === 0 && lines.length === 0) {
      // Indentation survives only when the first word still fits after it.
      const keepIndent = word.gapWidth + word.width <= width
      current = keepIndent ? word.gap + word.text : word.text
      currentWidth = keepIndent ? word.gapWidth + word.width : word.width
      continue
    }
    if (currentWidth + word.gapWidth + word.width <= width) {
      current += word.gap + word.text
      currentWidth += word.gapWidth + word.width
      continue
    }
    lines.push(current)
    current = word.text
    currentWidth = word.width
  }
  lines.push(current + trailing)
  return lines
}

/**
 * Word-wraps text at whitespace. Escape sequences take no columns and stay
 * with the word they touch; a word wider than `width` gets a line of its own
 * and is never split. Hard newlines are kept.
 */
export const wrapText = (text: string, width: number): string[] => {
  const sourceLines = text.split("\n")
  if (width <= 0) return sourceLines
  return sourceLines.flatMap((line) => wrapLine(line, width))
}
