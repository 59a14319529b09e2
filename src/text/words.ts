import { graphemes, type Grapheme } from "./ansi.js"

export type WordSegmentKind = "word" | "space" | "other"

export interface WordSegment {
  readonly kind: WordSegmentKind
  readonly text: string
  readonly startOffset: number
  readonly endOffset: number
  readonly startColumn: number
  readonly endColumn: number
}

type CharClass = "letter" | "katakana" | "ideograph" | "space" | "midLetter" | "midNum" | "other"

const SPACE = /^\s/u
const IDEOGRAPH = /^[\p{Ideographic}\p{Script=Hiragana}]/u
const KATAKANA = /^[\p{Script=Katakana}ー]/u
const LETTER = /^[\p{L}\p{N}\p{Pc}]/u
const MID_LETTER = /^['.:’·]/u
const MID_NUM = /^[,;]$/u
const DIGIT = /^\p{Nd}/u

const classify = (grapheme: string): CharClass => {
  if (SPACE.test(grapheme)) return "space"
  if (IDEOGRAPH.test(grapheme)) return "ideograph"
  if (KATAKANA.test(grapheme)) return "katakana"
  if (LETTER.test(grapheme)) return "letter"
  if (MID_LETTER.test(grapheme)) return "midLetter"
  if (MID_NUM.test(grapheme)) return "midNum"
  return "other"
}

const joins = (previous: CharClass, current: CharClass): boolean => {
  if (previous === "space" && current === "space") return true
  if (previous === "letter" && current === "letter") return true
  if (previous === "katakana" && current === "katakana") return true
  return false
}

/**
 * Splits plain text into word, whitespace and punctuation segments. Letter and
 * digit runs (with inner apostrophes, periods and colons, and commas or
 * semicolons between digits) form one word,
 * katakana runs stay together, and every ideograph or kana stands alone.
 */
export const segmentWords = (value: string): WordSegment[] => {
  const units = graphemes(value)
  const classes = units.map((unit) => classify(unit.text))
  const segments: WordSegment[] = []
  let column = 0
  let index = 0

  while (index < units.length) {
    const first = units[index]
    const firstClass = classes[index]
    if (!first || !firstClass) break
    const members: Grapheme[] = [first]
    let end = index + 1
    while (end < units.length) {
      const currentClass = classes[end]
      const unit = units[end]
      if (!currentClass || !unit) break
      const previousClass = classes[end - 1] ?? "other"
      if (joins(previousClass, currentClass)) {
        members.push(unit)
        end += 1
        continue
      }
      const previous = units[end - 1]
      const next = units[end + 1]
      const joinsLetters =
        currentClass === "midLetter" && previousClass === "letter" && classes[end + 1] === "letter"
      // Commas and semicolons only join digits: "1,000" but not "a,b".
      const joinsDigits =
        currentClass === "midNum" &&
        previous !== undefined &&
        next !== undefined &&
        DIGIT.test(previous.text) &&
        DIGIT.test(next.text)
      if (firstClass === "letter" && next && (joinsLetters || joinsDigits)) {
        members.push(unit, next)
        end += 2
        continue
      }
      break
    }

    const width = members.reduce((sum, unit) => sum + unit.width, 0)
    const last = members[members.length - 1] ?? first
    segments.push({
      kind: firstClass === "space" ? "space" : firstClass === "other" || firstClass === "midLetter" || firstClass === "midNum" ? "other" : "word",
      text: value.slice(first.offset, last.offset + last.text.length),
      startOffset: first.offset,
      endOffset: last.offset + last.text.length,
      startColumn: column,
      endColumn: column + width,
    })
    column += width
    index = end
  }
  return segments
}

/** The segment covering the given visual column, or null past the end. */
export const wordAtColumn = (value: string, column: number): WordSegment | null => {
  if (column < 0) return null
  for (const segment of segmentWords(value)) {
    if (column < segment.endColumn) return segment
  }
  return null
}
