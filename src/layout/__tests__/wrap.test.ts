import { describe, expect, it } from "vitest"
import { visibleWidth } from "../../text/ansi.js"
import { wrapText } from "../wrap.js"

describe("wrapText", () => {
  it("wraps at whitespace within the width", () => {
    expect(wrapText("the quick brown fox", 10)).toEqual(["the quick", "brown fox"])
  })

  it("keeps hard newlines and empty lines", () => {
    expect(wrapText("a\n\nb", 5)).toEqual(["a", "", "b"])
    expect(wrapText("", 10)).toEqual([""])
  })

  it("gives an over-long word a line of its own without splitting it", () => {
    expect(wrapText("supercalifragilistic is long", 5)).toEqual(["supercalifragilistic", "is", "long"])
  })

  it("keeps leading indentation when the first word fits after it", () => {
    expect(wrapText("    indented text", 12)).toEqual(["    indented", "text"])
    expect(wrapText("      indented", 10)).toEqual(["indented"])
  })

  it("keeps escapes attached to their word without counting them", () => {
    expect(wrapText("\u001b[1mbold\u001b[0m word", 4)).toEqual(["\u001b[1mbold\u001b[0m", "word"])
    expect(wrapText("\u001b[1mbold\u001b[0m word", 9)).toEqual(["\u001b[1mbold\u001b[0m word"])
  })

  it("fits every line in the width unless it is a single word", () => {
    const text = "the quick brown fox jumps over the lazy dog while extraordinarily long words wait"
    for (let width = 1; width <= 30; width += 1) {
      for (const line of wrapText(text, width)) {
        if (visibleWidth(line) > width) expect(line.includes(" ")).toBe(false)
        else expect(visibleWidth(line)).toBeLessThanOrEqual(width)
      }
    }
  })

  it("passes lines through when the width is not positive", () => {
    expect(wrapText("a b c", 0)).toEqual(["a b c"])
  })
})
