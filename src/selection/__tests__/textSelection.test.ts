import { describe, expect, it, vi } from "vitest"
import { ControlledClock } from "../../clock/controlledClock.js"
import { ClipboardWriteError, type ClipboardWriter } from "../../util/clipboard.js"
import { TextSelection } from "../textSelection.js"

const RESET = "\u001b[0m"
const styles = {
  selection: { open: "<", close: ">" },
  selectionFlash: { open: "{", close: "}" },
}

const createFakeClipboard = () => {
  const writes: string[] = []
  const clipboard: ClipboardWriter = {
    writeText: async (text) => {
      writes.push(text)
    },
  }
  return { clipboard, writes }
}

const createSelection = (view: string, options: { clipboard?: ClipboardWriter | null; width?: number; height?: number } = {}) => {
  const clock = new ControlledClock(0)
  const selection = new TextSelection({
    viewport: { view: () => view, width: options.width ?? 40, height: options.height ?? 10 },
    styles,
    clock,
    clipboard: options.clipboard ?? null,
  })
  return { selection, clock }
}

describe("TextSelection state", () => {
  it("starts empty", () => {
    const { selection } = createSelection("Hello")
    expect(selection.state).toMatchObject({ startCol: -1, startLine: -1, endCol: -1, endLine: -1, lastClickTime: null })
    expect(selection.hasTextSelection()).toBe(false)
  })

  it("needs start and end to differ before it counts as a selection", () => {
    const { selection } = createSelection("Hello")
    selection.startSelection(2, 0)
    expect(selection.hasTextSelection()).toBe(false)
    selection.endSelection(5, 0)
    expect(selection.hasTextSelection()).toBe(true)
    selection.endSelection(5, 1)
    expect(selection.hasTextSelection()).toBe(true)
  })

  it("ignores drag updates once the selection stopped", () => {
    const { selection } = createSelection("Hello")
    selection.startSelection(0, 0)
    selection.endSelection(3, 0)
    selection.selectionStop()
    selection.endSelection(9, 4)
    expect(selection.selectionArea()).toEqual({ startCol: 0, startLine: 0, endCol: 3, endLine: 0 })
  })

  it("normalizes backwards selections", () => {
    const { selection } = createSelection("Hello")
    selection.startSelection(5, 2)
    selection.endSelection(1, 0)
    expect(selection.selectionArea()).toEqual({ startCol: 1, startLine: 0, endCol: 5, endLine: 2 })

    selection.startSelection(8, 1)
    selection.endSelection(3, 1)
    expect(selection.selectionArea()).toEqual({ startCol: 3, startLine: 1, endCol: 8, endLine: 1 })
  })

  it("clears coordinates on selectionClear", () => {
    const { selection } = createSelection("Hello")
    selection.startSelection(0, 0)
    selection.endSelection(3, 0)
    selection.selectionClear()
    expect(selection.hasTextSelection()).toBe(false)
    expect(selection.selectionArea()).toEqual({ startCol: -1, startLine: -1, endCol: -1, endLine: -1 })
  })

  it("notifies subscribers on every change", () => {
    const { selection } = createSelection("Hello")
    const listener = vi.fn()
    const unsubscribe = selection.subscribe(listener)
    selection.startSelection(0, 0)
    selection.endSelection(2, 0)
    unsubscribe()
    selection.selectionStop()
    expect(listener).toHaveBeenCalledTimes(2)
  })
})

describe("TextSelection clicks", () => {
  it("cycles single, double and triple clicks", () => {
    const { selection, clock } = createSelection("Hello world\nsecond line")

    expect(selection.handleMouseClick(1, 0)).toBeNull()
    expect(selection.state.clickCount).toBe(1)
    expect(selection.state.active).toBe(true)

    clock.advance(100)
    const word = selection.handleMouseClick(2, 0)
    expect(selection.state.clickCount).toBe(2)
    expect(word?.text).toBe("Hello")
    expect(selection.selectionArea()).toEqual({ startCol: 0, startLine: 0, endCol: 5, endLine: 0 })

    clock.advance(100)
    const paragraph = selection.handleMouseClick(2, 0)
    expect(selection.state.clickCount).toBe(0)
    expect(paragraph?.text).toBe("Hello world\nsecond line")

    clock.advance(100)
    selection.handleMouseClick(2, 0)
    expect(selection.state.clickCount).toBe(1)
  })

  it("starts over when the click moves beyond the tolerance", () => {
    const { selection, clock } = createSelection("Hello world")
    selection.handleMouseClick(1, 0)
    clock.advance(100)
    selection.handleMouseClick(4, 0)
    expect(selection.state.clickCount).toBe(1)
    clock.advance(100)
    selection.handleMouseClick(4, 3)
    expect(selection.state.clickCount).toBe(1)
  })

  it("starts over when the click comes after the multi-click window", () => {
    const { selection, clock } = createSelection("Hello world")
    selection.handleMouseClick(1, 0)
    clock.advance(600)
    selection.handleMouseClick(1, 0)
    expect(selection.state.clickCount).toBe(1)
    expect(selection.state.lastClickTime).toBe(600)
  })

  it("translates panel mouse events past the border", () => {
    const { selection } = createSelection("Hello world")
    expect(selection.handleMouseEvent({ kind: "press", x: 3, y: 1 })).toBeNull()
    selection.handleMouseEvent({ kind: "motion", x: 6, y: 1 })
    expect(selection.selectionArea()).toEqual({ startCol: 2, startLine: 0, endCol: 5, endLine: 0 })

    const action = selection.handleMouseEvent({ kind: "release", x: 6, y: 1 })
    expect(action?.text).toBe("llo")
    expect(selection.state.active).toBe(false)
    expect(selection.handleMouseEvent({ kind: "release", x: 6, y: 1 })).toBeNull()
  })

  it("clamps a drag onto the border to the first row and column", () => {
    const { selection } = createSelection("Hello world\nsecond line")
    selection.handleMouseEvent({ kind: "press", x: 4, y: 2 })
    selection.handleMouseEvent({ kind: "motion", x: 0, y: 0 })
    expect(selection.state).toMatchObject({ startCol: 3, startLine: 1, endCol: 0, endLine: 0 })
    expect(selection.selectionArea()).toEqual({ startCol: 0, startLine: 0, endCol: 3, endLine: 1 })

    const action = selection.handleMouseEvent({ kind: "release", x: 0, y: 0 })
    expect(action?.text).toBe("Hello world\nsec")
  })

  it("never stores negative coordinates", () => {
    const { selection } = createSelection("Hello")
    selection.startSelection(-3, -2)
    expect(selection.state).toMatchObject({ startCol: 0, startLine: 0, endCol: 0, endLine: 0 })
    selection.endSelection(-1, -1)
    expect(selection.state).toMatchObject({ endCol: 0, endLine: 0 })
    expect(selection.hasTextSelection()).toBe(false)
  })

  it("double-clicks a word after wide glyphs", () => {
    const { selection, clock } = createSelection("Hello 世界 world")
    selection.handleMouseClick(11, 0)
    clock.advance(100)
    const action = selection.handleMouseClick(11, 0)
    expect(action?.text).toBe("world")
    expect(selection.selectionArea()).toEqual({ startCol: 11, startLine: 0, endCol: 16, endLine: 0 })
  })
})

describe("TextSelection word and paragraph selection", () => {
  it("selects a single ideograph", () => {
    const { selection } = createSelection("Hello 世界")
    selection.selectWord(7, 0)
    expect(selection.selectionArea()).toEqual({ startCol: 6, startLine: 0, endCol: 8, endLine: 0 })
    expect(selection.getSelectedText()).toBe("世")
  })

  it("selects a word after an emoji", () => {
    const { selection } = createSelection("👋 hello world")
    selection.selectWord(9, 0)
    expect(selection.selectionArea()).toEqual({ startCol: 9, startLine: 0, endCol: 14, endLine: 0 })
    expect(selection.getSelectedText()).toBe("world")
  })

  it("ignores columns past the line and lines outside the view", () => {
    const { selection } = createSelection("abc")
    selection.selectWord(5, 0)
    selection.selectWord(0, 3)
    expect(selection.hasTextSelection()).toBe(false)
  })

  it("ignores negative columns and lines", () => {
    const { selection } = createSelection("abc def")
    selection.selectWord(-1, 0)
    selection.selectWord(0, -1)
    expect(selection.hasTextSelection()).toBe(false)
    expect(selection.state.startCol).toBe(-1)
  })

  it("ignores paragraph requests outside the view", () => {
    const { selection } = createSelection("abc\n\ndef")
    selection.selectParagraph(0, -1)
    selection.selectParagraph(0, 3)
    selection.selectParagraph(-1, 0)
    expect(selection.hasTextSelection()).toBe(false)
  })

  it("reads words from styled lines", () => {
    const { selection } = createSelection("\u001b[1mbold\u001b[22m text")
    selection.selectWord(6, 0)
    expect(selection.getSelectedText()).toBe("text")
  })

  it("expands a paragraph to the surrounding blank lines", () => {
    const { selection } = createSelection("a1\na2\n\nb1\nb2 end")
    selection.selectParagraph(0, 3)
    expect(selection.selectionArea()).toEqual({ startCol: 0, startLine: 3, endCol: 6, endLine: 4 })
    expect(selection.getSelectedText()).toBe("b1\nb2 end")
  })
})

describe("TextSelection text extraction", () => {
  it("extracts across lines", () => {
    const { selection } = createSelection("first line\nsecond line\nthird line")
    selection.startSelection(6, 0)
    selection.endSelection(5, 2)
    expect(selection.getSelectedText()).toBe("line\nsecond line\nthird")
  })

  it("extracts the same text from a backwards drag", () => {
    const { selection } = createSelection("first line\nsecond line\nthird line")
    selection.startSelection(5, 2)
    selection.endSelection(6, 0)
    expect(selection.getSelectedText()).toBe("line\nsecond line\nthird")
  })

  it("extracts an inverted range on one line", () => {
    const { selection } = createSelection("Hello world")
    selection.startSelection(5, 0)
    selection.endSelection(1, 0)
    expect(selection.getSelectedText()).toBe("ello")
  })

  it("clamps negative drag targets before extracting", () => {
    const { selection } = createSelection("Hello world")
    selection.startSelection(4, 0)
    selection.endSelection(-6, -2)
    expect(selection.getSelectedText()).toBe("Hell")
  })

  it("drops a wide glyph whose second cell ends the range", () => {
    const { selection } = createSelection("ab世cd")
    selection.startSelection(0, 0)
    selection.endSelection(3, 0)
    expect(selection.getSelectedText()).toBe("ab")
    expect(selection.selectionView("ab世cd")).toBe(`<ab世${RESET}cd`)
  })

  it("clamps columns to the line and trims the result", () => {
    const { selection } = createSelection("  ab  \nxy")
    selection.startSelection(0, 0)
    selection.endSelection(30, 0)
    expect(selection.getSelectedText()).toBe("ab")
  })

  it("returns nothing without a selection", () => {
    const { selection } = createSelection("abc")
    expect(selection.getSelectedText()).toBe("")
    expect(selection.copySelectedText()).toBeNull()
  })
})

describe("TextSelection copy", () => {
  it("writes to the clipboard and clears after one flash tick", async () => {
    const { clipboard, writes } = createFakeClipboard()
    const { selection, clock } = createSelection("Hello world", { clipboard, width: 20, height: 5 })
    selection.startSelection(0, 0)
    selection.endSelection(5, 0)
    selection.selectionStop()

    expect(selection.selectionView("Hello world")).toBe(`<Hello${RESET} world`)
    const action = selection.copySelectedText()
    expect(action?.text).toBe("Hello")
    expect(selection.isSelectionFlashing()).toBe(true)
    expect(selection.selectionView("Hello world")).toBe(`{Hello${RESET} world`)

    await expect(action?.run()).resolves.toEqual({ ok: true, text: "Hello" })
    expect(writes).toEqual(["Hello"])

    clock.advance(149)
    expect(selection.isSelectionFlashing()).toBe(true)
    clock.advance(1)
    expect(selection.isSelectionFlashing()).toBe(false)
    expect(selection.hasTextSelection()).toBe(false)
    expect(selection.selectionView("Hello world")).toBe("Hello world")
    expect(clock.pendingTimers()).toBe(0)
  })

  it("reports a clipboard failure without throwing", async () => {
    const clipboard: ClipboardWriter = {
      writeText: async () => {
        throw new Error("boom")
      },
    }
    const { selection } = createSelection("Hello world", { clipboard })
    selection.startSelection(0, 0)
    selection.endSelection(5, 0)

    const result = await selection.copySelectedText()?.run()
    expect(result?.ok).toBe(false)
    if (result && !result.ok) {
      expect(result.error).toBeInstanceOf(ClipboardWriteError)
      expect(result.error.message).toBe("Clipboard write failed: boom")
    }
  })

  it("reports a missing clipboard", async () => {
    const { selection } = createSelection("Hello world")
    selection.startSelection(0, 0)
    selection.endSelection(5, 0)
    const result = await selection.copySelectedText()?.run()
    expect(result).toMatchObject({ ok: false, text: "Hello" })
  })

  it("cancels the flash on reset", () => {
    const { selection, clock } = createSelection("Hello world")
    selection.startSelection(0, 0)
    selection.endSelection(5, 0)
    selection.copySelectedText()
    expect(clock.pendingTimers()).toBe(1)
    selection.reset()
    expect(clock.pendingTimers()).toBe(0)
    expect(selection.isSelectionFlashing()).toBe(false)
  })

  it("ends the flash on the first tick", () => {
    const { selection } = createSelection("Hello world")
    selection.startSelection(0, 0)
    selection.endSelection(5, 0)
    selection.copySelectedText()
    expect(selection.handleFlashTick()).toBe(true)
    expect(selection.state.flashFrame).toBe(-1)
    expect(selection.hasTextSelection()).toBe(false)
    expect(selection.handleFlashTick()).toBe(false)
  })

  it("ignores flash ticks when nothing is flashing", () => {
    const { selection } = createSelection("Hello world")
    expect(selection.handleFlashTick()).toBe(false)
  })
})
