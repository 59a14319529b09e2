import { describe, expect, it } from "vitest"
import { ControlledClock } from "../clock/controlledClock.js"
import { DEFAULT_PANEL_CONFIG } from "../config/load.js"
import { ChatPanel, type ChatPanelSettings } from "../panel.js"
import { SyntaxHighlighter } from "../render/highlight.js"
import { stripAnsi } from "../text/ansi.js"
import type { ClipboardWriter } from "../util/clipboard.js"

class PlainHighlighter extends SyntaxHighlighter {
  override highlight(code: string): string {
    return code
  }
}

const RESET = "\u001b[0m"

const config: ChatPanelSettings = {
  ...DEFAULT_PANEL_CONFIG,
  display: { colorMode: "ansi16", asciiOnly: false },
  layout: { defaultWrapWidth: 10, minColumnWidth: 3 },
  selection: { ...DEFAULT_PANEL_CONFIG.selection, flashTickMs: 300 },
}

const createPanel = () => {
  const writes: string[] = []
  const clipboard: ClipboardWriter = {
    writeText: async (text) => {
      writes.push(text)
    },
  }
  const clock = new ControlledClock(0)
  const panel = new ChatPanel({ config, highlighter: new PlainHighlighter(), clipboard, clock })
  return { panel, clock, writes }
}

describe("ChatPanel", () => {
  it("renders markdown inside the panel border", () => {
    const { panel } = createPanel()
    expect(panel.contentWidth()).toBe(78)
    expect(panel.renderMarkdown("**hi**").map(stripAnsi)).toEqual(["hi"])
    expect(panel.renderMarkdown("the quick brown fox", 0)).toEqual(["the quick", "brown fox"])
    panel.dispose()
  })

  it("selects with the mouse, copies on release and flashes for the configured tick", async () => {
    const { panel, clock, writes } = createPanel()
    panel.setVisibleLines(["Hello world", "next"])

    panel.selection.handleMouseEvent({ kind: "press", x: 1, y: 1 })
    panel.selection.handleMouseEvent({ kind: "motion", x: 6, y: 1 })
    expect(panel.visibleView()).toBe(`${panel.styles.selection.open}Hello${RESET} world\nnext`)

    const action = panel.selection.handleMouseEvent({ kind: "release", x: 6, y: 1 })
    expect(action?.text).toBe("Hello")
    expect(panel.visibleView()).toBe(`${panel.styles.selectionFlash.open}Hello${RESET} world\nnext`)
    await action?.run()
    expect(writes).toEqual(["Hello"])

    clock.advance(150)
    expect(panel.selection.isSelectionFlashing()).toBe(true)
    clock.advance(150)
    expect(panel.selection.isSelectionFlashing()).toBe(false)
    expect(panel.visibleView()).toBe("Hello world\nnext")
    panel.dispose()
  })

  it("rebuilds styles when the theme changes", () => {
    const { panel } = createPanel()
    expect(panel.styles.theme.id).toBe("dark-purple")
    panel.view.update((snapshot) => ({ ...snapshot, theme: "nord" }))
    expect(panel.styles.theme.id).toBe("nord")
    expect(panel.renderDiff("+x")).toBe(panel.styles.diffAdded("+x"))
    panel.dispose()
  })
})
