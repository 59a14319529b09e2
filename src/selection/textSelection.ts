import type { UIClock, UIClockTimeoutHandle } from "../clock/UIClock.js"
import { DEFAULT_SYSTEM_CLOCK } from "../clock/systemClock.js"
import { columnToOffset, stripAnsi, visibleWidth } from "../text/ansi.js"
import { wordAtColumn } from "../text/words.js"
import type { PanelStyles } from "../theme/panelStyles.js"
import { ClipboardWriteError, type ClipboardWriter } from "../util/clipboard.js"
import { debugLog, describeError } from "../util/debugLog.js"
import { overlaySelection, type SelectionArea } from "./selectionView.js"

export const MULTI_CLICK_WINDOW_MS = 500
export const CLICK_TOLERANCE = 2
export const FLASH_TICK_MS = 150
/** Mouse events arrive relative to the panel, whose border takes one cell. */
export const PANEL_BORDER_WIDTH = 1

export interface SelectionState extends SelectionArea {
  readonly active: boolean
  readonly lastClickTime: number | null
  readonly lastClickX: number
  readonly lastClickY: number
  readonly clickCount: number
  /** -1 inactive, 0 flash visible. */
  readonly flashFrame: number
}

export interface SelectionViewport {
  /** The rendered lines currently on screen, joined with newlines. */
  view(): string
  readonly width: number
  readonly height: number
}

export interface SelectionConfig {
  readonly clickTolerance: number
  readonly multiClickWindowMs: number
  readonly flashTickMs: number
  readonly borderWidth: number
}

export type CopyResult =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly text: string; readonly error: ClipboardWriteError }

/** A pending clipboard write, handed to the caller to run on its event loop. */
export interface CopyAction {
  readonly text: string
  run(): Promise<CopyResult>
}

export type PanelMouseEventKind = "press" | "motion" | "release"

export interface PanelMouseEvent {
  readonly kind: PanelMouseEventKind
  readonly x: number
  readonly y: number
}

export interface TextSelectionOptions {
  readonly viewport: SelectionViewport
  readonly styles: Pick<PanelStyles, "selection" | "selectionFlash">
  readonly clipboard?: ClipboardWriter | null
  readonly clock?: UIClock
  readonly config?: Partial<SelectionConfig>
}

const DEFAULT_SELECTION_CONFIG: SelectionConfig = {
  clickTolerance: CLICK_TOLERANCE,
  multiClickWindowMs: MULTI_CLICK_WINDOW_MS,
  flashTickMs: FLASH_TICK_MS,
  borderWidth: PANEL_BORDER_WIDTH,
}

const CLEARED: SelectionState = {
  startCol: -1,
  startLine: -1,
  endCol: -1,
  endLine: -1,
  active: false,
  lastClickTime: null,
  lastClickX: 0,
  lastClickY: 0,
  clickCount: 0,
  flashFrame: -1,
}

const splitLines = (view: string): string[] => view.split("\n")

/**
 * Mouse selection over the rendered chat viewport. Coordinates are visual
 * cells relative to the viewport's top-left corner.
 */
export class TextSelection {
  private current: SelectionState = CLEARED
  private flashTimer: UIClockTimeoutHandle | null = null
  private readonly listeners = new Set<(state: SelectionState) => void>()
  private readonly clock: UIClock
  private readonly config: SelectionConfig

  constructor(private readonly options: TextSelectionOptions) {
    this.clock = options.clock ?? DEFAULT_SYSTEM_CLOCK
    this.config = { ...DEFAULT_SELECTION_CONFIG, ...options.config }
  }

  get state(): SelectionState {
    return this.current
  }

  subscribe(listener: (state: SelectionState) => void): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Coordinates left of or above the viewport clamp to its edge. */
  startSelection(col: number, line: number): void {
    const x = Math.max(0, col)
    const y = Math.max(0, line)
    this.update({ startCol: x, startLine: y, endCol: x, endLine: y, active: true })
  }

  endSelection(col: number, line: number): void {
    if (!this.current.active) return
    this.update({ endCol: Math.max(0, col), endLine: Math.max(0, line) })
  }

  selectionStop(): void {
    this.update({ active: false })
  }

  selectionClear(): void {
    this.update({ startCol: -1, startLine: -1, endCol: -1, endLine: -1, active: false })
  }

  /** Forgets everything, including click history and any running flash. */
  reset(): void {
    this.cancelFlashTimer()
    this.current = CLEARED
    this.notify()
  }

  hasTextSelection(): boolean {
    const { startCol, startLine, endCol, endLine } = this.current
    return startCol >= 0 && startLine >= 0 && (endCol !== startCol || endLine !== startLine)
  }

  isSelectionFlashing(): boolean {
    return this.current.flashFrame >= 0
  }

  /** The selection with start before end in reading order. */
  selectionArea(): SelectionArea {
    const { startCol, startLine, endCol, endLine } = this.current
    if (startLine > endLine || (startLine === endLine && startCol > endCol)) {
      return { startCol: endCol, startLine: endLine, endCol: startCol, endLine: startLine }
    }
    return { startCol, startLine, endCol, endLine }
  }

  handleMouseClick(x: number, y: number): CopyAction | null {
    const now = this.clock.now()
    const { lastClickTime, lastClickX, lastClickY, clickCount } = this.current
    const { clickTolerance, multiClickWindowMs } = this.config
    const repeated =
      lastClickTime != null &&
      now - lastClickTime <= multiClickWindowMs &&
      Math.abs(x - lastClickX) <= clickTolerance &&
      Math.abs(y - lastClickY) <= clickTolerance
    const count = repeated ? clickCount + 1 : 1
    this.current = { ...this.current, lastClickTime: now, lastClickX: x, lastClickY: y, clickCount: count }

    switch (count) {
      case 1:
        this.startSelection(x, y)
        return null
      case 2:
        this.selectWord(x, y)
        return this.copySelectedText()
      case 3:
        this.selectParagraph(x, y)
        this.update({ clickCount: 0 })
        return this.copySelectedText()
      default:
        this.notify()
        return null
    }
  }

  /** Routes a panel-relative mouse event, removing the border offset first. */
  handleMouseEvent(event: PanelMouseEvent): CopyAction | null {
    const x = event.x - this.config.borderWidth
    const y = event.y - this.config.borderWidth
    switch (event.kind) {
      case "press":
        return this.handleMouseClick(x, y)
      case "motion":
        this.endSelection(x, y)
        return null
      case "release":
        if (!this.current.active) return null
        this.selectionStop()
        return this.copySelectedText()
    }
  }

  selectWord(col: number, line: number): void {
    const lines = splitLines(this.options.viewport.view())
    if (line < 0 || line >= lines.length || col < 0) return
    const text = stripAnsi(lines[line] ?? "")
    if (col >= visibleWidth(text)) return
    const word = wordAtColumn(text, col)
    if (!word) return
    this.update({
      startCol: word.startColumn,
      startLine: line,
      endCol: word.endColumn,
      endLine: line,
      active: false,
    })
  }

  selectParagraph(col: number, line: number): void {
    const lines = splitLines(this.options.viewport.view())
    if (line < 0 || line >= lines.length || col < 0) return
    const isBlank = (index: number) => stripAnsi(lines[index] ?? "").trim() === ""

    let startLine = line
    while (startLine > 0 && !isBlank(startLine - 1)) startLine -= 1
    let endLine = line
    while (endLine < lines.length - 1 && !isBlank(endLine + 1)) endLine += 1

    this.update({
      startCol: 0,
      startLine,
      endCol: visibleWidth(stripAnsi(lines[endLine] ?? "")),
      endLine,
      active: false,
    })
  }

  getSelectedText(): string {
    if (!this.hasTextSelection()) return ""
    const lines = splitLines(this.options.viewport.view())
    const { startCol, startLine, endCol, endLine } = this.selectionArea()
    const parts: string[] = []

    for (let y = Math.max(0, startLine); y <= endLine && y < lines.length; y += 1) {
      const line = stripAnsi(lines[y] ?? "")
      const lineWidth = visibleWidth(line)
      const lineEndCol = Math.min(y === endLine ? endCol : lineWidth, lineWidth)
      const lineStartCol = Math.min(Math.max(y === startLine ? startCol : 0, 0), lineEndCol)
      parts.push(line.slice(columnToOffset(line, lineStartCol), columnToOffset(line, lineEndCol)))
    }
    return parts.join("\n").trim()
  }

  /**
   * Starts the copy flash and returns the clipboard write to run, or null
   * when there is nothing selected.
   */
  copySelectedText(): CopyAction | null {
    if (!this.hasTextSelection()) return null
    const text = this.getSelectedText()
    if (!text) return null

    this.update({ flashFrame: 0 })
    this.scheduleFlashTick()
    const clipboard = this.options.clipboard
    return {
      text,
      run: async (): Promise<CopyResult> => {
        if (!clipboard) {
          return { ok: false, text, error: new ClipboardWriteError("No clipboard is configured.") }
        }
        try {
          await clipboard.writeText(text)
          return { ok: true, text }
        } catch (error) {
          debugLog("selection", { clipboardWriteError: describeError(error) })
          const failure =
            error instanceof ClipboardWriteError
              ? error
              : new ClipboardWriteError(`Clipboard write failed: ${describeError(error)}`, { cause: error })
          return { ok: false, text, error: failure }
        }
      },
    }
  }

  /** Ends the copy flash and clears the selection; false when no flash was running. */
  handleFlashTick(): boolean {
    if (this.current.flashFrame === -1) return false
    this.cancelFlashTimer()
    this.update({ startCol: -1, startLine: -1, endCol: -1, endLine: -1, active: false, flashFrame: -1 })
    return true
  }

  selectionView(view: string): string {
    if (!this.hasTextSelection()) return view
    const { width, height } = this.options.viewport
    const { styles } = this.options
    const highlight = this.current.flashFrame !== -1 ? styles.selectionFlash : styles.selection
    return overlaySelection(view, this.selectionArea(), { width, height }, highlight)
  }

  private scheduleFlashTick(): void {
    this.cancelFlashTimer()
    this.flashTimer = this.clock.setTimeout(() => {
      this.flashTimer = null
      this.handleFlashTick()
    }, this.config.flashTickMs)
  }

  private cancelFlashTimer(): void {
    if (this.flashTimer == null) return
    this.clock.clearTimeout(this.flashTimer)
    this.flashTimer = null
  }

  private update(patch: Partial<SelectionState>): void {
    this.current = { ...this.current, ...patch }
    this.notify()
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this.current)
    }
  }
}
