import type { UIClock } from "./clock/UIClock.js"
import { DEFAULT_PANEL_CONFIG } from "./config/load.js"
import type { ResolvedPanelConfig } from "./config/types.js"
import { ViewContext } from "./layout/viewContext.js"
import { highlightDiff } from "./render/diff.js"
import { SyntaxHighlighter } from "./render/highlight.js"
import { MarkdownRenderer, type StyledDocument } from "./render/markdown.js"
import { TextSelection } from "./selection/textSelection.js"
import { createPanelStyles, type PanelStyles } from "./theme/panelStyles.js"
import { resolveTheme } from "./theme/themeCatalog.js"
import type { ClipboardWriter } from "./util/clipboard.js"

export type ChatPanelSettings = Omit<ResolvedPanelConfig, "meta">

export interface ChatPanelOptions {
  readonly config?: ChatPanelSettings
  readonly highlighter?: SyntaxHighlighter
  readonly clipboard?: ClipboardWriter | null
  readonly clock?: UIClock
  readonly view?: ViewContext
}

/**
 * One chat panel: styles, markdown renderer and mouse selection built from a
 * resolved config. The selection reads whatever was last passed to
 * `setVisibleLines`.
 */
export class ChatPanel {
  readonly highlighter: SyntaxHighlighter
  readonly view: ViewContext
  readonly selection: TextSelection
  private stylesValue: PanelStyles
  private renderer: MarkdownRenderer
  private visible = ""
  private readonly unsubscribeView: () => void

  constructor(private readonly options: ChatPanelOptions = {}) {
    const config = options.config ?? DEFAULT_PANEL_CONFIG
    this.highlighter =
      options.highlighter ??
      new SyntaxHighlighter({ preloadStyles: [config.syntaxStyle ?? resolveTheme(config.theme).syntaxStyle] })
    this.view = options.view ?? new ViewContext({ theme: config.theme })
    this.stylesValue = this.buildStyles(this.view.snapshot.theme)
    this.renderer = this.buildRenderer()

    const panel = this
    this.selection = new TextSelection({
      viewport: {
        view: () => panel.visible,
        get width() {
          return panel.view.innerWidth()
        },
        get height() {
          return panel.view.innerHeight()
        },
      },
      styles: {
        get selection() {
          return panel.stylesValue.selection
        },
        get selectionFlash() {
          return panel.stylesValue.selectionFlash
        },
      },
      clipboard: options.clipboard ?? null,
      clock: options.clock,
      config: config.selection,
    })
    this.unsubscribeView = this.view.subscribe((next, previous) => {
      if (next.theme === previous.theme) return
      this.stylesValue = this.buildStyles(next.theme)
      this.renderer.dispose()
      this.renderer = this.buildRenderer()
    })
  }

  get styles(): PanelStyles {
    return this.stylesValue
  }

  private get config(): ChatPanelSettings {
    return this.options.config ?? DEFAULT_PANEL_CONFIG
  }

  /** Width available to message content inside the panel border. */
  contentWidth(): number {
    return this.view.innerWidth()
  }

  renderMarkdown(content: string, width: number = this.contentWidth()): StyledDocument {
    return this.renderer.render(content, width)
  }

  renderDiff(diff: string): string {
    return highlightDiff(diff, this.stylesValue)
  }

  setVisibleLines(lines: readonly string[]): void {
    this.visible = lines.join("\n")
  }

  /** The visible lines with the selection overlay applied. */
  visibleView(): string {
    return this.selection.selectionView(this.visible)
  }

  dispose(): void {
    this.unsubscribeView()
    this.renderer.dispose()
    this.selection.reset()
  }

  private buildStyles(themeId: string): PanelStyles {
    return createPanelStyles({
      theme: themeId,
      colorMode: this.config.display.colorMode,
      asciiOnly: this.config.display.asciiOnly,
    })
  }

  private buildRenderer(): MarkdownRenderer {
    return new MarkdownRenderer({
      styles: this.stylesValue,
      highlighter: this.highlighter,
      syntaxStyle: this.config.syntaxStyle,
      defaultWrapWidth: this.config.layout.defaultWrapWidth,
      minColumnWidth: this.config.layout.minColumnWidth,
    })
  }
}
