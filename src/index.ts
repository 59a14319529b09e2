export { ControlledClock } from "./clock/controlledClock.js"
export { DEFAULT_SYSTEM_CLOCK, SystemClock } from "./clock/systemClock.js"
export type { UIClock, UIClockTimeoutHandle } from "./clock/UIClock.js"
export { DEFAULT_PANEL_CONFIG, resolvePanelConfig } from "./config/load.js"
export { loadPanelConfig, PanelConfigLayer, PanelConfigTag, type PanelConfig } from "./config/panelConfig.js"
export { formatValidationIssues, validatePanelConfigInput, type ValidationIssue } from "./config/schema.js"
export type { PanelConfigInput, ResolvedPanelConfig, ResolvePanelConfigOptions } from "./config/types.js"
export { ConfigError, InputReadError } from "./errors.js"
export {
  distributeTableColumns,
  isTableRow,
  isTableSeparator,
  layoutTable,
  MIN_COLUMN_WIDTH,
  naturalColumnWidths,
  parseTableRow,
  type TableLayoutOptions,
  type TableSpec,
} from "./layout/table.js"
export { ViewContext, type ViewListener, type ViewSnapshot } from "./layout/viewContext.js"
export { wrapText } from "./layout/wrap.js"
export { ChatPanel, type ChatPanelOptions, type ChatPanelSettings } from "./panel.js"
export { classifyDiffLine, highlightDiff, type DiffLineKind, type DiffStyles } from "./render/diff.js"
export {
  DEFAULT_SYNTAX_STYLE,
  SyntaxHighlighter,
  type HighlighterStatus,
  type HighlightOptions,
  type TokenPainter,
} from "./render/highlight.js"
export { renderInline, TOOL_USE_COMPLETE, TOOL_USE_IN_PROGRESS, type InlineStyles } from "./render/inline.js"
export {
  DEFAULT_WRAP_WIDTH,
  MarkdownRenderer,
  type MarkdownRenderContext,
  type StyledDocument,
} from "./render/markdown.js"
export { highlightColumns, overlaySelection, type SelectionArea, type ViewportSize } from "./selection/selectionView.js"
export {
  CLICK_TOLERANCE,
  FLASH_TICK_MS,
  MULTI_CLICK_WINDOW_MS,
  TextSelection,
  type CopyAction,
  type CopyResult,
  type PanelMouseEvent,
  type SelectionState,
  type SelectionViewport,
} from "./selection/textSelection.js"
export {
  columnToOffset,
  offsetToColumn,
  padToWidth,
  splitByColumns,
  stripAnsi,
  visibleWidth,
} from "./text/ansi.js"
export { segmentWords, wordAtColumn, type WordSegment } from "./text/words.js"
export { COLOR_MODES, parseColorMode, type ColorMode } from "./theme/colorMode.js"
export { createPanelStyles, type PanelStyles, type SgrSpan } from "./theme/panelStyles.js"
export { DEFAULT_THEME_ID, listThemeIds, resolveTheme, type ResolvedTheme } from "./theme/themeCatalog.js"
export { ClipboardWriteError, createSystemClipboard, osc52Sequence, type ClipboardWriter } from "./util/clipboard.js"
