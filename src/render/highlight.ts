import type { BundledLanguage, BundledTheme, Highlighter } from "shiki"
import { debugLog, describeError } from "../util/debugLog.js"

export const DEFAULT_SYNTAX_STYLE = "monokai"
export const GENERIC_LANGUAGE = "text"
const MAX_HIGHLIGHT_LINES = 500
const MAX_HIGHLIGHT_CHARS = 120_000
const DEFAULT_LANGS: BundledLanguage[] = [
  "ts",
  "tsx",
  "js",
  "jsx",
  "json",
  "bash",
  "sh",
  "python",
  "go",
  "rust",
  "java",
  "c",
  "cpp",
  "diff",
  "yaml",
  "markdown",
  "html",
  "css",
  "sql",
]

export type HighlighterStatus = "idle" | "loading" | "ready" | "failed"

/** Styles one token from its hex color and font-style bits (1 italic, 2 bold, 4 underline). */
export type TokenPainter = (text: string, color: string | null, fontStyle: number) => string

export interface HighlightOptions {
  /** Shiki theme name; unknown names use the default palette. */
  readonly style?: string | null
  readonly paint: TokenPainter
}

export interface SyntaxHighlighterOptions {
  /** Extra themes loaded up front next to the default palette. */
  readonly preloadStyles?: readonly string[]
}

const normalizeLanguage = (language?: string | null): string | null => {
  if (!language) return null
  const [first] = language.trim().split(/[\s{,]/)
  const normalized = first?.toLowerCase() ?? ""
  if (!normalized) return null
  if (normalized === "text" || normalized === "plain" || normalized === "plaintext" || normalized === "txt") return null
  return normalized
}

/**
 * Owns one shiki highlighter. Loading is asynchronous; until it completes,
 * `highlight` returns code unstyled and subscribers hear when it is ready.
 */
export class SyntaxHighlighter {
  private status: HighlighterStatus = "idle"
  private highlighter: Highlighter | null = null
  private loading: Promise<void> | null = null
  private lastError: string | null = null
  private bundledLanguages: ReadonlySet<string> = new Set()
  private bundledThemes: ReadonlySet<string> = new Set()
  private readonly pendingLoads = new Map<string, Promise<void>>()
  private readonly listeners = new Set<() => void>()

  constructor(private readonly options: SyntaxHighlighterOptions = {}) {}

  getStatus(): { status: HighlighterStatus; error: string | null } {
    return { status: this.status, error: this.lastError }
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Starts loading if needed; resolves once loading settled either way. */
  load(): Promise<void> {
    this.ensureLoaded()
    return this.loading ?? Promise.resolve()
  }

  /** Waits for every lazy language or theme load requested so far. */
  async settle(): Promise<void> {
    await this.load()
    await Promise.all([...this.pendingLoads.values()])
  }

  highlight(code: string, language: string | null | undefined, options: HighlightOptions): string {
    if (code.length > MAX_HIGHLIGHT_CHARS) return code
    if (code.split("\n").length > MAX_HIGHLIGHT_LINES) return code
    const highlighter = this.highlighter
    if (!highlighter) {
      this.ensureLoaded()
      return code
    }
    try {
      const lang = this.resolveLanguage(highlighter, language)
      const theme = this.resolveStyle(highlighter, options.style)
      const { tokens } = highlighter.codeToTokens(code, { lang, theme })
      return tokens
        .map((line) => line.map((token) => options.paint(token.content, token.color ?? null, token.fontStyle ?? 0)).join(""))
        .join("\n")
    } catch (error) {
      debugLog("highlight", { highlightError: describeError(error), language })
      return code
    }
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener()
    }
  }

  private ensureLoaded(): void {
    if (this.status !== "idle") return
    this.status = "loading"
    const themes = [DEFAULT_SYNTAX_STYLE, ...(this.options.preloadStyles ?? [])]
    this.loading = import("shiki")
      .then(async ({ createHighlighter, bundledLanguages, bundledThemes }) => {
        this.bundledLanguages = new Set(Object.keys(bundledLanguages))
        this.bundledThemes = new Set(Object.keys(bundledThemes))
        const preloadThemes = themes.filter((theme): theme is BundledTheme => this.isBundledTheme(theme))
        this.highlighter = await createHighlighter({ themes: preloadThemes, langs: DEFAULT_LANGS })
        this.status = "ready"
        this.notify()
      })
      .catch((error: unknown) => {
        this.status = "failed"
        this.lastError = describeError(error)
        debugLog("highlight", { loadError: this.lastError })
        this.notify()
      })
  }

  private isBundledLanguage(value: string): value is BundledLanguage {
    return this.bundledLanguages.has(value)
  }

  private isBundledTheme(value: string): value is BundledTheme {
    return this.bundledThemes.has(value)
  }

  private resolveLanguage(highlighter: Highlighter, language: string | null | undefined): string {
    const normalized = normalizeLanguage(language)
    if (!normalized) return GENERIC_LANGUAGE
    if (highlighter.getLoadedLanguages().includes(normalized)) return normalized
    if (this.isBundledLanguage(normalized)) {
      this.request(normalized, () => highlighter.loadLanguage(normalized))
    }
    return GENERIC_LANGUAGE
  }

  private resolveStyle(highlighter: Highlighter, style: string | null | undefined): string {
    const requested = style?.trim().toLowerCase()
    if (!requested) return DEFAULT_SYNTAX_STYLE
    if (highlighter.getLoadedThemes().includes(requested)) return requested
    if (this.isBundledTheme(requested)) {
      this.request(`theme:${requested}`, () => highlighter.loadTheme(requested))
    }
    return DEFAULT_SYNTAX_STYLE
  }

  private request(key: string, load: () => Promise<void>): void {
    if (this.pendingLoads.has(key)) return
    const promise = load()
      .catch((error: unknown) => {
        debugLog("highlight", { lazyLoadError: describeError(error), key })
      })
      .finally(() => {
        this.pendingLoads.delete(key)
        this.notify()
      })
    this.pendingLoads.set(key, promise)
  }
}
