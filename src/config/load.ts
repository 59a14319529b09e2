import { promises as fs } from "node:fs"
import os from "node:os"
import path from "node:path"
import { parse } from "yaml"
import { ConfigError } from "../errors.js"
import { MIN_COLUMN_WIDTH } from "../layout/table.js"
import { DEFAULT_WRAP_WIDTH } from "../render/markdown.js"
import { CLICK_TOLERANCE, FLASH_TICK_MS, MULTI_CLICK_WINDOW_MS } from "../selection/textSelection.js"
import { parseColorMode, resolveAsciiOnly, resolveColorMode } from "../theme/colorMode.js"
import { DEFAULT_THEME_ID, isBuiltinTheme, normalizeThemeId, resolveTheme } from "../theme/themeCatalog.js"
import { describeError } from "../util/debugLog.js"
import { formatValidationIssues, parseBooleanLike, validatePanelConfigInput } from "./schema.js"
import type { PanelConfigInput, ResolvedPanelConfig, ResolvePanelConfigOptions } from "./types.js"

export const DEFAULT_PANEL_CONFIG: Omit<ResolvedPanelConfig, "meta"> = {
  theme: DEFAULT_THEME_ID,
  syntaxStyle: null,
  display: { colorMode: "truecolor", asciiOnly: false },
  layout: { defaultWrapWidth: DEFAULT_WRAP_WIDTH, minColumnWidth: MIN_COLUMN_WIDTH },
  selection: {
    clickTolerance: CLICK_TOLERANCE,
    multiClickWindowMs: MULTI_CLICK_WINDOW_MS,
    flashTickMs: FLASH_TICK_MS,
  },
}

const mergeConfigInput = (base: PanelConfigInput, patch: PanelConfigInput): PanelConfigInput => ({
  ...base,
  ...patch,
  display: { ...(base.display ?? {}), ...(patch.display ?? {}) },
  layout: { ...(base.layout ?? {}), ...(patch.layout ?? {}) },
  selection: { ...(base.selection ?? {}), ...(patch.selection ?? {}) },
})

const validateLayer = (
  raw: unknown,
  source: string,
  strict: boolean,
): { config: PanelConfigInput; warnings: string[] } => {
  const validated = validatePanelConfigInput(raw, { strictUnknownKeys: strict })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    throw new ConfigError({
      message: `Invalid panel config at ${source}\n${formatValidationIssues(errors).join("\n")}`,
      source,
    })
  }
  const warnings = formatValidationIssues(validated.issues.filter((issue) => issue.severity === "warning"))
  return { config: validated.config, warnings }
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT"

const readYamlInput = async (
  filePath: string,
  strict: boolean,
  required: boolean,
): Promise<{ config: PanelConfigInput; warnings: string[] }> => {
  let raw: string
  try {
    raw = await fs.readFile(filePath, "utf8")
  } catch (error) {
    if (!required && isMissingFile(error)) {
      return { config: {}, warnings: [] }
    }
    throw new ConfigError({ message: `Cannot read panel config at ${filePath}: ${describeError(error)}`, source: filePath })
  }
  let parsed: unknown
  try {
    parsed = parse(raw)
  } catch (error) {
    throw new ConfigError({ message: `Invalid YAML in ${filePath}: ${describeError(error)}`, source: filePath })
  }
  return validateLayer(parsed, filePath, strict)
}

const resolveRepoConfigPath = async (workspace?: string | null): Promise<string | null> => {
  const root = workspace?.trim() || process.cwd()
  const candidates = [path.join(root, ".chatpane", "panel.yaml"), path.join(root, "chatpane.panel.yaml")]
  for (const candidate of candidates) {
    try {
      // eslint-disable-next-line no-await-in-loop
      await fs.access(candidate)
      return candidate
    } catch {
      // Keep searching.
    }
  }
  return null
}

const resolveUserConfigPath = (): string => path.join(os.homedir(), ".config", "chatpane", "panel.yaml")

const ENV_FIELDS: ReadonlyArray<readonly [string, "layout" | "selection", string]> = [
  ["CHATPANE_WRAP_WIDTH", "layout", "defaultWrapWidth"],
  ["CHATPANE_MIN_COLUMN_WIDTH", "layout", "minColumnWidth"],
  ["CHATPANE_CLICK_TOLERANCE", "selection", "clickTolerance"],
  ["CHATPANE_MULTI_CLICK_MS", "selection", "multiClickWindowMs"],
  ["CHATPANE_FLASH_TICK_MS", "selection", "flashTickMs"],
]

/** Raw env values in config shape; validated like any file layer. */
const envConfigLayer = (): Record<string, unknown> => {
  const config: Record<string, unknown> = {}
  const display: Record<string, unknown> = {}
  const sections: Record<"layout" | "selection", Record<string, unknown>> = { layout: {}, selection: {} }

  if (process.env.CHATPANE_THEME?.trim()) config.theme = process.env.CHATPANE_THEME.trim()
  if (process.env.CHATPANE_SYNTAX_STYLE?.trim()) config.syntaxStyle = process.env.CHATPANE_SYNTAX_STYLE.trim()
  const envColorMode = process.env.CHATPANE_COLOR_MODE?.trim()
  if (envColorMode) display.colorMode = parseColorMode(envColorMode) ?? envColorMode
  const envAscii = parseBooleanLike(process.env.CHATPANE_ASCII)
  if (envAscii != null) display.asciiOnly = envAscii
  for (const [name, section, key] of ENV_FIELDS) {
    const value = process.env[name]?.trim()
    if (value) sections[section][key] = value
  }

  if (Object.keys(display).length > 0) config.display = display
  if (Object.keys(sections.layout).length > 0) config.layout = sections.layout
  if (Object.keys(sections.selection).length > 0) config.selection = sections.selection
  return config
}

/**
 * Resolves the effective panel configuration. Layers apply in order:
 * defaults, repo file, user file, `--config` file, `CHATPANE_*` env, then
 * explicit CLI flags. `NO_COLOR` forces color mode `none`.
 */
export const resolvePanelConfig = async (options: ResolvePanelConfigOptions = {}): Promise<ResolvedPanelConfig> => {
  const strictFromEnv = parseBooleanLike(process.env.CHATPANE_CONFIG_STRICT)
  const strict = options.cliStrict ?? strictFromEnv ?? false
  const warnings: string[] = []
  const sources: string[] = ["defaults"]
  let merged: PanelConfigInput = {}

  const applyLayer = (layer: PanelConfigInput, source: string) => {
    if (Object.keys(layer).length === 0) return
    if (layer.theme && !isBuiltinTheme(normalizeThemeId(layer.theme))) {
      warnings.push(`${source}: unknown theme "${layer.theme}", using ${DEFAULT_THEME_ID}`)
    }
    merged = mergeConfigInput(merged, layer)
    sources.push(source)
  }

  const applyFile = async (filePath: string, source: string, required: boolean) => {
    const layer = await readYamlInput(filePath, strict, required)
    warnings.push(...layer.warnings.map((line) => `${filePath}: ${line}`))
    applyLayer(layer.config, source)
  }

  const repoConfigPath = await resolveRepoConfigPath(options.workspace)
  if (repoConfigPath) await applyFile(repoConfigPath, `repo:${repoConfigPath}`, false)

  const userConfigPath = resolveUserConfigPath()
  await applyFile(userConfigPath, `user:${userConfigPath}`, false)

  const cliConfigPath = options.cliConfigPath?.trim()
  if (cliConfigPath) {
    const resolvedCliPath = path.isAbsolute(cliConfigPath) ? cliConfigPath : path.resolve(process.cwd(), cliConfigPath)
    await applyFile(resolvedCliPath, `cli-config:${resolvedCliPath}`, true)
  }

  const envLayer = validateLayer(envConfigLayer(), "env", strict)
  warnings.push(...envLayer.warnings.map((line) => `env: ${line}`))
  applyLayer(envLayer.config, "env")

  const flags: PanelConfigInput = {}
  if (options.cliTheme?.trim()) flags.theme = options.cliTheme.trim()
  if (options.cliColorMode) flags.display = { colorMode: options.cliColorMode }
  applyLayer(flags, "cli-flags")

  const colorAllowed = options.colorAllowed ?? true
  const noColorRequested = Boolean(process.env.NO_COLOR)
  const requestedColorMode = merged.display?.colorMode ?? resolveColorMode(undefined, colorAllowed)
  const colorMode = !colorAllowed || noColorRequested ? "none" : requestedColorMode

  return {
    theme: resolveTheme(merged.theme).id,
    syntaxStyle: merged.syntaxStyle ?? DEFAULT_PANEL_CONFIG.syntaxStyle,
    display: {
      colorMode,
      asciiOnly: merged.display?.asciiOnly ?? resolveAsciiOnly(),
    },
    layout: {
      defaultWrapWidth: merged.layout?.defaultWrapWidth ?? DEFAULT_PANEL_CONFIG.layout.defaultWrapWidth,
      minColumnWidth: merged.layout?.minColumnWidth ?? DEFAULT_PANEL_CONFIG.layout.minColumnWidth,
    },
    selection: {
      clickTolerance: merged.selection?.clickTolerance ?? DEFAULT_PANEL_CONFIG.selection.clickTolerance,
      multiClickWindowMs: merged.selection?.multiClickWindowMs ?? DEFAULT_PANEL_CONFIG.selection.multiClickWindowMs,
      flashTickMs: merged.selection?.flashTickMs ?? DEFAULT_PANEL_CONFIG.selection.flashTickMs,
    },
    meta: {
      strict,
      sources,
      warnings,
    },
  }
}
