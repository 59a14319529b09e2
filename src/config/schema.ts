import { COLOR_MODES } from "../theme/colorMode.js"
import type { PanelConfigInput } from "./types.js"

export type ValidationIssue = {
  readonly severity: "error" | "warning"
  readonly path: string
  readonly message: string
}

type ValidationResult = {
  readonly config: PanelConfigInput
  readonly issues: readonly ValidationIssue[]
}

type ValidationOptions = {
  readonly strictUnknownKeys: boolean
}

const BOOL_TRUE = new Set(["1", "true", "yes", "on"])
const BOOL_FALSE = new Set(["0", "false", "no", "off"])

const toPath = (parts: readonly string[]): string => (parts.length > 0 ? parts.join(".") : "<root>")

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value != null && !Array.isArray(value)

export const parseBooleanLike = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") return value
  if (typeof value !== "string") return undefined
  const normalized = value.trim().toLowerCase()
  if (BOOL_TRUE.has(normalized)) return true
  if (BOOL_FALSE.has(normalized)) return false
  return undefined
}

const readRecord = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): Record<string, unknown> | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (!isRecord(value)) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected object, received ${Array.isArray(value) ? "array" : typeof value}.`,
    })
    return undefined
  }
  return value
}

const readBoolean = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): boolean | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const parsed = parseBooleanLike(source[key])
  if (parsed == null) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: "Expected boolean (or bool-like string).",
    })
    return undefined
  }
  return parsed
}

const readString = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): string | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (typeof value !== "string") {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected string, received ${typeof value}.`,
    })
    return undefined
  }
  return value
}

const readInt = (
  source: Record<string, unknown>,
  key: string,
  minimum: number,
  path: readonly string[],
  issues: ValidationIssue[],
): number | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && /^\s*-?\d+\s*$/.test(value)
        ? Number.parseInt(value.trim(), 10)
        : Number.NaN
  if (!Number.isInteger(parsed) || parsed < minimum) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: minimum > 0 ? "Expected positive integer." : "Expected non-negative integer.",
    })
    return undefined
  }
  return parsed
}

const readEnum = <T extends string>(
  source: Record<string, unknown>,
  key: string,
  values: readonly T[],
  path: readonly string[],
  issues: ValidationIssue[],
): T | undefined => {
  const raw = readString(source, key, path, issues)
  if (raw == null) return undefined
  const normalized = raw.trim().toLowerCase()
  const match = values.find((value) => value === normalized)
  if (match == null) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected one of ${values.join(", ")}.`,
    })
  }
  return match
}

const detectUnknownKeys = (
  source: Record<string, unknown>,
  allowed: readonly string[],
  path: readonly string[],
  issues: ValidationIssue[],
  strictUnknownKeys: boolean,
) => {
  for (const key of Object.keys(source)) {
    if (allowed.includes(key)) continue
    issues.push({
      severity: strictUnknownKeys ? "error" : "warning",
      path: toPath([...path, key]),
      message: "Unknown key.",
    })
  }
}

export const validatePanelConfigInput = (input: unknown, options: ValidationOptions): ValidationResult => {
  const issues: ValidationIssue[] = []
  // An empty YAML document parses to null.
  if (input == null) return { config: {}, issues }
  if (!isRecord(input)) {
    issues.push({
      severity: "error",
      path: "<root>",
      message: "Expected top-level object.",
    })
    return { config: {}, issues }
  }

  const root = input
  detectUnknownKeys(root, ["theme", "syntaxStyle", "display", "layout", "selection"], [], issues, options.strictUnknownKeys)

  const config: PanelConfigInput = {}
  const theme = readString(root, "theme", [], issues)
  if (theme != null && theme.trim()) config.theme = theme.trim()
  const syntaxStyle = readString(root, "syntaxStyle", [], issues)
  if (syntaxStyle != null && syntaxStyle.trim()) config.syntaxStyle = syntaxStyle.trim()

  const displayRaw = readRecord(root, "display", [], issues)
  if (displayRaw) {
    detectUnknownKeys(displayRaw, ["colorMode", "asciiOnly"], ["display"], issues, options.strictUnknownKeys)
    const display: NonNullable<PanelConfigInput["display"]> = {}
    const colorMode = readEnum(displayRaw, "colorMode", COLOR_MODES, ["display"], issues)
    if (colorMode != null) display.colorMode = colorMode
    const asciiOnly = readBoolean(displayRaw, "asciiOnly", ["display"], issues)
    if (asciiOnly != null) display.asciiOnly = asciiOnly
    config.display = display
  }

  const layoutRaw = readRecord(root, "layout", [], issues)
  if (layoutRaw) {
    detectUnknownKeys(layoutRaw, ["defaultWrapWidth", "minColumnWidth"], ["layout"], issues, options.strictUnknownKeys)
    const layout: NonNullable<PanelConfigInput["layout"]> = {}
    const defaultWrapWidth = readInt(layoutRaw, "defaultWrapWidth", 1, ["layout"], issues)
    if (defaultWrapWidth != null) layout.defaultWrapWidth = defaultWrapWidth
    const minColumnWidth = readInt(layoutRaw, "minColumnWidth", 1, ["layout"], issues)
    if (minColumnWidth != null) layout.minColumnWidth = minColumnWidth
    config.layout = layout
  }

  const selectionRaw = readRecord(root, "selection", [], issues)
  if (selectionRaw) {
    detectUnknownKeys(
      selectionRaw,
      ["clickTolerance", "multiClickWindowMs", "flashTickMs"],
      ["selection"],
      issues,
      options.strictUnknownKeys,
    )
    const selection: NonNullable<PanelConfigInput["selection"]> = {}
    const clickTolerance = readInt(selectionRaw, "clickTolerance", 0, ["selection"], issues)
    if (clickTolerance != null) selection.clickTolerance = clickTolerance
    const multiClickWindowMs = readInt(selectionRaw, "multiClickWindowMs", 1, ["selection"], issues)
    if (multiClickWindowMs != null) selection.multiClickWindowMs = multiClickWindowMs
    const flashTickMs = readInt(selectionRaw, "flashTickMs", 1, ["selection"], issues)
    if (flashTickMs != null) selection.flashTickMs = flashTickMs
    config.selection = selection
  }

  return { config, issues }
}

export const formatValidationIssues = (issues: readonly ValidationIssue[]): string[] =>
  issues.map((issue) => `[${issue.severity}] ${issue.path}: ${issue.message}`)
