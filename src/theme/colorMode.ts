export type ColorMode = "truecolor" | "ansi256" | "ansi16" | "none"

export const COLOR_MODES: readonly ColorMode[] = ["truecolor", "ansi256", "ansi16", "none"]

const TRUTHY = ["1", "true", "yes", "on"]

export const parseColorMode = (value: string | null | undefined): ColorMode | null => {
  const raw = (value ?? "").toLowerCase().trim()
  if (!raw) return null
  if (["0", "none", "off", "false"].includes(raw)) return "none"
  if (["16", "ansi16", "basic"].includes(raw)) return "ansi16"
  if (["256", "ansi256"].includes(raw)) return "ansi256"
  if (["truecolor", "24bit", "true"].includes(raw)) return "truecolor"
  return null
}

export const resolveColorMode = (override?: ColorMode | null, allowColor = true): ColorMode => {
  if (!allowColor) return "none"
  if (override) return override
  if (process.env.NO_COLOR) return "none"
  return parseColorMode(process.env.CHATPANE_COLOR_MODE) ?? "truecolor"
}

export const resolveAsciiOnly = (override?: boolean | null): boolean => {
  if (override != null) return override
  const raw = (process.env.CHATPANE_ASCII ?? "").toLowerCase().trim()
  if (!raw) return false
  return TRUTHY.includes(raw)
}

/** Chalk color level for a color mode. */
export const chalkLevelFor = (mode: ColorMode): 0 | 1 | 2 | 3 => {
  switch (mode) {
    case "none":
      return 0
    case "ansi16":
      return 1
    case "ansi256":
      return 2
    case "truecolor":
      return 3
  }
}
