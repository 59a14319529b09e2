import type { PanelStyles } from "../theme/panelStyles.js"

export type DiffLineKind = "header" | "hunk" | "added" | "removed" | "context"

export type DiffStyles = Pick<PanelStyles, "diffAdded" | "diffRemoved" | "diffHeader" | "diffHunk">

const HEADER_PREFIXES = ["+++", "---", "diff --git", "index ", "new file mode", "deleted file mode"]

export const classifyDiffLine = (line: string): DiffLineKind => {
  if (HEADER_PREFIXES.some((prefix) => line.startsWith(prefix))) return "header"
  if (line.startsWith("@@")) return "hunk"
  if (line.startsWith("+")) return "added"
  if (line.startsWith("-")) return "removed"
  return "context"
}

const styleFor = (kind: DiffLineKind, styles: DiffStyles): ((text: string) => string) | null => {
  switch (kind) {
    case "header":
      return styles.diffHeader
    case "hunk":
      return styles.diffHunk
    case "added":
      return styles.diffAdded
    case "removed":
      return styles.diffRemoved
    case "context":
      return null
  }
}

/** Colors unified-diff text line by line; unrecognised lines pass through. */
export const highlightDiff = (diff: string, styles: DiffStyles): string => {
  if (!diff) return ""
  return diff
    .split("\n")
    .map((line) => {
      const style = styleFor(classifyDiffLine(line), styles)
      return style ? style(line) : line
    })
    .join("\n")
    .replace(/\n+$/, "")
}
