import { describe, expect, it } from "vitest"
import { classifyDiffLine, highlightDiff, type DiffStyles } from "../diff.js"

const tags: DiffStyles = {
  diffAdded: (text) => `<+>${text}</+>`,
  diffRemoved: (text) => `<->${text}</->`,
  diffHeader: (text) => `<h>${text}</h>`,
  diffHunk: (text) => `<@>${text}</@>`,
}

describe("classifyDiffLine", () => {
  it("checks header prefixes before added and removed", () => {
    expect(classifyDiffLine("+++ b/file")).toBe("header")
    expect(classifyDiffLine("--- a/file")).toBe("header")
    expect(classifyDiffLine("index 1234..5678")).toBe("header")
    expect(classifyDiffLine("new file mode 100644")).toBe("header")
    expect(classifyDiffLine("@@ -1 +1 @@")).toBe("hunk")
    expect(classifyDiffLine("+added")).toBe("added")
    expect(classifyDiffLine("-removed")).toBe("removed")
    expect(classifyDiffLine(" context")).toBe("context")
  })
})

describe("highlightDiff", () => {
  it("colors each line by kind and drops trailing newlines", () => {
    const diff = ["diff --git a/x b/x", "--- a/x", "+++ b/x", "@@ -1 +1 @@", "-old", "+new", " same", ""].join("\n")
    expect(highlightDiff(diff, tags)).toBe(
      [
        "<h>diff --git a/x b/x</h>",
        "<h>--- a/x</h>",
        "<h>+++ b/x</h>",
        "<@>@@ -1 +1 @@</@>",
        "<->-old</->",
        "<+>+new</+>",
        " same",
      ].join("\n"),
    )
  })

  it("returns an empty string for empty input", () => {
    expect(highlightDiff("", tags)).toBe("")
  })

  it("keeps trailing spaces on the last line", () => {
    expect(highlightDiff(" tail  \n\n", tags)).toBe(" tail  ")
  })
})
