import { describe, expect, it } from "vitest"
import { stripAnsi } from "../../text/ansi.js"
import { createPanelStyles } from "../../theme/panelStyles.js"
import { renderInline, type InlineStyles } from "../inline.js"

const tags: InlineStyles = {
  bold: (text) => `<b>${text}</b>`,
  italic: (text) => `<i>${text}</i>`,
  inlineCode: (text) => `<code>${text}</code>`,
  link: (text) => `<a>${text}</a>`,
  toolInProgress: (text) => `<run>${text}</run>`,
  toolComplete: (text) => `<done>${text}</done>`,
}

describe("renderInline", () => {
  it("styles bold, code and links", () => {
    expect(renderInline("**bold** and `code` and [link](http://x.test)", tags)).toBe(
      "<b>bold</b> and <code>code</code> and <a>link</a> (<a>http://x.test</a>)",
    )
  })

  it("leaves code span contents alone", () => {
    expect(renderInline("use `**x** _y_` here", tags)).toBe("use <code>**x** _y_</code> here")
  })

  it("only treats underscores at word boundaries as italic", () => {
    expect(renderInline("an _emph_ word", tags)).toBe("an <i>emph</i> word")
    expect(renderInline("snake_case_name", tags)).toBe("snake_case_name")
  })

  it("styles tool-use markers", () => {
    expect(renderInline("○ running ● done", tags)).toBe("<run>○</run> running <done>●</done> done")
  })

  it("keeps unmatched delimiters literal", () => {
    expect(renderInline("**open and `tick", tags)).toBe("**open and `tick")
  })

  it("drops NUL characters so they cannot forge code placeholders", () => {
    expect(renderInline("a\u0000CODE0\u0000b", tags)).toBe("aCODE0b")
  })

  it("renders links whose labels were already styled", () => {
    expect(renderInline("[**b** x](u)", tags)).toBe("<a><b>b</b> x</a> (<a>u</a>)")
    expect(renderInline("[_i_ x](u)", tags)).toBe("<a><i>i</i> x</a> (<a>u</a>)")
    expect(renderInline("[○ x](u)", tags)).toBe("<a><run>○</run> x</a> (<a>u</a>)")
  })

  it("renders links around escape-styled labels in color", () => {
    const styles = createPanelStyles({ colorMode: "truecolor" })
    expect(stripAnsi(renderInline("[**bold** label](http://x)", styles))).toBe("bold label (http://x)")
    expect(stripAnsi(renderInline("[_it_ label](http://x)", styles))).toBe("it label (http://x)")
    expect(stripAnsi(renderInline("[○ step](http://x)", styles))).toBe("○ step (http://x)")
  })

  it("produces plain text without color", () => {
    const styles = createPanelStyles({ colorMode: "none" })
    expect(renderInline("**bold** `code` [x](y)", styles)).toBe("bold code x (y)")
  })
})
