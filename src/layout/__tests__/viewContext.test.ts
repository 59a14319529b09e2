import { describe, expect, it, vi } from "vitest"
import { MIN_TERMINAL_HEIGHT, MIN_TERMINAL_WIDTH, ViewContext } from "../viewContext.js"

describe("ViewContext", () => {
  it("replaces the snapshot and notifies with old and new values", () => {
    const context = new ViewContext({ width: 100, height: 30 })
    const listener = vi.fn()
    context.subscribe(listener)
    const before = context.snapshot

    const after = context.update((snapshot) => ({ ...snapshot, scrollOffset: 5 }))

    expect(after).toEqual({ width: 100, height: 30, scrollOffset: 5, theme: "dark-purple" })
    expect(context.snapshot).toBe(after)
    expect(before.scrollOffset).toBe(0)
    expect(listener).toHaveBeenCalledWith(after, before)
  })

  it("skips notification when nothing changed", () => {
    const context = new ViewContext()
    const listener = vi.fn()
    context.subscribe(listener)
    context.update((snapshot) => ({ ...snapshot }))
    expect(listener).not.toHaveBeenCalled()
  })

  it("clamps sizes to the minimum terminal and offsets to zero", () => {
    const context = new ViewContext()
    context.resize(10, 2)
    context.update((snapshot) => ({ ...snapshot, scrollOffset: -3 }))
    expect(context.snapshot).toMatchObject({ width: MIN_TERMINAL_WIDTH, height: MIN_TERMINAL_HEIGHT, scrollOffset: 0 })
  })

  it("subtracts the border from inner sizes", () => {
    const context = new ViewContext({ width: 80, height: 24 })
    expect(context.innerWidth()).toBe(78)
    expect(context.innerHeight()).toBe(22)
    expect(context.innerWidth(50)).toBe(48)
  })
})
