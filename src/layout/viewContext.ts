import { DEFAULT_THEME_ID } from "../theme/themeCatalog.js"
import { debugLog } from "../util/debugLog.js"

export const MIN_TERMINAL_WIDTH = 40
export const MIN_TERMINAL_HEIGHT = 10
/** Top plus bottom (or left plus right) border cells of a framed panel. */
export const BORDER_SIZE = 2

export interface ViewSnapshot {
  readonly width: number
  readonly height: number
  readonly scrollOffset: number
  readonly theme: string
}

export type ViewListener = (snapshot: ViewSnapshot, previous: ViewSnapshot) => void

const clampSnapshot = (snapshot: ViewSnapshot): ViewSnapshot => ({
  width: Math.max(MIN_TERMINAL_WIDTH, Math.floor(snapshot.width)),
  height: Math.max(MIN_TERMINAL_HEIGHT, Math.floor(snapshot.height)),
  scrollOffset: Math.max(0, Math.floor(snapshot.scrollOffset)),
  theme: snapshot.theme,
})

/**
 * Layout state shared by the panel's components. Readers get an immutable
 * snapshot; writers replace it through `update`.
 */
export class ViewContext {
  private current: ViewSnapshot
  private readonly listeners = new Set<ViewListener>()

  constructor(initial: Partial<ViewSnapshot> = {}) {
    this.current = clampSnapshot({
      width: initial.width ?? 80,
      height: initial.height ?? 24,
      scrollOffset: initial.scrollOffset ?? 0,
      theme: initial.theme ?? DEFAULT_THEME_ID,
    })
  }

  get snapshot(): ViewSnapshot {
    return this.current
  }

  update(fn: (snapshot: ViewSnapshot) => ViewSnapshot): ViewSnapshot {
    const previous = this.current
    const next = clampSnapshot(fn(previous))
    if (
      next.width === previous.width &&
      next.height === previous.height &&
      next.scrollOffset === previous.scrollOffset &&
      next.theme === previous.theme
    ) {
      return previous
    }
    this.current = next
    debugLog("layout", { width: next.width, height: next.height, scrollOffset: next.scrollOffset, theme: next.theme })
    for (const listener of this.listeners) {
      listener(next, previous)
    }
    return next
  }

  resize(width: number, height: number): ViewSnapshot {
    return this.update((snapshot) => ({ ...snapshot, width, height }))
  }

  subscribe(listener: ViewListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  innerWidth(panelWidth: number = this.current.width): number {
    return Math.max(0, panelWidth - BORDER_SIZE)
  }

  innerHeight(panelHeight: number = this.current.height): number {
    return Math.max(0, panelHeight - BORDER_SIZE)
  }
}
