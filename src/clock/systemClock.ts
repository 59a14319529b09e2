import { normalizeDelayMs, type UIClock, type UIClockTimeoutHandle } from "./UIClock.js"

export class SystemClock implements UIClock {
  now(): number {
    return Date.now()
  }

  setTimeout(callback: () => void, delayMs: number): UIClockTimeoutHandle {
    const handle = setTimeout(callback, normalizeDelayMs(delayMs))
    // Flash ticks must not keep a finished CLI process alive.
    handle.unref()
    return handle
  }

  clearTimeout(handle: UIClockTimeoutHandle | null | undefined): void {
    if (handle == null) return
    clearTimeout(handle)
  }
}

export const DEFAULT_SYSTEM_CLOCK = new SystemClock()
