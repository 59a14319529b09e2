export type UIClockTimeoutHandle = ReturnType<typeof setTimeout> | number

/** Time source for click timing and flash animation ticks. */
export interface UIClock {
  now(): number
  setTimeout(callback: () => void, delayMs: number): UIClockTimeoutHandle
  clearTimeout(handle: UIClockTimeoutHandle | null | undefined): void
}

export const normalizeDelayMs = (delayMs: number): number => {
  if (!Number.isFinite(delayMs)) return 0
  return Math.max(0, Math.floor(delayMs))
}
