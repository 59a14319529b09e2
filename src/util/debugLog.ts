const DEBUG_ENV = "CHATPANE_DEBUG"

const enabledScopes = (): Set<string> | "all" | null => {
  const raw = (process.env[DEBUG_ENV] ?? "").trim()
  if (!raw || raw === "0") return null
  if (raw === "1" || raw === "*" || raw.toLowerCase() === "true") return "all"
  return new Set(raw.split(",").map((scope) => scope.trim()).filter(Boolean))
}

export const isDebugEnabled = (scope: string): boolean => {
  const scopes = enabledScopes()
  if (scopes == null) return false
  return scopes === "all" || scopes.has(scope)
}

/** One JSON line on stderr when `CHATPANE_DEBUG` is `1` or lists the scope. */
export const debugLog = (scope: string, payload: Record<string, unknown>): void => {
  if (!isDebugEnabled(scope)) return
  console.error(JSON.stringify({ scope, at: new Date().toISOString(), ...payload }))
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error))
