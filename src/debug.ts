/**
 * Debug logging for schema extraction and proxy generation.
 *
 * Off unless `enableDebugLogging()` is called or the process starts with
 * `MANAGED_MODEL_DEBUG=true`.
 */

const PREFIX = '[managed-model]'

let enabled = typeof process !== 'undefined' && process.env.MANAGED_MODEL_DEBUG === 'true'

export function enableDebugLogging(on = true): void {
  enabled = on
}

export function isDebugLoggingEnabled(): boolean {
  return enabled
}

export function debugLog(message: string, ...details: unknown[]): void {
  if (!enabled) return
  console.debug(`${PREFIX} ${message}`, ...details)
}
