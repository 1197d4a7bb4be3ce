import type { DebugLogEntry, RenderResult } from '@relsql/validation'

export function debugEntry(
  phase: DebugLogEntry['phase'],
  message: string,
  durationMs?: number,
  details?: unknown,
): DebugLogEntry {
  const entry: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message: durationMs !== undefined ? `${message} (${durationMs.toFixed(1)}ms)` : message,
  }
  if (details !== undefined) entry.details = details
  return entry
}

/** Attach the collected entries as `debugLog`, only in debug mode and only when there are any. */
export function withDebugLog(result: RenderResult, debug: boolean, log: DebugLogEntry[]): RenderResult {
  if (debug && log.length > 0) {
    return { ...result, debugLog: log }
  }
  return result
}
