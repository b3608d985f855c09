import type { DatasetSlice, DebugLogEntry } from '@dataset-gateway/validation'

export function debugEntry(
  phase: DebugLogEntry['phase'],
  message: string,
  durationMs: number,
  details?: unknown,
): DebugLogEntry {
  const result: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message: `${message} (${durationMs.toFixed(1)}ms)`,
  }
  if (details !== undefined) result.details = details
  return result
}

export function withDebugLog(slice: DatasetSlice, debug: boolean, log: DebugLogEntry[]): DatasetSlice {
  if (debug && log.length > 0) {
    return { ...slice, debugLog: log }
  }
  return slice
}
