export type DebugPhase = 'execution' | 'mapping' | 'translation'

export interface DebugLogEntry {
  timestamp: number
  phase: DebugPhase
  message: string
  details?: unknown
}

/** Receives debug entries as a template produces them. */
export type DebugSink = (entry: DebugLogEntry) => void

export function debugEntry(phase: DebugPhase, message: string, durationMs: number, details?: unknown): DebugLogEntry {
  const result: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message: `${message} (${durationMs.toFixed(1)}ms)`,
  }
  if (details !== undefined) result.details = details
  return result
}

/** A sink that keeps every entry, for callers that want the whole log at once. */
export function withDebugLog(): { sink: DebugSink; entries: readonly DebugLogEntry[] } {
  const entries: DebugLogEntry[] = []
  return {
    sink: (entry) => {
      entries.push(entry)
    },
    entries,
  }
}
