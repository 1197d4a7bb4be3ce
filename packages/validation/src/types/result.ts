export interface DebugLogEntry {
  timestamp: number
  phase: 'validation' | 'aliasing' | 'rendering'
  message: string
  details?: unknown
}

export interface RenderResult {
  sql: string
  dialect: string
  debugLog?: DebugLogEntry[] | undefined
}
