export type RecordingState =
  | 'idle'
  | 'recording'
  | 'pausedByUser'
  | 'pausedByInterruption'
  | 'stopped'

export type LogLevel = 'info' | 'error'

export interface LogEntry {
  /** 1-based position in the log */
  id: number
  /** Epoch milliseconds */
  timestamp: number
  level: LogLevel
  message: string
}

export type InterruptionEvent =
  | { type: 'began' }
  | {
      type: 'ended'
      /** The platform advises that recording may resume */
      shouldResume: boolean
    }
