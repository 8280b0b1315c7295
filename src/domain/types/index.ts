export type { RecordingState, LogLevel, LogEntry, InterruptionEvent } from './recording'

export type {
  AudioSession,
  AudioCaptureService,
  InterruptionListener,
  InterruptionSource,
} from './platform'
