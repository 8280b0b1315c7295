import {
  createContext,
  useCallback,
  useContext,
  useEffect,
  useState,
  useSyncExternalStore,
  type ReactNode,
} from 'react'
import type { LogEntry, RecordingState } from '../types'
import type { Recorder } from '../../services/recordingController'
import { createBrowserRecorder } from '../../services/browserPlatform'
import { formatLogEntry } from '../../services/logStream'

// ─────────────────────────────────────────────────────────────────────────────
// Context
// ─────────────────────────────────────────────────────────────────────────────

const RecorderContext = createContext<Recorder | null>(null)

// ─────────────────────────────────────────────────────────────────────────────
// Debug Helper (development only)
// ─────────────────────────────────────────────────────────────────────────────

declare global {
  interface Window {
    __RECORDER_DEBUG__?: {
      getState: () => RecordingState
      getLog: () => readonly LogEntry[]
      copyLog: () => void
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Provider
// ─────────────────────────────────────────────────────────────────────────────

interface RecorderProviderProps {
  children: ReactNode
  /** Optional recorder for testing/mocking */
  recorder?: Recorder
}

export function RecorderProvider({ children, recorder }: RecorderProviderProps) {
  // Created once per provider lifetime
  const [value] = useState<Recorder>(() => recorder ?? createBrowserRecorder())

  // Set up on mount, release the microphone and interruption listener on unmount
  useEffect(() => {
    value.setup().catch((err: unknown) => {
      console.error('Recorder setup failed:', err)
    })
    return () => value.teardown()
  }, [value])

  useEffect(() => {
    if (import.meta.env.DEV) {
      window.__RECORDER_DEBUG__ = {
        getState: () => value.getState(),
        getLog: () => value.getLog(),
        copyLog: () => {
          const text = value.getLog().map(formatLogEntry).join('\n')
          navigator.clipboard.writeText(text).then(
            () => console.log('Log copied to clipboard!'),
            (err: unknown) => console.warn('Could not copy log:', err)
          )
        },
      }
      console.log(
        '%c🎙 Debug helper available: __RECORDER_DEBUG__.copyLog() to copy the log to clipboard',
        'color: #10b981; font-weight: bold'
      )
    }
  }, [value])

  return <RecorderContext.Provider value={value}>{children}</RecorderContext.Provider>
}

// ─────────────────────────────────────────────────────────────────────────────
// Hooks
// ─────────────────────────────────────────────────────────────────────────────

export function useRecorder() {
  const context = useContext(RecorderContext)
  if (!context) {
    throw new Error('useRecorder must be used within a RecorderProvider')
  }
  return context
}

export function useRecordingState(): RecordingState {
  const recorder = useRecorder()
  const subscribe = useCallback((listener: () => void) => recorder.subscribe(listener), [recorder])
  const getSnapshot = useCallback(() => recorder.getState(), [recorder])
  return useSyncExternalStore(subscribe, getSnapshot)
}

export function useRecorderLog(): readonly LogEntry[] {
  const recorder = useRecorder()
  const subscribe = useCallback((listener: () => void) => recorder.subscribe(listener), [recorder])
  const getSnapshot = useCallback(() => recorder.getLog(), [recorder])
  return useSyncExternalStore(subscribe, getSnapshot)
}
