import type { RecordingState } from '../types'

// ─────────────────────────────────────────────────────────────────────────────
// State
// ─────────────────────────────────────────────────────────────────────────────

export interface RecorderMachineState {
  status: RecordingState
  /**
   * Set only while an interruption holds the recording paused. A user pause
   * clears it so that the end of an interruption never overrides the user.
   */
  pausedByInterruption: boolean
}

export const initialRecorderState: RecorderMachineState = {
  status: 'idle',
  pausedByInterruption: false,
}

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

export type RecorderEvent =
  | { type: 'START' }
  | { type: 'PAUSE' }
  | { type: 'STOP' }
  | { type: 'RESUME' }
  | { type: 'INTERRUPTION_BEGAN' }
  | { type: 'INTERRUPTION_ENDED'; shouldResume: boolean }

// ─────────────────────────────────────────────────────────────────────────────
// Reducer
// ─────────────────────────────────────────────────────────────────────────────

export function recorderReducer(
  state: RecorderMachineState,
  event: RecorderEvent
): RecorderMachineState {
  switch (event.type) {
    case 'START':
      return { status: 'recording', pausedByInterruption: false }

    case 'PAUSE':
      // Pausing an idle, stopped or already user-paused recorder changes nothing
      return {
        status: isPausable(state.status) ? 'pausedByUser' : state.status,
        pausedByInterruption: false,
      }

    case 'STOP':
      return { status: 'stopped', pausedByInterruption: false }

    case 'RESUME':
      if (!state.pausedByInterruption) return state
      return { status: 'recording', pausedByInterruption: false }

    case 'INTERRUPTION_BEGAN':
      if (state.status !== 'recording') return state
      return { status: 'pausedByInterruption', pausedByInterruption: true }

    case 'INTERRUPTION_ENDED':
      return event.shouldResume ? recorderReducer(state, { type: 'RESUME' }) : state

    default:
      return state
  }
}

export function isPausable(status: RecordingState): boolean {
  return status === 'recording' || status === 'pausedByInterruption'
}

/** Replay a sequence of events from the initial state */
export function replayEvents(
  events: readonly RecorderEvent[],
  from: RecorderMachineState = initialRecorderState
): RecorderMachineState {
  return events.reduce(recorderReducer, from)
}
