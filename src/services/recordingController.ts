import type {
  AudioCaptureService,
  AudioSession,
  InterruptionEvent,
  InterruptionSource,
  LogEntry,
  RecordingState,
} from '../domain/types'
import { resolveConfig, type RecorderConfig, type RecorderConfigOverrides } from '../config'
import {
  recorderReducer,
  initialRecorderState,
  type RecorderEvent,
  type RecorderMachineState,
} from '../domain/state/recorderMachine'
import { LogStream } from './logStream'
import { parseInterruptionPayload } from './interruptionPayload'
import { describeError } from './errors'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** What the presentation shell sees of a recorder */
export interface Recorder {
  setup(): Promise<void>
  teardown(): void
  startRecording(): void
  pauseRecording(): void
  stopRecording(): void
  getState(): RecordingState
  getLog(): readonly LogEntry[]
  /** Notified after every log append; each state change appends at least one entry */
  subscribe(listener: () => void): () => void
}

export interface RecordingControllerDeps<THandle> {
  session: AudioSession
  capture: AudioCaptureService<THandle>
  interruptions: InterruptionSource
  config?: RecorderConfigOverrides
  clock?: () => number
}

// ─────────────────────────────────────────────────────────────────────────────
// Log Messages
// ─────────────────────────────────────────────────────────────────────────────

export const LOG_MESSAGES = {
  started: 'Recording started',
  paused: 'Recording paused',
  stopped: 'Recording stopped',
  resumed: 'Recording resumed',
  interruptionBegan: 'Interruption began',
  interruptionEnded: 'Interruption ended',
  malformedInterruption: 'Failed to get interruption type',
} as const

// ─────────────────────────────────────────────────────────────────────────────
// Controller
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Owns the recording lifecycle: drives the capture service, reacts to
 * interruptions and records every transition in its log.
 *
 * Commands are synchronous, so user actions and interruption callbacks are
 * serialized by the event loop. Session and capture failures never escape;
 * they become error entries and later commands stay log-only.
 */
export class RecordingController<THandle> implements Recorder {
  private readonly session: AudioSession
  private readonly capture: AudioCaptureService<THandle>
  private readonly interruptions: InterruptionSource
  private readonly config: RecorderConfig
  private readonly log: LogStream

  private machine: RecorderMachineState = initialRecorderState
  private handle: THandle | null = null
  private unsubscribeInterruptions: (() => void) | null = null
  private isSetUp = false
  // Bumped on every teardown so a setup still awaiting the platform can tell it is stale
  private generation = 0

  constructor({ session, capture, interruptions, config, clock }: RecordingControllerDeps<THandle>) {
    this.session = session
    this.capture = capture
    this.interruptions = interruptions
    this.config = resolveConfig(config)
    this.log = new LogStream(clock)
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  async setup(): Promise<void> {
    if (this.isSetUp) return
    this.isSetUp = true
    const generation = this.generation

    let sessionReady = true
    try {
      await this.session.configure(this.config.session)
    } catch (err) {
      this.fail('Failed to configure audio session', err)
      sessionReady = false
    }

    if (generation !== this.generation) return

    this.unsubscribeInterruptions = this.interruptions.subscribe((payload) =>
      this.handleInterruption(payload)
    )

    if (!sessionReady) return

    try {
      const handle = await this.capture.prepare(this.config.destination, this.config.encoding)
      if (generation !== this.generation) {
        // Torn down while preparing
        this.releaseHandle(handle)
        return
      }
      this.handle = handle
    } catch (err) {
      this.fail('Audio recorder setup failed', err)
    }
  }

  teardown(): void {
    if (!this.isSetUp) return
    this.isSetUp = false
    this.generation++

    this.unsubscribeInterruptions?.()
    this.unsubscribeInterruptions = null

    if (this.handle !== null) {
      const handle = this.handle
      this.handle = null
      this.releaseHandle(handle)
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Commands
  // ───────────────────────────────────────────────────────────────────────────

  startRecording(): void {
    this.command('start', (handle) => this.capture.start(handle))
    this.dispatch({ type: 'START' })
    this.append(LOG_MESSAGES.started)
  }

  /**
   * Always logs "Recording paused", even when the recorder is idle, stopped
   * or already paused and the state does not change.
   */
  pauseRecording(): void {
    if (this.machine.status === 'recording') {
      this.command('pause', (handle) => this.capture.pause(handle))
    }
    this.dispatch({ type: 'PAUSE' })
    this.append(LOG_MESSAGES.paused)
  }

  stopRecording(): void {
    this.command('stop', (handle) => this.capture.stop(handle))
    this.dispatch({ type: 'STOP' })
    this.append(LOG_MESSAGES.stopped)
  }

  /** Only acts after an interruption pause; otherwise a silent no-op */
  resumeRecording(): void {
    if (!this.machine.pausedByInterruption) return
    this.startRecording()
    this.append(LOG_MESSAGES.resumed)
  }

  handleInterruption(payload: unknown): void {
    let event: InterruptionEvent
    try {
      event = parseInterruptionPayload(payload)
    } catch (err) {
      console.error('Rejected interruption payload:', err)
      this.log.append(LOG_MESSAGES.malformedInterruption, 'error')
      return
    }

    switch (event.type) {
      case 'began':
        if (this.machine.status === 'recording') {
          this.command('pause', (handle) => this.capture.pause(handle))
        }
        this.dispatch({ type: 'INTERRUPTION_BEGAN' })
        this.append(LOG_MESSAGES.interruptionBegan)
        break

      case 'ended':
        if (event.shouldResume) {
          this.resumeRecording()
        }
        this.append(LOG_MESSAGES.interruptionEnded)
        break
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Read access
  // ───────────────────────────────────────────────────────────────────────────

  getState(): RecordingState {
    return this.machine.status
  }

  isPausedByInterruption(): boolean {
    return this.machine.pausedByInterruption
  }

  isResourceBound(): boolean {
    return this.handle !== null
  }

  getLog(): readonly LogEntry[] {
    return this.log.getEntries()
  }

  subscribe(listener: () => void): () => void {
    return this.log.subscribe(listener)
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private dispatch(event: RecorderEvent): void {
    this.machine = recorderReducer(this.machine, event)
  }

  /** Run a capture command against the bound handle; without one, do nothing */
  private command(verb: string, run: (handle: THandle) => void): void {
    if (this.handle === null) return
    try {
      run(this.handle)
    } catch (err) {
      this.fail(`Failed to ${verb} recording`, err)
    }
  }

  private releaseHandle(handle: THandle): void {
    try {
      this.capture.release(handle)
    } catch (err) {
      this.fail('Failed to release audio recorder', err)
    }
  }

  private append(message: string): void {
    this.log.append(message)
    if (this.config.echoToConsole) {
      console.log(message)
    }
  }

  private fail(context: string, err: unknown): void {
    console.error(`${context}:`, err)
    this.log.append(`${context}: ${describeError(err)}`, 'error')
  }
}
