import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { RecordingController, LOG_MESSAGES } from './recordingController'
import { ResourcePreparationError, SessionConfigurationError } from './errors'
import { replayEvents, type RecorderEvent } from '../domain/state/recorderMachine'
import type {
  AudioCaptureService,
  AudioSession,
  InterruptionListener,
  InterruptionSource,
} from '../domain/types'
import type { AudioSessionOptions, EncodingConfig, RecordingDestination } from '../config'

// ─────────────────────────────────────────────────────────────────────────────
// Fakes
// ─────────────────────────────────────────────────────────────────────────────

interface FakeHandle {
  fileName: string
}

class FakeSession implements AudioSession {
  configured: AudioSessionOptions[] = []
  error: Error | null = null

  async configure(options: AudioSessionOptions): Promise<void> {
    if (this.error) throw this.error
    this.configured.push(options)
  }
}

class FakeCapture implements AudioCaptureService<FakeHandle> {
  calls: string[] = []
  prepared: { destination: RecordingDestination; encoding: EncodingConfig } | null = null
  prepareError: Error | null = null
  commandError: Error | null = null
  private pending: ((handle: FakeHandle) => void) | null = null
  deferPrepare = false

  prepare(destination: RecordingDestination, encoding: EncodingConfig): Promise<FakeHandle> {
    this.calls.push('prepare')
    this.prepared = { destination, encoding }
    if (this.prepareError) return Promise.reject(this.prepareError)
    if (this.deferPrepare) {
      return new Promise((resolve) => {
        this.pending = resolve
      })
    }
    return Promise.resolve({ fileName: destination.fileName })
  }

  finishPrepare(): void {
    this.pending?.({ fileName: 'late.m4a' })
  }

  start(): void {
    this.record('start')
  }

  pause(): void {
    this.record('pause')
  }

  stop(): void {
    this.record('stop')
  }

  release(handle: FakeHandle): void {
    this.calls.push(`release:${handle.fileName}`)
  }

  private record(command: string): void {
    if (this.commandError) throw this.commandError
    this.calls.push(command)
  }
}

class FakeInterruptions implements InterruptionSource {
  private listener: InterruptionListener | null = null
  subscribeCount = 0

  subscribe(listener: InterruptionListener): () => void {
    this.listener = listener
    this.subscribeCount++
    return () => {
      this.listener = null
    }
  }

  get isSubscribed(): boolean {
    return this.listener !== null
  }

  emit(payload: unknown): void {
    this.listener?.(payload)
  }
}

const BEGAN = { type: 'began' }
const ENDED_RESUME = { type: 'ended', options: { shouldResume: true } }
const ENDED_NO_RESUME = { type: 'ended', options: { shouldResume: false } }

describe('RecordingController', () => {
  let session: FakeSession
  let capture: FakeCapture
  let interruptions: FakeInterruptions
  let controller: RecordingController<FakeHandle>

  const messages = () => controller.getLog().map((entry) => entry.message)

  beforeEach(() => {
    session = new FakeSession()
    capture = new FakeCapture()
    interruptions = new FakeInterruptions()
    controller = new RecordingController({
      session,
      capture,
      interruptions,
      config: { echoToConsole: false },
      clock: () => 1_000,
    })
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('setup', () => {
    it('configures the session, subscribes and prepares the recorder', async () => {
      await controller.setup()

      expect(session.configured).toEqual([{ category: 'playAndRecord', mode: 'default' }])
      expect(interruptions.isSubscribed).toBe(true)
      expect(capture.prepared).toEqual({
        destination: { fileName: 'testRecording.m4a' },
        encoding: { format: 'aac', sampleRate: 12_000, channelCount: 1, quality: 'high' },
      })
      expect(controller.isResourceBound()).toBe(true)
      expect(controller.getState()).toBe('idle')
      expect(controller.getLog()).toEqual([])
    })

    it('logs a session failure and prepares nothing', async () => {
      session.error = new SessionConfigurationError('category rejected')

      await controller.setup()

      expect(messages()).toEqual(['Failed to configure audio session: category rejected'])
      expect(controller.getLog()[0]?.level).toBe('error')
      expect(capture.calls).toEqual([])
      expect(controller.isResourceBound()).toBe(false)
      expect(interruptions.isSubscribed).toBe(true)
      expect(controller.getState()).toBe('idle')
    })

    it('logs a preparation failure and stays idle', async () => {
      capture.prepareError = new ResourcePreparationError('Microphone access was denied.')

      await expect(controller.setup()).resolves.toBeUndefined()

      expect(messages()).toEqual(['Audio recorder setup failed: Microphone access was denied.'])
      expect(controller.isResourceBound()).toBe(false)
      expect(controller.getState()).toBe('idle')
    })

    it('ignores a second setup while set up', async () => {
      await controller.setup()
      await controller.setup()

      expect(capture.calls).toEqual(['prepare'])
      expect(interruptions.subscribeCount).toBe(1)
    })

    it('passes config overrides to the capture service', async () => {
      controller = new RecordingController({
        session,
        capture,
        interruptions,
        config: { echoToConsole: false, destination: { fileName: 'memo.m4a' } },
      })

      await controller.setup()

      expect(capture.prepared?.destination).toEqual({ fileName: 'memo.m4a' })
    })
  })

  describe('teardown', () => {
    it('unsubscribes and releases the recorder', async () => {
      await controller.setup()
      controller.teardown()

      expect(interruptions.isSubscribed).toBe(false)
      expect(controller.isResourceBound()).toBe(false)
      expect(capture.calls).toEqual(['prepare', 'release:testRecording.m4a'])
    })

    it('is idempotent', async () => {
      await controller.setup()
      controller.teardown()
      controller.teardown()

      expect(capture.calls).toEqual(['prepare', 'release:testRecording.m4a'])
    })

    it('releases a recorder that finishes preparing after teardown', async () => {
      capture.deferPrepare = true
      const pending = controller.setup()
      // Let configure() settle so prepare() is in flight
      await Promise.resolve()
      await Promise.resolve()

      controller.teardown()
      capture.finishPrepare()
      await pending

      expect(controller.isResourceBound()).toBe(false)
      expect(capture.calls).toEqual(['prepare', 'release:late.m4a'])
    })

    it('allows setting up again after teardown', async () => {
      await controller.setup()
      controller.teardown()
      await controller.setup()

      expect(interruptions.subscribeCount).toBe(2)
      expect(controller.isResourceBound()).toBe(true)
    })

    it('stops delivering interruptions after teardown', async () => {
      await controller.setup()
      controller.startRecording()
      controller.teardown()
      interruptions.emit(BEGAN)

      expect(controller.getState()).toBe('recording')
      expect(messages()).toEqual(['Recording started'])
    })
  })

  describe('commands', () => {
    beforeEach(async () => {
      await controller.setup()
      capture.calls = []
    })

    it('starts recording', () => {
      controller.startRecording()

      expect(controller.getState()).toBe('recording')
      expect(capture.calls).toEqual(['start'])
      expect(messages()).toEqual(['Recording started'])
    })

    it('re-issues start when already recording', () => {
      controller.startRecording()
      controller.startRecording()

      expect(controller.getState()).toBe('recording')
      expect(capture.calls).toEqual(['start', 'start'])
      expect(messages()).toEqual(['Recording started', 'Recording started'])
    })

    it('pauses a recording', () => {
      controller.startRecording()
      controller.pauseRecording()

      expect(controller.getState()).toBe('pausedByUser')
      expect(controller.isPausedByInterruption()).toBe(false)
      expect(capture.calls).toEqual(['start', 'pause'])
    })

    it('logs a repeated pause without commanding the recorder again', () => {
      controller.startRecording()
      controller.pauseRecording()
      controller.pauseRecording()

      expect(controller.getState()).toBe('pausedByUser')
      expect(capture.calls).toEqual(['start', 'pause'])
      expect(messages()).toEqual(['Recording started', 'Recording paused', 'Recording paused'])
    })

    it('logs a pause while idle without changing state', () => {
      controller.pauseRecording()

      expect(controller.getState()).toBe('idle')
      expect(capture.calls).toEqual([])
      expect(messages()).toEqual(['Recording paused'])
    })

    it('stops from any state', () => {
      controller.startRecording()
      controller.pauseRecording()
      controller.stopRecording()

      expect(controller.getState()).toBe('stopped')
      expect(capture.calls).toEqual(['start', 'pause', 'stop'])
      expect(messages()).toEqual(['Recording started', 'Recording paused', 'Recording stopped'])
    })

    it('restarts after a stop', () => {
      controller.startRecording()
      controller.stopRecording()
      controller.startRecording()

      expect(controller.getState()).toBe('recording')
      expect(capture.calls).toEqual(['start', 'stop', 'start'])
    })

    it('logs a failing capture command and still transitions', () => {
      capture.commandError = new Error('InvalidStateError')

      controller.startRecording()

      expect(controller.getState()).toBe('recording')
      expect(messages()).toEqual(['Failed to start recording: InvalidStateError', 'Recording started'])
    })

    it('stamps entries with the clock and numbers them in order', () => {
      controller.startRecording()
      controller.stopRecording()

      expect(controller.getLog()).toEqual([
        { id: 1, timestamp: 1_000, level: 'info', message: 'Recording started' },
        { id: 2, timestamp: 1_000, level: 'info', message: 'Recording stopped' },
      ])
    })

    it('notifies subscribers on every entry', () => {
      const listener = vi.fn()
      const unsubscribe = controller.subscribe(listener)

      controller.startRecording()
      controller.pauseRecording()
      unsubscribe()
      controller.stopRecording()

      expect(listener).toHaveBeenCalledTimes(2)
    })
  })

  describe('resumeRecording', () => {
    beforeEach(async () => {
      await controller.setup()
      capture.calls = []
    })

    it('does nothing after a user pause', () => {
      controller.startRecording()
      controller.pauseRecording()
      controller.resumeRecording()

      expect(controller.getState()).toBe('pausedByUser')
      expect(messages()).toEqual(['Recording started', 'Recording paused'])
      expect(capture.calls).toEqual(['start', 'pause'])
    })

    it('does nothing while idle', () => {
      controller.resumeRecording()

      expect(controller.getState()).toBe('idle')
      expect(controller.getLog()).toEqual([])
    })

    it('restarts after an interruption pause', () => {
      controller.startRecording()
      interruptions.emit(BEGAN)
      controller.resumeRecording()

      expect(controller.getState()).toBe('recording')
      expect(messages()).toEqual([
        'Recording started',
        'Interruption began',
        'Recording started',
        'Recording resumed',
      ])
    })
  })

  describe('interruptions', () => {
    beforeEach(async () => {
      await controller.setup()
      capture.calls = []
    })

    it('pauses a recording when an interruption begins', () => {
      controller.startRecording()
      interruptions.emit(BEGAN)

      expect(controller.getState()).toBe('pausedByInterruption')
      expect(controller.isPausedByInterruption()).toBe(true)
      expect(capture.calls).toEqual(['start', 'pause'])
      expect(messages()).toEqual(['Recording started', 'Interruption began'])
    })

    it('resumes when the interruption ends with resumption advised', () => {
      controller.startRecording()
      interruptions.emit(BEGAN)
      interruptions.emit(ENDED_RESUME)

      expect(controller.getState()).toBe('recording')
      expect(capture.calls).toEqual(['start', 'pause', 'start'])
      expect(messages()).toEqual([
        'Recording started',
        'Interruption began',
        'Recording started',
        'Recording resumed',
        'Interruption ended',
      ])
    })

    it('stays paused when resumption is not advised', () => {
      controller.startRecording()
      interruptions.emit(BEGAN)
      interruptions.emit(ENDED_NO_RESUME)

      expect(controller.getState()).toBe('pausedByInterruption')
      expect(messages()).toEqual(['Recording started', 'Interruption began', 'Interruption ended'])
    })

    it('treats an ended payload without options as no resume', () => {
      controller.startRecording()
      interruptions.emit(BEGAN)
      interruptions.emit({ type: 'ended' })

      expect(controller.getState()).toBe('pausedByInterruption')
    })

    it('keeps a user pause when an interruption comes and goes', () => {
      controller.startRecording()
      controller.pauseRecording()
      interruptions.emit(BEGAN)
      interruptions.emit(ENDED_RESUME)

      expect(controller.getState()).toBe('pausedByUser')
      expect(capture.calls).toEqual(['start', 'pause'])
      expect(messages()).toEqual([
        'Recording started',
        'Recording paused',
        'Interruption began',
        'Interruption ended',
      ])
    })

    it('does not enter pausedByInterruption from idle or stopped', () => {
      interruptions.emit(BEGAN)
      expect(controller.getState()).toBe('idle')

      controller.stopRecording()
      interruptions.emit(BEGAN)
      expect(controller.getState()).toBe('stopped')
      expect(capture.calls).toEqual(['stop'])
    })

    it('turns an interruption pause into a user pause', () => {
      controller.startRecording()
      interruptions.emit(BEGAN)
      controller.pauseRecording()
      interruptions.emit(ENDED_RESUME)

      expect(controller.getState()).toBe('pausedByUser')
      expect(capture.calls).toEqual(['start', 'pause'])
    })

    it('logs malformed payloads as errors and keeps state', () => {
      controller.startRecording()
      interruptions.emit(null)
      interruptions.emit({ type: 'paused' })
      interruptions.emit('began')

      expect(controller.getState()).toBe('recording')
      expect(controller.getLog().slice(1)).toEqual([
        { id: 2, timestamp: 1_000, level: 'error', message: LOG_MESSAGES.malformedInterruption },
        { id: 3, timestamp: 1_000, level: 'error', message: LOG_MESSAGES.malformedInterruption },
        { id: 4, timestamp: 1_000, level: 'error', message: LOG_MESSAGES.malformedInterruption },
      ])
    })
  })

  describe('without a bound recorder', () => {
    it('stops from idle with only a log entry', () => {
      controller.stopRecording()

      expect(controller.getState()).toBe('stopped')
      expect(messages()).toEqual(['Recording stopped'])
      expect(capture.calls).toEqual([])
    })

    it('runs every command as log-only after a failed setup', async () => {
      capture.prepareError = new ResourcePreparationError('No microphone found.')
      await controller.setup()

      controller.startRecording()
      controller.pauseRecording()
      controller.stopRecording()

      expect(controller.getState()).toBe('stopped')
      expect(capture.calls).toEqual(['prepare'])
      expect(messages()).toEqual([
        'Audio recorder setup failed: No microphone found.',
        'Recording started',
        'Recording paused',
        'Recording stopped',
      ])
    })
  })

  describe('console echo', () => {
    it('mirrors entries to the console when enabled', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})
      controller = new RecordingController({
        session,
        capture,
        interruptions,
        config: { echoToConsole: true },
      })

      controller.startRecording()

      expect(log).toHaveBeenCalledWith('Recording started')
    })

    it('stays quiet when disabled', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})

      controller.startRecording()

      expect(log).not.toHaveBeenCalled()
    })
  })

  describe('replay against the transition table', () => {
    type Step = 'start' | 'pause' | 'stop' | 'resume' | 'began' | 'endedResume' | 'endedNoResume'

    const EVENTS: Record<Step, RecorderEvent> = {
      start: { type: 'START' },
      pause: { type: 'PAUSE' },
      stop: { type: 'STOP' },
      resume: { type: 'RESUME' },
      began: { type: 'INTERRUPTION_BEGAN' },
      endedResume: { type: 'INTERRUPTION_ENDED', shouldResume: true },
      endedNoResume: { type: 'INTERRUPTION_ENDED', shouldResume: false },
    }

    const run = (step: Step) => {
      switch (step) {
        case 'start':
          return controller.startRecording()
        case 'pause':
          return controller.pauseRecording()
        case 'stop':
          return controller.stopRecording()
        case 'resume':
          return controller.resumeRecording()
        case 'began':
          return interruptions.emit(BEGAN)
        case 'endedResume':
          return interruptions.emit(ENDED_RESUME)
        case 'endedNoResume':
          return interruptions.emit(ENDED_NO_RESUME)
      }
    }

    const sequences: Step[][] = [
      ['start', 'pause', 'resume'],
      ['start', 'began', 'endedResume', 'pause', 'stop'],
      ['began', 'start', 'began', 'endedNoResume', 'resume'],
      ['stop', 'pause', 'began', 'start', 'start'],
      ['start', 'began', 'pause', 'endedResume', 'start', 'began', 'stop', 'endedResume'],
      ['pause', 'resume', 'endedResume', 'start', 'began', 'began', 'endedResume'],
    ]

    for (const steps of sequences) {
      it(`matches the reducer for ${steps.join(' > ')}`, async () => {
        await controller.setup()
        let userActions = 0

        for (const step of steps) {
          const before = controller.getLog().length
          run(step)
          if (step !== 'resume') {
            userActions++
            expect(controller.getLog().length).toBeGreaterThan(before)
          }
        }

        const expected = replayEvents(steps.map((step) => EVENTS[step]))
        expect(controller.getState()).toBe(expected.status)
        expect(controller.isPausedByInterruption()).toBe(expected.pausedByInterruption)
        expect(controller.getLog().length).toBeGreaterThanOrEqual(userActions)
      })
    }
  })
})
