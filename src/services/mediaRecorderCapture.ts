import type { AudioCaptureService, InterruptionListener, InterruptionSource } from '../domain/types'
import type {
  EncodingConfig,
  EncodingFormat,
  EncodingQuality,
  RecordingDestination,
} from '../config'
import { ResourcePreparationError, describeError } from './errors'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

// Preferred MIME types per format, in order of preference
const MIME_TYPES: Record<EncodingFormat, string[]> = {
  aac: [
    'audio/mp4;codecs=mp4a.40.2',
    'audio/mp4',
    'audio/aac',
    'audio/webm;codecs=opus',
    'audio/webm',
  ],
  opus: ['audio/webm;codecs=opus', 'audio/ogg;codecs=opus', 'audio/webm', 'audio/mp4'],
}

// Per-channel bit rate for each quality level
const BITS_PER_SECOND: Record<EncodingQuality, number> = {
  min: 16_000,
  low: 24_000,
  medium: 32_000,
  high: 48_000,
  max: 64_000,
}

const DEFAULT_TIMESLICE_MS = 100

export function getSupportedMimeType(format: EncodingFormat): string {
  for (const mimeType of MIME_TYPES[format]) {
    if (MediaRecorder.isTypeSupported(mimeType)) {
      return mimeType
    }
  }
  // Fallback to default (browser will choose)
  return ''
}

export function getAudioBitsPerSecond({ quality, channelCount }: EncodingConfig): number {
  return BITS_PER_SECOND[quality] * channelCount
}

export function describeMicrophoneError(err: unknown): string {
  if (err instanceof DOMException) {
    if (err.name === 'NotAllowedError' || err.name === 'PermissionDeniedError') {
      return 'Microphone access was denied. Please allow microphone access and try again.'
    }
    if (err.name === 'NotFoundError') {
      return 'No microphone found. Please connect a microphone and try again.'
    }
    return `Could not access microphone: ${err.message}`
  }
  return 'Could not access microphone. Please check your browser settings.'
}

// ─────────────────────────────────────────────────────────────────────────────
// Handle
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A prepared recorder bound to one microphone stream. Each take (start after
 * an inactive state) is collected into `file`, replacing the previous one.
 */
export class MediaRecorderHandle {
  /** The last finished take */
  file: File | null = null
  private chunks: Blob[] = []
  private readonly detachTrack: () => void

  constructor(
    readonly stream: MediaStream,
    readonly recorder: MediaRecorder,
    readonly fileName: string,
    onInterruption: InterruptionListener
  ) {
    recorder.ondataavailable = (event) => {
      if (event.data.size > 0) {
        this.chunks.push(event.data)
      }
    }

    recorder.onstop = () => {
      this.file = new File(this.chunks, fileName, { type: recorder.mimeType || 'audio/mp4' })
      this.chunks = []
    }

    // The OS mutes the microphone track while another client holds the input
    const [track] = stream.getAudioTracks()
    if (track) {
      const onMute = () => onInterruption({ type: 'began' })
      const onUnmute = () => onInterruption({ type: 'ended', options: { shouldResume: true } })
      track.addEventListener('mute', onMute)
      track.addEventListener('unmute', onUnmute)
      this.detachTrack = () => {
        track.removeEventListener('mute', onMute)
        track.removeEventListener('unmute', onUnmute)
      }
    } else {
      this.detachTrack = () => {}
    }
  }

  beginTake(): void {
    this.chunks = []
  }

  dispose(): void {
    this.detachTrack()
    if (this.recorder.state !== 'inactive') {
      this.recorder.stop()
    }
    // Release microphone
    this.stream.getTracks().forEach((track) => track.stop())
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Service
// ─────────────────────────────────────────────────────────────────────────────

export interface MediaRecorderCaptureOptions {
  /** How often MediaRecorder flushes encoded data */
  timesliceMs?: number
}

/**
 * Records with `getUserMedia` and `MediaRecorder`. Also acts as an
 * interruption source, fed by mute/unmute events of the microphone track.
 */
export class MediaRecorderCaptureService
  implements AudioCaptureService<MediaRecorderHandle>, InterruptionSource
{
  private readonly timesliceMs: number
  private readonly listeners = new Set<InterruptionListener>()

  constructor({ timesliceMs = DEFAULT_TIMESLICE_MS }: MediaRecorderCaptureOptions = {}) {
    this.timesliceMs = timesliceMs
  }

  async prepare(
    destination: RecordingDestination,
    encoding: EncodingConfig
  ): Promise<MediaRecorderHandle> {
    if (typeof navigator === 'undefined' || !('mediaDevices' in navigator)) {
      throw new ResourcePreparationError('Microphone capture is not supported in this browser.')
    }

    let stream: MediaStream
    try {
      stream = await navigator.mediaDevices.getUserMedia({
        audio: {
          sampleRate: encoding.sampleRate,
          channelCount: encoding.channelCount,
        },
      })
    } catch (err) {
      throw new ResourcePreparationError(describeMicrophoneError(err), { cause: err })
    }

    const mimeType = getSupportedMimeType(encoding.format)
    let recorder: MediaRecorder
    try {
      recorder = new MediaRecorder(stream, {
        ...(mimeType ? { mimeType } : {}),
        audioBitsPerSecond: getAudioBitsPerSecond(encoding),
      })
    } catch (err) {
      stream.getTracks().forEach((track) => track.stop())
      throw new ResourcePreparationError(`Could not create audio recorder: ${describeError(err)}`, {
        cause: err,
      })
    }

    return new MediaRecorderHandle(stream, recorder, destination.fileName, (payload) =>
      this.emit(payload)
    )
  }

  start(handle: MediaRecorderHandle): void {
    switch (handle.recorder.state) {
      case 'inactive':
        handle.beginTake()
        handle.recorder.start(this.timesliceMs)
        break
      case 'paused':
        handle.recorder.resume()
        break
      case 'recording':
        break
    }
  }

  pause(handle: MediaRecorderHandle): void {
    if (handle.recorder.state === 'recording') {
      handle.recorder.pause()
    }
  }

  stop(handle: MediaRecorderHandle): void {
    if (handle.recorder.state !== 'inactive') {
      handle.recorder.stop()
    }
  }

  release(handle: MediaRecorderHandle): void {
    handle.dispose()
  }

  subscribe(listener: InterruptionListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private emit(payload: unknown): void {
    this.listeners.forEach((listener) => listener(payload))
  }
}
