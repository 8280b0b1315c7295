/**
 * Audio Session Service
 *
 * Wraps the Audio Session API (`navigator.audioSession`, shipped in Safari on
 * iOS and macOS) to claim the microphone for play-and-record and to observe
 * interruptions from other audio clients, such as a phone call.
 */

import type { AudioSession, InterruptionListener, InterruptionSource } from '../domain/types'
import type { AudioSessionOptions, SessionCategory } from '../config'
import { SessionConfigurationError, describeError } from './errors'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type PlatformAudioSessionType =
  | 'auto'
  | 'playback'
  | 'transient'
  | 'transient-solo'
  | 'ambient'
  | 'play-and-record'

/** The slice of `navigator.audioSession` this app relies on */
export interface PlatformAudioSession extends EventTarget {
  type: string
  readonly state: string
}

const SESSION_TYPES: Record<SessionCategory, PlatformAudioSessionType> = {
  playAndRecord: 'play-and-record',
  playback: 'playback',
  ambient: 'ambient',
}

// ─────────────────────────────────────────────────────────────────────────────
// Feature Detection
// ─────────────────────────────────────────────────────────────────────────────

function isPlatformAudioSession(value: unknown): value is PlatformAudioSession {
  return (
    value instanceof EventTarget &&
    'type' in value &&
    typeof value.type === 'string' &&
    'state' in value &&
    typeof value.state === 'string'
  )
}

export function getPlatformAudioSession(): PlatformAudioSession | null {
  if (typeof navigator === 'undefined' || !('audioSession' in navigator)) {
    return null
  }
  const session: unknown = navigator.audioSession
  return isPlatformAudioSession(session) ? session : null
}

// ─────────────────────────────────────────────────────────────────────────────
// Session
// ─────────────────────────────────────────────────────────────────────────────

export class BrowserAudioSession implements AudioSession {
  constructor(private readonly platform: PlatformAudioSession | null = getPlatformAudioSession()) {}

  // The web platform has a single session mode, so only the category applies
  async configure({ category }: AudioSessionOptions): Promise<void> {
    if (!this.platform) {
      console.warn('Audio Session API unavailable, using the browser default audio routing')
      return
    }

    const type = SESSION_TYPES[category]
    try {
      this.platform.type = type
    } catch (err) {
      throw new SessionConfigurationError(
        `Could not set audio session type "${type}": ${describeError(err)}`,
        { cause: err }
      )
    }

    if (this.platform.type !== type) {
      throw new SessionConfigurationError(`Audio session refused type "${type}"`)
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Interruptions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Emits `began` when the session enters the `interrupted` state and `ended`
 * when it leaves it. Leaving the interrupted state means the platform handed
 * the microphone back, so resuming is always advised.
 */
export class AudioSessionInterruptionSource implements InterruptionSource {
  constructor(private readonly platform: PlatformAudioSession) {}

  subscribe(listener: InterruptionListener): () => void {
    let interrupted = this.platform.state === 'interrupted'

    const onStateChange = () => {
      const isInterrupted = this.platform.state === 'interrupted'
      if (isInterrupted === interrupted) return
      interrupted = isInterrupted
      listener(
        isInterrupted ? { type: 'began' } : { type: 'ended', options: { shouldResume: true } }
      )
    }

    this.platform.addEventListener('statechange', onStateChange)
    return () => {
      this.platform.removeEventListener('statechange', onStateChange)
    }
  }
}
