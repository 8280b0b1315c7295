import type { AudioSessionOptions, EncodingConfig, RecordingDestination } from '../../config'

/**
 * Exclusive access to the microphone. Must be configured before the capture
 * service prepares a recorder.
 */
export interface AudioSession {
  configure(options: AudioSessionOptions): Promise<void>
}

/**
 * Platform recorder. `prepare` binds a handle to a destination; the other
 * commands act on that handle and return immediately.
 */
export interface AudioCaptureService<THandle> {
  prepare(destination: RecordingDestination, encoding: EncodingConfig): Promise<THandle>
  start(handle: THandle): void
  pause(handle: THandle): void
  stop(handle: THandle): void
  release(handle: THandle): void
}

/**
 * Raw interruption payloads, delivered as the platform reports them:
 * `{ type: 'began' | 'ended', options?: { shouldResume?: boolean } }`.
 * Listeners must validate what they receive.
 */
export type InterruptionListener = (payload: unknown) => void

export interface InterruptionSource {
  /** Returns the function that removes the listener */
  subscribe(listener: InterruptionListener): () => void
}
