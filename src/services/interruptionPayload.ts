import type { InterruptionEvent } from '../domain/types'
import { MalformedInterruptionPayloadError } from './errors'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Validate a raw interruption notification.
 *
 * An `ended` payload without options, or without a `shouldResume` flag,
 * means the platform did not advise resuming.
 */
export function parseInterruptionPayload(payload: unknown): InterruptionEvent {
  if (!isRecord(payload)) {
    throw new MalformedInterruptionPayloadError('Interruption payload is not an object')
  }

  const { type, options } = payload

  if (type === 'began') {
    return { type: 'began' }
  }

  if (type === 'ended') {
    const shouldResume = isRecord(options) && options.shouldResume === true
    return { type: 'ended', shouldResume }
  }

  throw new MalformedInterruptionPayloadError(`Unknown interruption type: ${String(type)}`)
}
