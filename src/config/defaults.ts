import type { RecorderConfig, RecorderConfigOverrides } from './types'

export const defaultConfig: RecorderConfig = {
  session: {
    category: 'playAndRecord',
    mode: 'default',
  },
  encoding: {
    format: 'aac',
    sampleRate: 12_000,
    channelCount: 1,
    quality: 'high',
  },
  destination: {
    fileName: 'testRecording.m4a',
  },
  captureTimesliceMs: 100,
  echoToConsole: import.meta.env.DEV,
}

/**
 * Apply overrides on top of a base config. Nested sections are merged
 * key by key, so `{ encoding: { sampleRate: 44_100 } }` keeps the format.
 */
export function resolveConfig(
  overrides: RecorderConfigOverrides = {},
  base: RecorderConfig = defaultConfig
): RecorderConfig {
  return {
    session: { ...base.session, ...overrides.session },
    encoding: { ...base.encoding, ...overrides.encoding },
    destination: { ...base.destination, ...overrides.destination },
    captureTimesliceMs: overrides.captureTimesliceMs ?? base.captureTimesliceMs,
    echoToConsole: overrides.echoToConsole ?? base.echoToConsole,
  }
}
