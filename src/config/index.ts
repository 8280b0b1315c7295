export { defaultConfig, resolveConfig } from './defaults'
export type {
  RecorderConfig,
  RecorderConfigOverrides,
  AudioSessionOptions,
  SessionCategory,
  SessionMode,
  EncodingConfig,
  EncodingFormat,
  EncodingQuality,
  RecordingDestination,
} from './types'
