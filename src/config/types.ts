export type SessionCategory = 'playAndRecord' | 'playback' | 'ambient'

export type SessionMode = 'default'

export interface AudioSessionOptions {
  category: SessionCategory
  mode: SessionMode
}

export type EncodingFormat = 'aac' | 'opus'

export type EncodingQuality = 'min' | 'low' | 'medium' | 'high' | 'max'

export interface EncodingConfig {
  format: EncodingFormat
  sampleRate: number
  channelCount: number
  quality: EncodingQuality
}

export interface RecordingDestination {
  /** Name given to the finished recording file */
  fileName: string
}

export interface RecorderConfig {
  session: AudioSessionOptions
  encoding: EncodingConfig
  destination: RecordingDestination
  /** How often the capture service flushes encoded chunks */
  captureTimesliceMs: number
  /** Mirror every log entry to the browser console */
  echoToConsole: boolean
}

export interface RecorderConfigOverrides {
  session?: Partial<AudioSessionOptions>
  encoding?: Partial<EncodingConfig>
  destination?: Partial<RecordingDestination>
  captureTimesliceMs?: number
  echoToConsole?: boolean
}
