import { resolveConfig, type RecorderConfigOverrides } from '../config'
import { RecordingController } from './recordingController'
import {
  AudioSessionInterruptionSource,
  BrowserAudioSession,
  getPlatformAudioSession,
} from './audioSession'
import { MediaRecorderCaptureService, type MediaRecorderHandle } from './mediaRecorderCapture'

/**
 * Wire a controller to the browser's audio facilities. Interruptions come from
 * the Audio Session API where the browser has it, and from microphone track
 * mute/unmute events otherwise.
 */
export function createBrowserRecorder(
  overrides: RecorderConfigOverrides = {}
): RecordingController<MediaRecorderHandle> {
  const config = resolveConfig(overrides)
  const platformSession = getPlatformAudioSession()
  const capture = new MediaRecorderCaptureService({ timesliceMs: config.captureTimesliceMs })

  return new RecordingController({
    session: new BrowserAudioSession(platformSession),
    capture,
    interruptions: platformSession ? new AudioSessionInterruptionSource(platformSession) : capture,
    config,
  })
}
