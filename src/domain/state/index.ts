export { RecorderProvider, useRecorder, useRecordingState, useRecorderLog } from './RecorderContext'
export {
  recorderReducer,
  replayEvents,
  isPausable,
  initialRecorderState,
  type RecorderMachineState,
  type RecorderEvent,
} from './recorderMachine'
