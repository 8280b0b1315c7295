import { useRecorder, useRecorderLog, useRecordingState } from '../../domain/state'
import { RecorderHeader } from './RecorderHeader'
import { LogView } from './LogView'
import { RecorderControls } from './RecorderControls'
import { HelpSection } from './HelpSection'

export function RecorderCard() {
  const recorder = useRecorder()
  const state = useRecordingState()
  const entries = useRecorderLog()

  return (
    <div className="rounded-2xl border border-stone-800 bg-gradient-to-b from-stone-900 to-stone-900/50 p-4 shadow-xl shadow-black/20 sm:p-6">
      <RecorderHeader state={state} entryCount={entries.length} />

      <LogView entries={entries} />

      <RecorderControls
        state={state}
        onStart={() => recorder.startRecording()}
        onPause={() => recorder.pauseRecording()}
        onStop={() => recorder.stopRecording()}
      />

      <HelpSection />
    </div>
  )
}
