import type { RecordingState } from '../../domain/types'

interface RecorderControlsProps {
  state: RecordingState
  onStart: () => void
  onPause: () => void
  onStop: () => void
}

export function RecorderControls({ state, onStart, onPause, onStop }: RecorderControlsProps) {
  const isRecording = state === 'recording'

  // All three stay enabled: every press is forwarded and logged
  return (
    <div className="flex flex-col gap-3">
      <button
        onClick={onStart}
        className={`w-full cursor-pointer rounded-full py-3 text-base font-semibold shadow-lg ring-4 transition-all ${
          isRecording
            ? 'bg-gradient-to-b from-red-600 to-red-700 text-white ring-red-900/50 hover:ring-red-800/50'
            : 'bg-gradient-to-b from-amber-500 to-orange-600 text-stone-950 ring-amber-900/50 hover:ring-amber-800/50'
        }`}
      >
        Start Recording
      </button>

      <button
        onClick={onPause}
        className="w-full cursor-pointer rounded-full border border-stone-700 py-3 text-base font-medium text-stone-200 transition-colors hover:border-amber-700 hover:text-amber-100"
      >
        Pause Recording
      </button>

      <button
        onClick={onStop}
        className="w-full cursor-pointer rounded-full py-3 text-base font-medium text-stone-400 transition-colors hover:text-stone-200"
      >
        Stop Recording
      </button>
    </div>
  )
}
