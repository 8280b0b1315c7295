import type { RecordingState } from '../../domain/types'

const STATE_LABELS: Record<RecordingState, string> = {
  idle: 'Ready',
  recording: 'Recording',
  pausedByUser: 'Paused',
  pausedByInterruption: 'Interrupted',
  stopped: 'Stopped',
}

const STATE_DOT_CLASSES: Record<RecordingState, string> = {
  idle: 'bg-stone-600',
  recording: 'animate-pulse bg-red-500',
  pausedByUser: 'bg-amber-500',
  pausedByInterruption: 'animate-pulse bg-orange-500',
  stopped: 'bg-blue-500',
}

interface RecorderHeaderProps {
  state: RecordingState
  entryCount: number
}

export function RecorderHeader({ state, entryCount }: RecorderHeaderProps) {
  return (
    <div className="mb-3 flex items-center gap-2 sm:mb-4">
      <div
        className={`h-2 w-2 shrink-0 rounded-full transition-colors ${STATE_DOT_CLASSES[state]}`}
      />
      <h2 className="text-sm font-semibold uppercase tracking-wider text-stone-400">
        {STATE_LABELS[state]}
      </h2>
      <span className="ml-auto text-xs text-stone-500 tabular-nums">
        {entryCount} {entryCount === 1 ? 'event' : 'events'}
      </span>
    </div>
  )
}
