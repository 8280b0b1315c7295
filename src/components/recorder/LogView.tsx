import { useEffect, useRef } from 'react'
import type { LogEntry } from '../../domain/types'
import { formatTimestamp } from '../../services/logStream'

interface LogViewProps {
  entries: readonly LogEntry[]
}

export function LogView({ entries }: LogViewProps) {
  const scrollRef = useRef<HTMLDivElement | null>(null)

  // Keep the latest entry in view
  useEffect(() => {
    const container = scrollRef.current
    if (container) {
      container.scrollTop = container.scrollHeight
    }
  }, [entries])

  return (
    <div
      ref={scrollRef}
      role="log"
      aria-live="polite"
      className="mb-6 h-72 overflow-y-auto rounded-xl border border-stone-800 bg-stone-950/60 p-3 font-mono text-xs sm:text-sm"
    >
      {entries.length === 0 ? (
        <p className="text-stone-600">No events yet</p>
      ) : (
        entries.map((entry) => (
          <p
            key={entry.id}
            className={entry.level === 'error' ? 'text-red-400' : 'text-stone-300'}
          >
            <span className="mr-2 text-stone-600 tabular-nums">
              {formatTimestamp(entry.timestamp)}
            </span>
            {entry.message}
          </p>
        ))
      )}
    </div>
  )
}
