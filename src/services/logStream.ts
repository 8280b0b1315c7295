import type { LogEntry, LogLevel } from '../domain/types'

/**
 * Append-only event log. Every append publishes a new immutable snapshot,
 * so readers (e.g. `useSyncExternalStore`) can compare snapshots by reference.
 */
export class LogStream {
  private entries: readonly LogEntry[] = []
  private listeners = new Set<() => void>()

  constructor(private readonly clock: () => number = Date.now) {}

  append(message: string, level: LogLevel = 'info'): LogEntry {
    const entry: LogEntry = {
      id: this.entries.length + 1,
      timestamp: this.clock(),
      level,
      message,
    }
    this.entries = [...this.entries, entry]
    this.listeners.forEach((listener) => listener())
    return entry
  }

  getEntries(): readonly LogEntry[] {
    return this.entries
  }

  get size(): number {
    return this.entries.length
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Utility: Format a log entry as a display line
// ─────────────────────────────────────────────────────────────────────────────

export function formatTimestamp(timestamp: number): string {
  const date = new Date(timestamp)
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => part.toString().padStart(2, '0'))
    .join(':')
}

export function formatLogEntry(entry: LogEntry): string {
  return `[${formatTimestamp(entry.timestamp)}] ${entry.message}`
}
