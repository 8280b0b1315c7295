// ─────────────────────────────────────────────────────────────────────────────
// Recorder Errors
// ─────────────────────────────────────────────────────────────────────────────

/** The audio session rejected its category or mode */
export class SessionConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SessionConfigurationError'
  }
}

/** The capture service could not open the microphone or create a recorder */
export class ResourcePreparationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ResourcePreparationError'
  }
}

/** An interruption notification was missing its type or carried an unknown one */
export class MalformedInterruptionPayloadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedInterruptionPayloadError'
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
