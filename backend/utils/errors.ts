// backend/utils/errors.ts

/**
 * Raised when the run cannot start at all: missing credentials, a rejected
 * login or an unreadable symbol master. Nothing else should stop the process.
 */
export class FatalStartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FatalStartupError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
