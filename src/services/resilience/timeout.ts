/**
 * Timeout wrapper for candidate lookups
 * @module services/resilience/timeout
 */

import { LookupTimeoutError } from '../lookup-error.js'

type TimerId = ReturnType<typeof setTimeout>

/**
 * Options for the timeout wrapper
 */
export interface TimeoutOptions {
  /** Timeout duration in milliseconds */
  timeoutMs: number

  /** Source name for error messages */
  sourceName?: string

  /** Abort signal for external cancellation */
  signal?: AbortSignal
}

/**
 * Wraps a promise with a timeout
 *
 * @throws LookupTimeoutError if the timeout is exceeded or the signal aborts
 *
 * @example
 * ```typescript
 * const candidates = await withTimeout(
 *   source.getCandidates('isbn', '9780306406157'),
 *   { timeoutMs: 5000, sourceName: source.name }
 * )
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const { timeoutMs, sourceName = 'unknown', signal } = options

  if (timeoutMs <= 0) {
    throw new Error('Timeout must be a positive number')
  }

  if (signal?.aborted) {
    throw new LookupTimeoutError(sourceName, 0, { reason: 'Lookup was aborted before starting' })
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false
    let timeoutId: TimerId | undefined

    const cleanup = () => {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId)
      }
      signal?.removeEventListener('abort', onAbort)
    }

    const settle = (action: () => void) => {
      if (settled) return
      settled = true
      cleanup()
      action()
    }

    const onAbort = () => {
      settle(() => reject(new LookupTimeoutError(sourceName, timeoutMs, { reason: 'Lookup was aborted' })))
    }

    timeoutId = setTimeout(() => {
      settle(() => reject(new LookupTimeoutError(sourceName, timeoutMs)))
    }, timeoutMs)

    signal?.addEventListener('abort', onAbort)

    promise.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error)),
    )
  })
}
