/**
 * Timing helpers: abortable sleep and a fixed-interval, bounded poll loop.
 *
 * The client itself never retries; `pollUntil` is only used by sandbox helpers
 * that wait for node-side progress.
 */

export class AbortError extends Error {
  constructor(message = 'Operation aborted', options?: ErrorOptions) {
    super(message, options)
    this.name = 'AbortError'
  }
}

/** Abortable sleep */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortError())
  if (ms <= 0) return Promise.resolve()
  return new Promise((resolve, reject) => {
    const t = setTimeout(done, ms)
    function done() {
      cleanup()
      resolve()
    }
    function onAbort() {
      cleanup()
      reject(new AbortError())
    }
    function cleanup() {
      clearTimeout(t)
      signal?.removeEventListener('abort', onAbort)
    }
    signal?.addEventListener('abort', onAbort)
  })
}

export function isAbortLike(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError'
}

export interface PollOptions {
  /** Delay between attempts (ms). No backoff. */
  intervalMs: number
  /** Total number of check calls before giving up. */
  maxAttempts: number
  signal?: AbortSignal
  /** Called after every attempt that did not satisfy the predicate. */
  onAttempt?: (info: { attempt: number; value?: unknown; error?: unknown }) => void
}

export type PollOutcome<T> =
  | { done: true; value: T; attempts: number }
  | { done: false; attempts: number; last?: T; lastError?: unknown }

/**
 * Call `check` until `isDone(value)` holds or the attempt budget runs out.
 * A check that throws counts as a failed attempt. Once `signal` has fired,
 * the loop rejects with an AbortError (the failed check as its cause),
 * whatever attempt it was on.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<T>,
  isDone: (value: T) => boolean,
  opts: PollOptions
): Promise<PollOutcome<T>> {
  let last: T | undefined
  let lastError: unknown

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    if (opts.signal?.aborted) throw new AbortError()
    try {
      const value = await check(attempt)
      if (isDone(value)) return { done: true, value, attempts: attempt }
      last = value
      lastError = undefined
      opts.onAttempt?.({ attempt, value })
    } catch (err) {
      if (isAbortLike(err)) throw err
      if (opts.signal?.aborted) throw new AbortError(undefined, { cause: err })
      lastError = err
      opts.onAttempt?.({ attempt, error: err })
    }
    if (attempt < opts.maxAttempts) await sleep(opts.intervalMs, opts.signal)
  }

  return { done: false, attempts: opts.maxAttempts, last, lastError }
}
