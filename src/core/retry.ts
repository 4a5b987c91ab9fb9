/**
 * Bounded retry with linear backoff, shared by the page fetcher and the
 * store writer.
 */

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = ms => new Promise(r => setTimeout(r, ms))

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number
  /** Delay before attempt n+1 is `backoffMs * n` */
  backoffMs: number
}

export interface RetryOptions extends RetryPolicy {
  label: string
  isRetryable: (err: unknown) => boolean
  sleep?: Sleep
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxAttempts, backoffMs, label, isRetryable } = options
  const wait = options.sleep ?? sleep
  const attempts = Math.max(1, maxAttempts)

  let lastError: unknown = null

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt)
    } catch (err) {
      lastError = err
      if (!isRetryable(err) || attempt === attempts) break

      const delay = backoffMs * attempt
      const msg = err instanceof Error ? err.message : String(err)
      console.warn(`[retry] ${label} failed (${attempt}/${attempts}): ${msg}, retrying in ${delay}ms...`)
      await wait(delay)
    }
  }

  throw lastError
}
