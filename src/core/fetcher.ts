/**
 * Page fetcher. Renders one listing page through a browser session and
 * returns it as a RawPage.
 *
 * Timeouts, transport failures and 5xx responses are retried; 4xx are not.
 */

import type { RawPage } from '../schema/deal.js'
import type { BrowserSession, NavigationResult, WaitCondition } from './browser.js'
import {
  FetchHTTPError,
  FetchTransportError,
  errorMessage,
  isFetchError,
} from './errors.js'
import { withRetry, type Sleep } from './retry.js'

export interface FetchOptions {
  timeoutMs: number
  waitFor: WaitCondition
  /** Extra wait after readiness, for late client-side rendering */
  settleMs: number
  maxAttempts: number
  backoffMs: number
}

export const DEFAULT_FETCH_OPTIONS: FetchOptions = {
  timeoutMs: 60_000,
  waitFor: 'domcontentloaded',
  settleMs: 2_000,
  maxAttempts: 3,
  backoffMs: 2_000,
}

export function isTransientFetchError(err: unknown): boolean {
  if (err instanceof FetchHTTPError) return err.transient
  return isFetchError(err)
}

export class PageFetcher {
  constructor(
    private readonly session: BrowserSession,
    private readonly now: () => Date = () => new Date(),
    private readonly wait?: Sleep
  ) {}

  async fetch(sourceId: string, url: string, options: FetchOptions): Promise<RawPage> {
    return withRetry(() => this.attempt(sourceId, url, options), {
      label: `[${sourceId}] ${url}`,
      maxAttempts: options.maxAttempts,
      backoffMs: options.backoffMs,
      isRetryable: isTransientFetchError,
      sleep: this.wait,
    })
  }

  private async attempt(sourceId: string, url: string, options: FetchOptions): Promise<RawPage> {
    let result: NavigationResult
    try {
      result = await this.session.navigate(url, options.waitFor, options.timeoutMs, options.settleMs)
    } catch (err) {
      if (isFetchError(err)) throw err
      throw new FetchTransportError(url, errorMessage(err))
    }

    if (result.status >= 400) throw new FetchHTTPError(url, result.status)

    return {
      sourceId,
      url,
      markup: result.markup,
      status: result.status,
      fetchedAt: this.now().toISOString(),
    }
  }
}
