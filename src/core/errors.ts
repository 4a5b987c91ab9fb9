/**
 * Crawler error taxonomy.
 *
 * Fetch errors are transient and retried inside the fetcher. StoreUnavailable
 * fails one source. ConfigurationError stops the process before any source runs.
 * ExtractionMismatch is a value, not a thrown error (see extractor.ts).
 */

export class CrawlerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'CrawlerError'
  }
}

export class FetchTimeout extends CrawlerError {
  constructor(
    public readonly url: string,
    timeoutMs: number
  ) {
    super(`Page not ready within ${timeoutMs}ms: ${url}`, 'FETCH_TIMEOUT', { url, timeoutMs })
    this.name = 'FetchTimeout'
  }
}

export class FetchHTTPError extends CrawlerError {
  constructor(
    public readonly url: string,
    public readonly status: number
  ) {
    super(`HTTP ${status}: ${url}`, 'FETCH_HTTP_ERROR', { url, status })
    this.name = 'FetchHTTPError'
  }

  /** 5xx responses are worth another attempt; 4xx are not */
  get transient(): boolean {
    return this.status >= 500
  }
}

export class FetchTransportError extends CrawlerError {
  constructor(
    public readonly url: string,
    cause: string
  ) {
    super(`Transport failure for ${url}: ${cause}`, 'FETCH_TRANSPORT_ERROR', { url, cause })
    this.name = 'FetchTransportError'
  }
}

export type FetchError = FetchTimeout | FetchHTTPError | FetchTransportError

export function isFetchError(err: unknown): err is FetchError {
  return (
    err instanceof FetchTimeout ||
    err instanceof FetchHTTPError ||
    err instanceof FetchTransportError
  )
}

export class StoreUnavailable extends CrawlerError {
  constructor(
    message: string,
    public readonly inserted = 0,
    public readonly updated = 0
  ) {
    super(message, 'STORE_UNAVAILABLE', { inserted, updated })
    this.name = 'StoreUnavailable'
  }
}

export class ConfigurationError extends CrawlerError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'CONFIGURATION_ERROR', { issues })
    this.name = 'ConfigurationError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
