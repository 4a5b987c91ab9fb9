/**
 * Run coordinator. Crawls every configured board with bounded parallelism:
 * load seen-set → fetch page → extract → (post pages) → dedup → write, page
 * by page.
 *
 * Each source ends Completed, Degraded or Failed on its own; one source
 * failing never stops the others, and a RunReport is always produced.
 */

import { randomUUID } from 'node:crypto'
import type {
  BoardSource,
  ComparableField,
  DealCandidate,
  RawPage,
  SeenSet,
  SourceErrorKind,
  SourceReport,
  RunReport,
} from '../schema/deal.js'
import type { AdapterRegistry, BoardAdapter } from '../platforms/index.js'
import type { BrowserLauncher, BrowserSession } from './browser.js'
import { changedFields, countDecisions, filter } from './dedup.js'
import { saveMismatchArtifact } from './debug.js'
import { withPostedAt, type ExtractionMismatch, type PendingPost } from './extractor.js'
import {
  FetchHTTPError,
  FetchTimeout,
  FetchTransportError,
  StoreUnavailable,
  errorMessage,
} from './errors.js'
import { DEFAULT_FETCH_OPTIONS, PageFetcher, type FetchOptions } from './fetcher.js'
import type { RetryPolicy, Sleep } from './retry.js'
import type { DealStore } from './store.js'
import { DEFAULT_STORE_POLICY, StoreWriter } from './store-writer.js'
import { buildRunReport } from './summary.js'

export const DEFAULT_CONCURRENCY = 2
export const MAX_CONCURRENCY = 4

export interface RunCoordinatorOptions {
  adapters: AdapterRegistry
  launcher: BrowserLauncher
  store: DealStore
  /** Page fetch tuning; `waitFor` always comes from the board's adapter */
  fetch?: Partial<Omit<FetchOptions, 'waitFor'>>
  storePolicy?: RetryPolicy
  concurrency?: number
  /** Where mismatch artifacts go; none are written when unset */
  artifactDir?: string
  now?: () => Date
  sleep?: Sleep
}

export interface RunOptions {
  signal?: AbortSignal
}

type QueuedBoard = { board: BoardSource; index: number }

/** Outcome of reading the post pages of one listing page */
interface DetailOutcome {
  resolved: DealCandidate[]
  /** Already stored with the same comparable values; no post page fetched */
  unchanged: number
  skipped: number
  /** Last post page that showed no posted time */
  undated: RawPage | null
  /** Post page the run was cancelled before */
  abortedAt: string | null
}

/** A worker's browser session, launched on first use */
class WorkerSession {
  private session: BrowserSession | null = null

  constructor(private readonly launcher: BrowserLauncher) {}

  async get(): Promise<BrowserSession> {
    if (!this.session) this.session = await this.launcher.launch()
    return this.session
  }

  async close(): Promise<void> {
    const session = this.session
    this.session = null
    if (!session) return
    try {
      await session.close()
    } catch (err) {
      console.warn(`[browser] Failed to close session: ${errorMessage(err)}`)
    }
  }
}

function errorKind(err: unknown): SourceErrorKind {
  if (err instanceof FetchTimeout) return 'FetchTimeout'
  if (err instanceof FetchHTTPError) return 'FetchHTTPError'
  if (err instanceof FetchTransportError) return 'FetchTransportError'
  if (err instanceof StoreUnavailable) return 'StoreUnavailable'
  return 'Unexpected'
}

function errorUrl(err: unknown): string | undefined {
  if (err instanceof FetchTimeout || err instanceof FetchHTTPError || err instanceof FetchTransportError) {
    return err.url
  }
  return undefined
}

function emptyReport(board: BoardSource): SourceReport {
  return {
    sourceId: board.id,
    name: board.name,
    status: 'Completed',
    pagesFetched: 0,
    candidatesFound: 0,
    skippedBlocks: 0,
    newCount: 0,
    updatedCount: 0,
    archivedCount: 0,
    errors: [],
    durationMs: 0,
  }
}

function undatedMismatch(adapter: BoardAdapter, page: RawPage): ExtractionMismatch {
  const selector = adapter.rules.detail?.postedAt.selectors.join(', ') ?? ''
  return {
    kind: 'ExtractionMismatch',
    sourceId: page.sourceId,
    url: page.url,
    selector,
    message: `No post page showed a posted time ("${selector}"); board layout may have changed`,
  }
}

function fail(report: SourceReport, kind: SourceErrorKind, message: string, url?: string): void {
  report.status = 'Failed'
  report.errors.push(url ? { kind, message, url } : { kind, message })
}

export class RunCoordinator {
  private readonly inFlight = new Set<string>()
  private readonly fetchOptions: Omit<FetchOptions, 'waitFor'>
  private readonly writer: StoreWriter
  private readonly concurrency: number
  private readonly now: () => Date

  constructor(private readonly options: RunCoordinatorOptions) {
    this.now = options.now ?? (() => new Date())
    this.fetchOptions = {
      timeoutMs: options.fetch?.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs,
      settleMs: options.fetch?.settleMs ?? DEFAULT_FETCH_OPTIONS.settleMs,
      maxAttempts: options.fetch?.maxAttempts ?? DEFAULT_FETCH_OPTIONS.maxAttempts,
      backoffMs: options.fetch?.backoffMs ?? DEFAULT_FETCH_OPTIONS.backoffMs,
    }
    this.writer = new StoreWriter(
      options.store,
      options.storePolicy ?? DEFAULT_STORE_POLICY,
      this.now,
      options.sleep
    )
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
    this.concurrency = Math.min(MAX_CONCURRENCY, Math.max(1, Math.floor(concurrency)))
  }

  async run(boards: BoardSource[], runOptions: RunOptions = {}): Promise<RunReport> {
    const { signal } = runOptions
    const runId = randomUUID()
    const startedAt = this.now()
    const results = new Map<number, SourceReport>()
    const queue: QueuedBoard[] = boards.map((board, index) => ({ board, index }))

    console.log(`[run] ${runId}: ${boards.length} boards, concurrency ${this.concurrency}`)

    const workerCount = Math.min(this.concurrency, queue.length)
    const workers: Promise<void>[] = []
    for (let i = 0; i < workerCount; i++) {
      workers.push(this.worker(queue, results, signal))
    }
    await Promise.all(workers)

    // Sources a worker never reached were cut off by cancellation
    const sources = boards.map((board, index) => {
      const report = results.get(index)
      if (report) return report
      const aborted = emptyReport(board)
      fail(aborted, 'RunAborted', 'Run aborted before the source started')
      return aborted
    })

    const report = buildRunReport(runId, startedAt, this.now(), sources)

    try {
      await this.options.store.recordRun(report)
    } catch (err) {
      console.warn(`[run] Failed to record run ${runId}: ${errorMessage(err)}`)
    }

    return report
  }

  private async worker(
    queue: QueuedBoard[],
    results: Map<number, SourceReport>,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const session = new WorkerSession(this.options.launcher)
    try {
      while (queue.length > 0) {
        if (signal?.aborted) return
        const next = queue.shift()
        if (next !== undefined) {
          results.set(next.index, await this.runSource(next.board, session, signal))
        }
      }
    } finally {
      await session.close()
    }
  }

  private async runSource(
    board: BoardSource,
    session: WorkerSession,
    signal: AbortSignal | undefined
  ): Promise<SourceReport> {
    const started = this.now()
    const report = emptyReport(board)

    if (this.inFlight.has(board.id)) {
      fail(report, 'SourceBusy', `A run of ${board.id} is already in progress`)
      console.error(`[${board.id}] FAILED: already running`)
      return report
    }

    this.inFlight.add(board.id)
    try {
      await this.crawl(board, report, session, signal)
    } catch (err) {
      if (err instanceof StoreUnavailable) {
        report.newCount += err.inserted
        report.updatedCount += err.updated
      }
      fail(report, errorKind(err), errorMessage(err), errorUrl(err))
      console.error(`[${board.id}] FAILED: ${errorMessage(err)}`)
    } finally {
      this.inFlight.delete(board.id)
      report.durationMs = this.now().getTime() - started.getTime()
    }

    return report
  }

  private async crawl(
    board: BoardSource,
    report: SourceReport,
    session: WorkerSession,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const adapter = this.options.adapters.get(board.layout)
    if (!adapter) throw new Error(`No adapter registered for layout "${board.layout}"`)

    const comparable = board.comparableFields ?? adapter.comparableFields
    const fetchOptions: FetchOptions = { ...this.fetchOptions, waitFor: adapter.waitFor }
    const urls = adapter.pageUrls(board)

    console.log(`[${board.id}] Crawling ${urls.length} page(s) with ${board.layout} layout...`)

    const seen = await this.writer.loadSeen(board.id)
    const fetcher = new PageFetcher(await session.get(), this.now, this.options.sleep)

    for (const url of urls) {
      if (signal?.aborted) {
        fail(report, 'RunAborted', `Run aborted after ${report.pagesFetched} page(s)`, url)
        console.warn(`[${board.id}] Aborted before ${url}`)
        return
      }

      const page = await fetcher.fetch(board.id, url, fetchOptions)
      report.pagesFetched++

      const result = adapter.extract(page, board)
      if (result.kind === 'mismatch') {
        this.degrade(board, report, result.mismatch, page)
        continue
      }

      const detail = await this.readPostPages(
        board,
        adapter,
        result.pending,
        seen,
        comparable,
        fetcher,
        fetchOptions,
        signal
      )
      if (detail.undated && detail.resolved.length === 0) {
        this.degrade(board, report, undatedMismatch(adapter, detail.undated), detail.undated)
      }

      const candidates = [...result.candidates, ...detail.resolved]
      const skipped = result.skipped + detail.skipped
      report.candidatesFound += candidates.length + detail.unchanged
      report.skippedBlocks += skipped

      const decisions = filter(candidates, seen, comparable)
      const counts = countDecisions(candidates, decisions)
      const written = await this.writer.write(decisions, seen)
      report.newCount += written.inserted
      report.updatedCount += written.updated

      console.log(
        `[${board.id}] Page ${report.pagesFetched}: ${candidates.length + detail.unchanged} posts, ` +
          `${written.inserted} new, ${written.updated} updated, ${counts.unchangedCount + detail.unchanged} unchanged` +
          (skipped ? `, ${skipped} skipped` : '')
      )

      if (detail.abortedAt) {
        fail(report, 'RunAborted', `Run aborted after ${report.pagesFetched} page(s)`, detail.abortedAt)
        console.warn(`[${board.id}] Aborted before ${detail.abortedAt}`)
        return
      }

      if (board.stopWhenNoNew && written.inserted + written.updated === 0) {
        console.log(`[${board.id}] No new posts, stopping pagination`)
        break
      }
    }

    if (board.keepCount !== undefined) {
      report.archivedCount = await this.writer.archive(board.id, board.keepCount)
      if (report.archivedCount > 0) {
        console.log(`[${board.id}] Archived ${report.archivedCount} rows beyond the newest ${board.keepCount}`)
      }
    }
  }

  /**
   * Date the posts a listing left undated by opening each one. Posts already
   * stored with unchanged listing values are not opened. A post page that
   * is gone (4xx) or shows no date skips that post.
   */
  private async readPostPages(
    board: BoardSource,
    adapter: BoardAdapter,
    pending: PendingPost[],
    seen: SeenSet,
    comparable: readonly ComparableField[],
    fetcher: PageFetcher,
    options: FetchOptions,
    signal: AbortSignal | undefined
  ): Promise<DetailOutcome> {
    const outcome: DetailOutcome = { resolved: [], unchanged: 0, skipped: 0, undated: null, abortedAt: null }

    for (const { post, detailUrl } of pending) {
      const prev = seen.get(post.externalId)
      if (prev && changedFields(post, prev, comparable).length === 0) {
        outcome.unchanged++
        continue
      }

      if (signal?.aborted) {
        outcome.abortedAt = detailUrl
        break
      }

      let page: RawPage
      try {
        page = await fetcher.fetch(board.id, detailUrl, options)
      } catch (err) {
        if (!(err instanceof FetchHTTPError) || err.transient) throw err
        console.warn(`[${board.id}] Skipping ${detailUrl}: ${err.message}`)
        outcome.skipped++
        continue
      }

      const fields = adapter.extractDetail(page, board)
      if (!fields) {
        outcome.skipped++
        outcome.undated = page
        continue
      }
      outcome.resolved.push(withPostedAt(post, fields.postedAt, fields.category))
    }

    return outcome
  }

  /** Record a layout mismatch; the source carries on, degraded */
  private degrade(board: BoardSource, report: SourceReport, mismatch: ExtractionMismatch, page: RawPage): void {
    report.status = 'Degraded'
    report.errors.push({ kind: 'ExtractionMismatch', message: mismatch.message, url: mismatch.url })
    console.warn(`[${board.id}] ${mismatch.message} (${mismatch.url})`)

    const { artifactDir } = this.options
    if (!artifactDir) return
    try {
      saveMismatchArtifact(page, mismatch, artifactDir)
    } catch (err) {
      console.warn(`[${board.id}] Failed to save debug artifact: ${errorMessage(err)}`)
    }
  }
}
