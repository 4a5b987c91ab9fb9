/**
 * Store writer. Persists accepted decisions one keyed upsert at a time.
 *
 * A crash mid-batch leaves only whole rows behind, and a retry upserts the
 * same keys again, so no duplicates appear. Store calls are retried under the
 * store policy; exhaustion raises StoreUnavailable.
 */

import type { SeenSet } from '../schema/deal.js'
import type { Decision } from './dedup.js'
import { toSeenEntry } from './dedup.js'
import { StoreUnavailable, errorMessage } from './errors.js'
import { withRetry, type RetryPolicy, type Sleep } from './retry.js'
import { toUpsertRow, type DealStore } from './store.js'

export interface WriteResult {
  inserted: number
  updated: number
}

export const DEFAULT_STORE_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 1_000,
}

export class StoreWriter {
  constructor(
    private readonly store: DealStore,
    private readonly policy: RetryPolicy = DEFAULT_STORE_POLICY,
    private readonly now: () => Date = () => new Date(),
    private readonly wait?: Sleep
  ) {}

  private retry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      ...this.policy,
      label,
      isRetryable: () => true,
      sleep: this.wait,
    })
  }

  /** Read the seen-set of a source at the start of its run */
  async loadSeen(sourceId: string): Promise<SeenSet> {
    try {
      return await this.retry(`[${sourceId}] listSeen`, () => this.store.listSeen(sourceId))
    } catch (err) {
      throw new StoreUnavailable(`Store unavailable reading seen keys: ${errorMessage(err)}`)
    }
  }

  /**
   * Upsert each decision in order. `seen` is updated after every successful
   * write so later pages of the same run classify against it.
   */
  async write(decisions: readonly Decision[], seen: SeenSet): Promise<WriteResult> {
    const result: WriteResult = { inserted: 0, updated: 0 }

    for (const { candidate, isUpdate } of decisions) {
      const row = toUpsertRow(candidate, this.now().toISOString())
      try {
        await this.retry(`[${candidate.sourceId}] upsert ${candidate.externalId}`, () =>
          this.store.upsertDeal(row)
        )
      } catch (err) {
        throw new StoreUnavailable(
          `Store unavailable after ${result.inserted + result.updated} writes: ${errorMessage(err)}`,
          result.inserted,
          result.updated
        )
      }

      seen.set(candidate.externalId, toSeenEntry(candidate))
      if (isUpdate) result.updated++
      else result.inserted++
    }

    return result
  }

  async archive(sourceId: string, keepCount: number): Promise<number> {
    try {
      return await this.retry(`[${sourceId}] archive`, () => this.store.archiveBeyond(sourceId, keepCount))
    } catch (err) {
      throw new StoreUnavailable(`Store unavailable archiving old rows: ${errorMessage(err)}`)
    }
  }
}
