/**
 * Backing store boundary. The crawler needs keyed upserts, the seen-set of a
 * source, archiving beyond a keep count and a place to record run reports.
 */

import type { DealCandidate, RunReport, SeenSet } from '../schema/deal.js'
import type { HotDealUpsert } from '../types/database.js'
import { titleHash } from '../lib/normalize.js'

export interface DealStore {
  /** Seen keys of a source with their last stored comparable values */
  listSeen(sourceId: string): Promise<SeenSet>
  /** Insert, or update the row sharing (source_id, external_id) */
  upsertDeal(row: HotDealUpsert): Promise<void>
  /** Archive rows beyond the newest `keepCount`; returns how many were archived */
  archiveBeyond(sourceId: string, keepCount: number): Promise<number>
  recordRun(report: RunReport): Promise<void>
}

export function toUpsertRow(candidate: DealCandidate, seenAt: string): HotDealUpsert {
  return {
    source_id: candidate.sourceId,
    external_id: candidate.externalId,
    title: candidate.title,
    title_hash: titleHash(candidate.title),
    price_text: candidate.priceText,
    url: candidate.url,
    posted_at: candidate.postedAt,
    image_url: candidate.imageUrl ?? null,
    category: candidate.category ?? null,
    last_seen_at: seenAt,
    updated_at: seenAt,
  }
}
