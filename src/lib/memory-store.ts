/**
 * In-process DealStore. Backs `--dry-run` and the test suite; rows live only
 * as long as the instance.
 */

import { randomUUID } from 'node:crypto'
import { seenKey, type DealRecord, type RunReport, type SeenSet } from '../schema/deal.js'
import type { HotDealUpsert } from '../types/database.js'
import type { DealStore } from '../core/store.js'

export class InMemoryDealStore implements DealStore {
  private readonly rows = new Map<string, DealRecord>()
  readonly runs: RunReport[] = []
  /** Number of upsert calls made */
  upsertCalls = 0

  constructor(private readonly now: () => Date = () => new Date()) {}

  async listSeen(sourceId: string): Promise<SeenSet> {
    const seen: SeenSet = new Map()
    for (const rec of this.rows.values()) {
      if (rec.sourceId !== sourceId) continue
      seen.set(rec.externalId, {
        title: rec.title,
        priceText: rec.priceText,
        imageUrl: rec.imageUrl ?? null,
        category: rec.category ?? null,
      })
    }
    return seen
  }

  async upsertDeal(row: HotDealUpsert): Promise<void> {
    this.upsertCalls++
    const key = seenKey({ sourceId: row.source_id, externalId: row.external_id })
    const existing = this.rows.get(key)

    const record: DealRecord = {
      id: existing?.id ?? randomUUID(),
      sourceId: row.source_id,
      externalId: row.external_id,
      title: row.title,
      titleHash: row.title_hash,
      priceText: row.price_text,
      url: row.url,
      postedAt: row.posted_at,
      firstSeenAt: existing?.firstSeenAt ?? row.last_seen_at,
      lastSeenAt: row.last_seen_at,
      archivedAt: existing?.archivedAt ?? null,
    }
    if (row.image_url) record.imageUrl = row.image_url
    if (row.category) record.category = row.category

    this.rows.set(key, record)
  }

  async archiveBeyond(sourceId: string, keepCount: number): Promise<number> {
    const active = this.records(sourceId)
      .filter(r => r.archivedAt == null)
      .sort((a, b) => b.firstSeenAt.localeCompare(a.firstSeenAt) || a.id.localeCompare(b.id))

    const archivedAt = this.now().toISOString()
    const beyond = active.slice(keepCount)
    for (const rec of beyond) rec.archivedAt = archivedAt
    return beyond.length
  }

  async recordRun(report: RunReport): Promise<void> {
    this.runs.push(report)
  }

  /** Rows of one source, or all rows */
  records(sourceId?: string): DealRecord[] {
    const all = [...this.rows.values()]
    return sourceId ? all.filter(r => r.sourceId === sourceId) : all
  }
}
