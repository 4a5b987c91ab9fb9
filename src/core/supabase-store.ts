/**
 * Supabase-backed DealStore.
 *
 * Tables (supabase/migrations/001_hot_deals.sql):
 *   hot_deals:  one row per (source_id, external_id)
 *   crawl_runs: one row per run report
 */

import type { SupabaseClient } from '@supabase/supabase-js'
import type { RunReport, SeenSet } from '../schema/deal.js'
import type { CrawlRunRow, HotDealSeenRow, HotDealUpsert } from '../types/database.js'
import type { DealStore } from './store.js'

const PAGE_SIZE = 1000

export class SupabaseDealStore implements DealStore {
  constructor(
    private readonly sb: SupabaseClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  async listSeen(sourceId: string): Promise<SeenSet> {
    const seen: SeenSet = new Map()

    // PostgREST caps each response, so page through by range
    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.sb
        .from('hot_deals')
        .select('external_id, title, price_text, image_url, category')
        .eq('source_id', sourceId)
        .order('external_id')
        .range(from, from + PAGE_SIZE - 1)
        .returns<HotDealSeenRow[]>()

      if (error) throw new Error(`Failed to read seen keys for ${sourceId}: ${error.message}`)

      for (const row of data ?? []) {
        seen.set(row.external_id, {
          title: row.title,
          priceText: row.price_text,
          imageUrl: row.image_url,
          category: row.category,
        })
      }

      if (!data || data.length < PAGE_SIZE) break
    }

    return seen
  }

  async upsertDeal(row: HotDealUpsert): Promise<void> {
    const { error } = await this.sb
      .from('hot_deals')
      .upsert(row, {
        onConflict: 'source_id,external_id',
        ignoreDuplicates: false,
      })

    if (error) {
      throw new Error(`Upsert failed (${row.source_id}:${row.external_id}): ${error.message}`)
    }
  }

  async archiveBeyond(sourceId: string, keepCount: number): Promise<number> {
    const archivedAt = this.now().toISOString()
    let archived = 0

    // Archived rows drop out of the window, so each pass starts at keepCount again
    while (true) {
      const { data, error } = await this.sb
        .from('hot_deals')
        .select('id')
        .eq('source_id', sourceId)
        .is('archived_at', null)
        .order('first_seen_at', { ascending: false })
        .order('id')
        .range(keepCount, keepCount + PAGE_SIZE - 1)
        .returns<{ id: string }[]>()

      if (error) throw new Error(`Failed to list rows to archive for ${sourceId}: ${error.message}`)

      const ids = (data ?? []).map(r => r.id)
      if (ids.length === 0) break

      const { error: updateErr } = await this.sb
        .from('hot_deals')
        .update({ archived_at: archivedAt })
        .in('id', ids)

      if (updateErr) throw new Error(`Failed to archive rows for ${sourceId}: ${updateErr.message}`)

      archived += ids.length
      if (ids.length < PAGE_SIZE) break
    }

    return archived
  }

  async recordRun(report: RunReport): Promise<void> {
    const row: CrawlRunRow = {
      id: report.runId,
      status: report.status,
      started_at: report.startedAt,
      finished_at: report.finishedAt,
      duration_ms: report.durationMs,
      new_count: report.totals.newCount,
      updated_count: report.totals.updatedCount,
      failed_sources: report.totals.failedSources,
      degraded_sources: report.totals.degradedSources,
      report,
    }

    const { error } = await this.sb.from('crawl_runs').insert(row)
    if (error) throw new Error(`Failed to record run ${report.runId}: ${error.message}`)
  }
}
