// Row shapes for the hot_deals schema (supabase/migrations/001_hot_deals.sql)

export interface HotDealRow {
  id: string
  source_id: string
  external_id: string
  title: string
  title_hash: string
  price_text: string | null
  url: string
  posted_at: string
  image_url: string | null
  category: string | null
  first_seen_at: string
  last_seen_at: string
  updated_at: string
  archived_at: string | null
}

/** Columns written by an upsert; id and first_seen_at stay with the first insert */
export type HotDealUpsert = Omit<HotDealRow, 'id' | 'first_seen_at' | 'archived_at'>

/** Columns read back to build a seen-set */
export type HotDealSeenRow = Pick<
  HotDealRow,
  'external_id' | 'title' | 'price_text' | 'image_url' | 'category'
>

export interface CrawlRunRow {
  id: string
  status: 'Completed' | 'PartiallyFailed'
  started_at: string
  finished_at: string
  duration_ms: number
  new_count: number
  updated_count: number
  failed_sources: number
  degraded_sources: number
  report: unknown
}
