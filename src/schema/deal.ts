/**
 * Shared deal schema. Every board adapter extracts into DealCandidate,
 * and every run ends in a RunReport.
 */

/** Fields the deduplicator may compare to detect an updated post */
export const COMPARABLE_FIELDS = ['title', 'priceText', 'imageUrl', 'category'] as const

export type ComparableField = (typeof COMPARABLE_FIELDS)[number]

export const LAYOUTS = [
  'clien',
  'ruliweb',
  'quasarzone',
  'coolenjoy',
  'dealbada',
  'arcalive',
  'bbasak',
  'eomisae',
] as const

export type LayoutKey = (typeof LAYOUTS)[number]

export interface PaginationRule {
  /** Query parameter carrying the page number */
  param: string
  /** Value of `param` for the first page (0 on clien, 1 elsewhere) */
  start: number
  /** Visit `listUrl` unmodified for the first page */
  firstPageBare: boolean
}

export interface BoardSource {
  id: string
  name: string
  layout: LayoutKey
  baseUrl: string
  listUrl: string
  pagination: PaginationRule
  maxPages: number
  stopWhenNoNew: boolean
  /** Archive rows beyond the newest N for this board */
  keepCount?: number
  comparableFields?: ComparableField[]
  /** Offset of the board's displayed clock from UTC */
  utcOffsetMinutes: number
}

export interface RawPage {
  sourceId: string
  url: string
  markup: string
  status: number
  fetchedAt: string
}

export interface DealCandidate {
  sourceId: string
  externalId: string
  title: string
  priceText: string | null
  url: string
  postedAt: string
  imageUrl?: string
  category?: string
}

export interface SeenKey {
  sourceId: string
  externalId: string
}

export function seenKey(key: SeenKey): string {
  return `${key.sourceId}:${key.externalId}`
}

/** Last stored comparable values for a SeenKey */
export interface SeenEntry {
  title: string
  priceText: string | null
  imageUrl: string | null
  category: string | null
}

/** Seen-set for one source, keyed by externalId */
export type SeenSet = Map<string, SeenEntry>

export interface DealRecord extends DealCandidate {
  id: string
  titleHash: string
  firstSeenAt: string
  lastSeenAt: string
  archivedAt: string | null
}

export type SourceStatus = 'Completed' | 'Degraded' | 'Failed'
export type RunStatus = 'Completed' | 'PartiallyFailed'

export type SourceErrorKind =
  | 'FetchTimeout'
  | 'FetchHTTPError'
  | 'FetchTransportError'
  | 'ExtractionMismatch'
  | 'StoreUnavailable'
  | 'SourceBusy'
  | 'RunAborted'
  | 'Unexpected'

export interface SourceErrorEntry {
  kind: SourceErrorKind
  message: string
  url?: string
}

export interface SourceReport {
  sourceId: string
  name: string
  status: SourceStatus
  pagesFetched: number
  candidatesFound: number
  skippedBlocks: number
  newCount: number
  updatedCount: number
  archivedCount: number
  errors: SourceErrorEntry[]
  durationMs: number
}

export interface RunReport {
  runId: string
  status: RunStatus
  startedAt: string
  finishedAt: string
  durationMs: number
  sources: SourceReport[]
  totals: {
    pagesFetched: number
    candidatesFound: number
    newCount: number
    updatedCount: number
    failedSources: number
    degradedSources: number
  }
}
