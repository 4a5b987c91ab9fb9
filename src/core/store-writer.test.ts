import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { DealCandidate, RunReport, SeenSet } from '../schema/deal.js'
import type { HotDealUpsert } from '../types/database.js'
import { InMemoryDealStore } from '../lib/memory-store.js'
import { StoreUnavailable } from './errors.js'
import type { DealStore } from './store.js'
import { StoreWriter } from './store-writer.js'

function candidate(externalId: string, priceText = '10,000원'): DealCandidate {
  return {
    sourceId: 'board',
    externalId,
    title: `[쿠팡] 딜 ${externalId}`,
    priceText,
    url: `https://deals.example.com/deal/${externalId}`,
    postedAt: '2026-10-19T04:00:00.000Z',
  }
}

/** Delegates to an in-memory store, failing upserts the predicate picks */
class FlakyStore implements DealStore {
  readonly inner = new InMemoryDealStore()
  upsertAttempts = 0

  constructor(
    private readonly failUpsert: (row: HotDealUpsert, attempt: number) => boolean,
    private readonly failListSeen = false
  ) {}

  async listSeen(sourceId: string): Promise<SeenSet> {
    if (this.failListSeen) throw new Error('connection refused')
    return this.inner.listSeen(sourceId)
  }

  async upsertDeal(row: HotDealUpsert): Promise<void> {
    this.upsertAttempts++
    if (this.failUpsert(row, this.upsertAttempts)) throw new Error('503 Service Unavailable')
    return this.inner.upsertDeal(row)
  }

  async archiveBeyond(sourceId: string, keepCount: number): Promise<number> {
    return this.inner.archiveBeyond(sourceId, keepCount)
  }

  async recordRun(report: RunReport): Promise<void> {
    return this.inner.recordRun(report)
  }
}

const POLICY = { maxAttempts: 3, backoffMs: 0 }
const noWait = async () => {}

describe('StoreWriter', () => {
  let clock: number
  const now = () => new Date((clock += 1_000))

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    clock = Date.parse('2026-10-19T05:00:00.000Z')
  })

  it('keeps one row per key across an insert and an update', async () => {
    const store = new InMemoryDealStore()
    const writer = new StoreWriter(store, POLICY, now, noWait)
    const seen: SeenSet = new Map()

    expect(await writer.write([{ candidate: candidate('1'), isUpdate: false }], seen)).toEqual({ inserted: 1, updated: 0 })
    const [first] = store.records('board')

    const repriced = candidate('1', '8,900원')
    expect(await writer.write([{ candidate: repriced, isUpdate: true }], seen)).toEqual({ inserted: 0, updated: 1 })

    const rows = store.records('board')
    expect(rows).toHaveLength(1)
    expect(rows[0].id).toBe(first.id)
    expect(rows[0].priceText).toBe('8,900원')
    expect(rows[0].firstSeenAt).toBe('2026-10-19T05:00:01.000Z')
    expect(rows[0].lastSeenAt).toBe('2026-10-19T05:00:02.000Z')
  })

  it('records each written candidate in the seen-set', async () => {
    const writer = new StoreWriter(new InMemoryDealStore(), POLICY, now, noWait)
    const seen: SeenSet = new Map()

    await writer.write([{ candidate: candidate('1'), isUpdate: false }], seen)
    expect(seen.get('1')).toEqual({ title: '[쿠팡] 딜 1', priceText: '10,000원', imageUrl: null, category: null })
  })

  it('retries a failing upsert within the policy', async () => {
    const store = new FlakyStore((_, attempt) => attempt <= 2)
    const writer = new StoreWriter(store, POLICY, now, noWait)

    expect(await writer.write([{ candidate: candidate('1'), isUpdate: false }], new Map())).toEqual({ inserted: 1, updated: 0 })
    expect(store.upsertAttempts).toBe(3)
    expect(store.inner.records()).toHaveLength(1)
  })

  it('raises StoreUnavailable with the counts written so far', async () => {
    const store = new FlakyStore(row => row.external_id === '2')
    const writer = new StoreWriter(store, POLICY, now, noWait)
    const seen: SeenSet = new Map()

    const err = await writer
      .write(
        [
          { candidate: candidate('1'), isUpdate: false },
          { candidate: candidate('2'), isUpdate: false },
          { candidate: candidate('3'), isUpdate: false },
        ],
        seen
      )
      .catch((e: unknown) => e)

    expect(err).toBeInstanceOf(StoreUnavailable)
    expect(err instanceof StoreUnavailable && [err.inserted, err.updated]).toEqual([1, 0])
    // 1 success + 3 attempts on the failing row; the third is never tried
    expect(store.upsertAttempts).toBe(4)
    expect([...seen.keys()]).toEqual(['1'])
  })

  it('raises StoreUnavailable when the seen-set cannot be read', async () => {
    const writer = new StoreWriter(new FlakyStore(() => false, true), POLICY, now, noWait)
    await expect(writer.loadSeen('board')).rejects.toBeInstanceOf(StoreUnavailable)
  })

  it('archives rows beyond the newest keepCount without forgetting them', async () => {
    const store = new InMemoryDealStore()
    const writer = new StoreWriter(store, POLICY, now, noWait)
    const seen: SeenSet = new Map()
    for (const id of ['1', '2', '3']) {
      await writer.write([{ candidate: candidate(id), isUpdate: false }], seen)
    }

    expect(await writer.archive('board', 2)).toBe(1)

    const archived = store.records('board').filter(r => r.archivedAt !== null).map(r => r.externalId)
    expect(archived).toEqual(['1'])
    expect([...(await store.listSeen('board')).keys()].sort()).toEqual(['1', '2', '3'])
  })
})
