/**
 * Deduplicator. Compares freshly extracted candidates against the seen-set
 * of their source and keeps only new or changed posts.
 *
 *   new       key absent from the seen-set
 *   update    key present, a comparable field differs from the stored value
 *   (dropped) key present, nothing comparable changed
 *
 * Survivors keep extraction order.
 */

import type { ComparableField, DealCandidate, SeenEntry, SeenSet } from '../schema/deal.js'

export interface Decision {
  candidate: DealCandidate
  isUpdate: boolean
}

export interface DedupCounts {
  newCount: number
  updateCount: number
  unchangedCount: number
}

/** Anything carrying the comparable fields, including a post not yet dated */
export type ComparableValues = Pick<DealCandidate, ComparableField>

function candidateValue(candidate: ComparableValues, field: ComparableField): string | null {
  switch (field) {
    case 'title':
      return candidate.title
    case 'priceText':
      return candidate.priceText
    case 'imageUrl':
      return candidate.imageUrl ?? null
    case 'category':
      return candidate.category ?? null
  }
}

export function changedFields(
  candidate: ComparableValues,
  seen: SeenEntry,
  fields: readonly ComparableField[]
): ComparableField[] {
  return fields.filter(field => candidateValue(candidate, field) !== seen[field])
}

export function filter(
  candidates: readonly DealCandidate[],
  seen: SeenSet,
  comparableFields: readonly ComparableField[]
): Decision[] {
  const decisions: Decision[] = []
  const considered = new Set<string>()

  for (const candidate of candidates) {
    if (considered.has(candidate.externalId)) continue
    considered.add(candidate.externalId)

    const prev = seen.get(candidate.externalId)
    if (!prev) {
      decisions.push({ candidate, isUpdate: false })
    } else if (changedFields(candidate, prev, comparableFields).length > 0) {
      decisions.push({ candidate, isUpdate: true })
    }
  }

  return decisions
}

export function countDecisions(candidates: readonly DealCandidate[], decisions: readonly Decision[]): DedupCounts {
  const newCount = decisions.filter(d => !d.isUpdate).length
  const updateCount = decisions.length - newCount
  return {
    newCount,
    updateCount,
    unchangedCount: new Set(candidates.map(c => c.externalId)).size - decisions.length,
  }
}

/** Seen-set entry for a candidate that has just been written */
export function toSeenEntry(candidate: DealCandidate): SeenEntry {
  return {
    title: candidate.title,
    priceText: candidate.priceText,
    imageUrl: candidate.imageUrl ?? null,
    category: candidate.category ?? null,
  }
}
