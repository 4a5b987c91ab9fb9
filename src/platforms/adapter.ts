/**
 * Board adapter contract. A layout is a plain object declaring its selector
 * rules; boards pick one by `layout` in their config.
 */

import type { BoardSource, ComparableField, LayoutKey, RawPage } from '../schema/deal.js'
import type { WaitCondition } from '../core/browser.js'
import {
  extractDetail,
  extractPosts,
  type AdapterRules,
  type DetailFields,
  type ExtractionResult,
  type LayoutRules,
} from '../core/extractor.js'

export interface BoardAdapter {
  layout: LayoutKey
  rules: LayoutRules
  /** Fields whose change marks a seen post as updated */
  comparableFields: ComparableField[]
  /** Readiness condition for listing pages of this layout */
  waitFor: WaitCondition
  pageUrls(board: BoardSource): string[]
  extract(page: RawPage, board: BoardSource): ExtractionResult
  /** Posted time from a post's own page, for layouts whose listing lacks one */
  extractDetail(page: RawPage, board: BoardSource): DetailFields | null
}

/** Listing URLs in visiting order, bounded by `maxPages` */
export function paginate(board: BoardSource): string[] {
  const { param, start, firstPageBare } = board.pagination
  const sep = board.listUrl.includes('?') ? '&' : '?'
  const urls: string[] = []

  for (let k = 0; k < board.maxPages; k++) {
    if (k === 0 && firstPageBare) {
      urls.push(board.listUrl)
    } else {
      urls.push(`${board.listUrl}${sep}${encodeURIComponent(param)}=${start + k}`)
    }
  }

  return urls
}

export function bindRules(rules: LayoutRules, board: BoardSource): AdapterRules {
  return { ...rules, baseUrl: board.baseUrl, utcOffsetMinutes: board.utcOffsetMinutes }
}

export function defineAdapter(
  layout: LayoutKey,
  rules: LayoutRules,
  options: { comparableFields?: ComparableField[]; waitFor?: WaitCondition } = {}
): BoardAdapter {
  return {
    layout,
    rules,
    comparableFields: options.comparableFields ?? ['priceText'],
    waitFor: options.waitFor ?? 'domcontentloaded',
    pageUrls: paginate,
    extract: (page, board) => extractPosts(page, bindRules(rules, board)),
    extractDetail: (page, board) => extractDetail(page, bindRules(rules, board)),
  }
}
