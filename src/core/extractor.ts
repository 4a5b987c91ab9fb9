/**
 * Post extractor. Turns a rendered listing page into DealCandidates using
 * a layout's selector rules.
 *
 * Pure and order-preserving: the same RawPage always yields the same
 * candidates, top to bottom as listed. Malformed post blocks are skipped and
 * counted. Layout drift (no anchor, or no post block that parses) is
 * reported as an ExtractionMismatch value instead of an exception.
 *
 * Layouts whose listing carries no post date declare `detail` rules; their
 * posts come back as pending until the post page has been read.
 */

import * as cheerio from 'cheerio'
import type { Cheerio } from 'cheerio'
import type { Element } from 'domhandler'
import type { DealCandidate, RawPage } from '../schema/deal.js'
import {
  absoluteUrl,
  categoryFromTitle,
  cleanText,
  normalizeCategory,
  parsePostedAt,
  priceFromTitle,
} from '../lib/normalize.js'

export interface FieldRule {
  /** Tried in order; the first that yields a non-empty value wins */
  selectors: string[]
  /** Attributes read before the element's text */
  attrs?: string[]
  /** Fall back to element text when no attribute matched (default true) */
  text?: boolean
  /** Descendants removed before reading text, e.g. reply counters */
  strip?: string[]
}

/** Selector rules of a board layout */
export interface LayoutRules {
  /** Structural anchor; its absence means the layout changed */
  anchor: string
  /** Post blocks, relative to the anchor */
  post: string
  /** Blocks matching this are not posts (notices, pinned "best" rows) */
  skip?: string
  /** Titles matching this are not deals; such blocks count as skipped */
  excludeTitle?: RegExp
  title: FieldRule
  link: FieldRule
  /** Applied to the resolved link; group 1 is the external post id */
  idPattern: RegExp
  /** Omitted when the listing shows no date; `detail` then supplies it */
  postedAt?: FieldRule
  price?: FieldRule
  image?: FieldRule
  category?: FieldRule
  detail?: DetailRules
}

/** Fields read from a post's own page */
export interface DetailRules {
  postedAt: FieldRule
  /** Overrides the listing's category when present */
  category?: FieldRule
}

/** Layout rules bound to one board */
export interface AdapterRules extends LayoutRules {
  baseUrl: string
  utcOffsetMinutes: number
}

export interface ExtractionMismatch {
  kind: 'ExtractionMismatch'
  sourceId: string
  url: string
  /** The selector that no longer matches */
  selector: string
  message: string
}

/** A listed post still missing its posted time */
export type ListedPost = Omit<DealCandidate, 'postedAt'>

export interface PendingPost {
  post: ListedPost
  detailUrl: string
}

export type ExtractionResult =
  | { kind: 'ok'; candidates: DealCandidate[]; pending: PendingPost[]; skipped: number }
  | { kind: 'mismatch'; mismatch: ExtractionMismatch }

export interface DetailFields {
  postedAt: string
  category?: string
}

type Block = Cheerio<Element>

function readField(block: Block, rule: FieldRule | undefined): string | null {
  if (!rule) return null

  for (const selector of rule.selectors) {
    const el = block.find(selector).first()
    if (el.length === 0) continue

    for (const attr of rule.attrs ?? []) {
      const val = el.attr(attr)?.trim()
      if (val && !val.startsWith('data:')) return val
    }

    if (rule.text === false) continue

    let target = el
    if (rule.strip?.length) {
      target = el.clone()
      target.find(rule.strip.join(', ')).remove()
    }
    const text = cleanText(target.text())
    if (text) return text
  }

  return null
}

type ParsedBlock = { kind: 'candidate'; candidate: DealCandidate } | { kind: 'pending'; pending: PendingPost }

function parseBlock(block: Block, page: RawPage, rules: AdapterRules): ParsedBlock | null {
  const title = cleanText(readField(block, rules.title))
  if (title.length < 3) return null
  if (rules.excludeTitle?.test(title)) return null

  const url = absoluteUrl(readField(block, rules.link), rules.baseUrl)
  if (!url) return null

  const externalId = url.match(rules.idPattern)?.[1]
  if (!externalId) return null

  const post: ListedPost = {
    sourceId: page.sourceId,
    externalId,
    title,
    priceText: readField(block, rules.price) ?? priceFromTitle(title),
    url,
  }

  const imageUrl = absoluteUrl(readField(block, rules.image), rules.baseUrl)
  if (imageUrl) post.imageUrl = imageUrl

  const category = normalizeCategory(readField(block, rules.category)) ?? categoryFromTitle(title)
  if (category) post.category = category

  const postedAt = parsePostedAt(readField(block, rules.postedAt), page.fetchedAt, rules.utcOffsetMinutes)
  if (postedAt) return { kind: 'candidate', candidate: withPostedAt(post, postedAt) }
  if (rules.detail) return { kind: 'pending', pending: { post, detailUrl: url } }
  return null
}

/** Candidate fields in their canonical order */
export function withPostedAt(post: ListedPost, postedAt: string, category?: string): DealCandidate {
  const { imageUrl, category: listed, ...required } = post
  const candidate: DealCandidate = { ...required, postedAt }
  if (imageUrl) candidate.imageUrl = imageUrl
  const resolved = category ?? listed
  if (resolved) candidate.category = resolved
  return candidate
}

function mismatch(page: RawPage, selector: string, message: string): ExtractionResult {
  return {
    kind: 'mismatch',
    mismatch: { kind: 'ExtractionMismatch', sourceId: page.sourceId, url: page.url, selector, message },
  }
}

export function extractPosts(page: RawPage, rules: AdapterRules): ExtractionResult {
  const $ = cheerio.load(page.markup)
  const anchor = $(rules.anchor).first()

  if (anchor.length === 0) {
    return mismatch(page, rules.anchor, `Anchor "${rules.anchor}" not found; board layout may have changed`)
  }

  const blocks = anchor.find(rules.post)
  if (blocks.length === 0) {
    return mismatch(page, rules.post, `No post blocks match "${rules.post}"; board layout may have changed`)
  }

  const candidates: DealCandidate[] = []
  const pending: PendingPost[] = []
  const ids = new Set<string>()
  let skipped = 0

  blocks.each((_, el) => {
    const block = $(el)
    if (rules.skip && block.is(rules.skip)) return

    const parsed = parseBlock(block, page, rules)
    const post = parsed?.kind === 'candidate' ? parsed.candidate : parsed?.pending.post
    if (!parsed || !post || ids.has(post.externalId)) {
      skipped++
      return
    }

    ids.add(post.externalId)
    if (parsed.kind === 'candidate') candidates.push(parsed.candidate)
    else pending.push(parsed.pending)
  })

  if (candidates.length === 0 && pending.length === 0 && skipped > 0) {
    return mismatch(page, rules.post, `None of ${skipped} post blocks could be parsed; board layout may have changed`)
  }

  return { kind: 'ok', candidates, pending, skipped }
}

/**
 * Read the posted time (and category, when the layout has one there) from a
 * post's own page. Null when the page no longer shows a parseable date.
 */
export function extractDetail(page: RawPage, rules: AdapterRules): DetailFields | null {
  if (!rules.detail) return null

  const $ = cheerio.load(page.markup)
  const root = $('html').first()
  const postedAt = parsePostedAt(readField(root, rules.detail.postedAt), page.fetchedAt, rules.utcOffsetMinutes)
  if (!postedAt) return null

  const fields: DetailFields = { postedAt }
  const category = normalizeCategory(readField(root, rules.detail.category))
  if (category) fields.category = category
  return fields
}
