/**
 * Field normalization for board listings: URLs, categories, price text,
 * posted times written in the board's local clock, and title hashing.
 */

import { createHash } from 'node:crypto'

const MINUTE = 60_000
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR

/** Make an href absolute against the board's base URL */
export function absoluteUrl(href: string | undefined | null, baseUrl: string): string | null {
  if (!href) return null
  const trimmed = href.trim()
  if (!trimmed || trimmed.startsWith('#') || /^javascript:/i.test(trimmed)) return null

  const base = baseUrl.replace(/\/+$/, '')
  if (/^https?:\/\//i.test(trimmed)) return trimmed
  if (trimmed.startsWith('//')) return 'https:' + trimmed
  if (trimmed.startsWith('/')) return base + trimmed
  return base + '/' + trimmed
}

/** "[국내]," → "국내"; empty → null */
export function normalizeCategory(raw: string | undefined | null): string | null {
  if (!raw) return null
  const cleaned = raw
    .replace(/^[\s,]+|[\s,]+$/g, '')
    .replace(/^\[|\]$/g, '')
    .trim()
  return cleaned || null
}

/** First [tag] of a title, if any */
export function categoryFromTitle(title: string): string | null {
  const match = title.match(/\[([^\]]+)\]/)
  return match ? normalizeCategory(match[1]) : null
}

const CURRENCY = /원|₩|\$|달러|USD|KRW|무료/i

/**
 * Price text from a title such as "[쿠팡] 에어프라이어 (39,900원/무료)".
 * Takes the last parenthesised segment holding a digit and a currency marker.
 */
export function priceFromTitle(title: string): string | null {
  const segments = [...title.matchAll(/\(([^()]+)\)/g)].map(m => m[1].trim())
  for (let i = segments.length - 1; i >= 0; i--) {
    const seg = segments[i]
    if (/\d/.test(seg) && CURRENCY.test(seg)) return seg
  }
  return null
}

/** Collapse whitespace and trim */
export function cleanText(raw: string | undefined | null): string {
  return (raw ?? '').replace(/\s+/g, ' ').trim()
}

// ── Posted time ──────────────────────────────────────────────────

interface WallClock {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

function toWallClock(instantMs: number, offsetMinutes: number): WallClock {
  const d = new Date(instantMs + offsetMinutes * MINUTE)
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    second: d.getUTCSeconds(),
  }
}

/** Wall-clock time on the board → UTC epoch ms, or null when out of range */
function fromWallClock(wall: WallClock, offsetMinutes: number): number | null {
  const { year, month, day, hour, minute, second } = wall
  if (month < 1 || month > 12 || day < 1 || day > 31) return null
  if (hour > 23 || minute > 59 || second > 59) return null

  const local = Date.UTC(year, month - 1, day, hour, minute, second)
  const check = new Date(local)
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return null

  return local - offsetMinutes * MINUTE
}

function num(val: string | undefined): number {
  return val ? parseInt(val, 10) : 0
}

const RELATIVE: [RegExp, number][] = [
  [/^(\d+)\s*분\s*전$/, MINUTE],
  [/^(\d+)\s*시간\s*전$/, HOUR],
  [/^(\d+)\s*일\s*전$/, DAY],
]

const ISO_INSTANT = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/
const TIME_ONLY = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/
const FULL_DATE = /^(\d{4}|\d{2})[.\-/](\d{1,2})[.\-/](\d{1,2})\.?(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/
const MONTH_DAY = /^(\d{1,2})[.\-/](\d{1,2})\.?(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/

/**
 * Parse a listing's posted time into a UTC ISO string.
 *
 * Relative forms resolve against `fetchedAt`, so the same page always parses
 * to the same instants. Returns null for anything unrecognised.
 */
export function parsePostedAt(
  raw: string | undefined | null,
  fetchedAt: string,
  offsetMinutes: number
): string | null {
  const text = cleanText(raw)
  if (!text) return null

  const fetchedMs = Date.parse(fetchedAt)
  if (isNaN(fetchedMs)) return null

  if (text === '방금' || text === '방금 전') return new Date(fetchedMs).toISOString()

  // Machine-readable instants (a <time datetime> attribute) carry their own zone
  if (ISO_INSTANT.test(text)) {
    const ms = Date.parse(text)
    return isNaN(ms) ? null : new Date(ms).toISOString()
  }

  for (const [pattern, unit] of RELATIVE) {
    const m = text.match(pattern)
    if (m) return new Date(fetchedMs - num(m[1]) * unit).toISOString()
  }

  const today = toWallClock(fetchedMs, offsetMinutes)

  let m = text.match(TIME_ONLY)
  if (m) {
    const ms = fromWallClock(
      { ...today, hour: num(m[1]), minute: num(m[2]), second: num(m[3]) },
      offsetMinutes
    )
    if (ms == null) return null
    // A time later than the fetch belongs to yesterday
    return new Date(ms > fetchedMs ? ms - DAY : ms).toISOString()
  }

  m = text.match(FULL_DATE)
  if (m) {
    const year = m[1].length === 2 ? 2000 + num(m[1]) : num(m[1])
    const ms = fromWallClock(
      { year, month: num(m[2]), day: num(m[3]), hour: num(m[4]), minute: num(m[5]), second: num(m[6]) },
      offsetMinutes
    )
    return ms == null ? null : new Date(ms).toISOString()
  }

  m = text.match(MONTH_DAY)
  if (m) {
    const wall = { year: today.year, month: num(m[1]), day: num(m[2]), hour: num(m[3]), minute: num(m[4]), second: num(m[5]) }
    const ms = fromWallClock(wall, offsetMinutes)
    if (ms == null) return null
    if (ms <= fetchedMs) return new Date(ms).toISOString()
    const lastYear = fromWallClock({ ...wall, year: today.year - 1 }, offsetMinutes)
    return lastYear == null ? null : new Date(lastYear).toISOString()
  }

  return null
}

// ── Title hash ───────────────────────────────────────────────────

/** Strip tags, prices and punctuation so cross-posted titles compare equal */
export function normalizeTitle(title: string): string {
  return title
    .replace(/\[.*?\]/g, '')
    .replace(/【.*?】/g, '')
    .replace(/\d+만원/g, '')
    .replace(/\d[\d,]*원/g, '')
    .replace(/[^\p{L}\p{N}]/gu, '')
    .toLowerCase()
}

export function titleHash(title: string): string {
  return createHash('md5').update(normalizeTitle(title)).digest('hex').slice(0, 16)
}
