/**
 * Runtime configuration: store credentials and crawl tuning from env, board
 * definitions from `boards/*.json`. Both are validated up front so a bad
 * setup fails before any source is processed.
 */

import { readdirSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { z } from 'zod'
import { COMPARABLE_FIELDS, LAYOUTS, type BoardSource } from '../schema/deal.js'
import { ConfigurationError, errorMessage } from '../core/errors.js'

export interface StoreConfig {
  url: string
  key: string
}

// Unset and blank env values both fall back to the default
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v)

const intVar = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback))

export const EnvSchema = z.object({
  SUPABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  SUPABASE_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  CRAWL_CONCURRENCY: intVar(2, 1, 4),
  CRAWL_NAV_TIMEOUT_MS: intVar(60_000, 1_000),
  CRAWL_SETTLE_MS: intVar(2_000, 0),
  CRAWL_FETCH_ATTEMPTS: intVar(3, 1, 10),
  CRAWL_STORE_ATTEMPTS: intVar(3, 1, 10),
  CRAWL_DEADLINE_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  CRAWL_HEADLESS: z.preprocess(
    blankToUndefined,
    z
      .enum(['true', 'false', '1', '0'])
      .default('true')
      .transform(v => v === 'true' || v === '1')
  ),
  BOARDS_DIR: z.preprocess(blankToUndefined, z.string().default('boards')),
  OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().default('output')),
})

export interface CrawlConfig {
  /** Null only in dry-run mode */
  store: StoreConfig | null
  concurrency: number
  navTimeoutMs: number
  settleMs: number
  fetchAttempts: number
  storeAttempts: number
  deadlineMs: number | null
  headless: boolean
  boardsDir: string
  outputDir: string
}

function formatIssues(error: z.ZodError, prefix = ''): string[] {
  return error.issues.map(i => `${prefix}${i.path.join('.') || '(root)'}: ${i.message}`)
}

export function loadEnvConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: { dryRun?: boolean } = {}
): CrawlConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment configuration', formatIssues(parsed.error))
  }

  const e = parsed.data
  const key = e.SUPABASE_SERVICE_ROLE_KEY ?? e.SUPABASE_KEY
  let store: StoreConfig | null = null

  if (e.SUPABASE_URL && key) {
    store = { url: e.SUPABASE_URL, key }
  } else if (!options.dryRun) {
    const issues: string[] = []
    if (!e.SUPABASE_URL) issues.push('SUPABASE_URL is not set')
    if (!key) issues.push('SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_KEY) is not set')
    throw new ConfigurationError('Missing store credentials', issues)
  }

  return {
    store,
    concurrency: e.CRAWL_CONCURRENCY,
    navTimeoutMs: e.CRAWL_NAV_TIMEOUT_MS,
    settleMs: e.CRAWL_SETTLE_MS,
    fetchAttempts: e.CRAWL_FETCH_ATTEMPTS,
    storeAttempts: e.CRAWL_STORE_ATTEMPTS,
    deadlineMs: e.CRAWL_DEADLINE_MS ?? null,
    headless: e.CRAWL_HEADLESS,
    boardsDir: e.BOARDS_DIR,
    outputDir: e.OUTPUT_DIR,
  }
}

export const BoardSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'lowercase letters, digits, "-" and "_" only'),
  name: z.string().min(1),
  layout: z.enum(LAYOUTS),
  baseUrl: z.string().url(),
  listUrl: z.string().url(),
  pagination: z
    .object({
      param: z.string().min(1).default('page'),
      start: z.number().int().min(0).default(1),
      firstPageBare: z.boolean().default(true),
    })
    .default({}),
  maxPages: z.number().int().min(1).max(50).default(1),
  stopWhenNoNew: z.boolean().default(false),
  keepCount: z.number().int().positive().optional(),
  comparableFields: z.array(z.enum(COMPARABLE_FIELDS)).min(1).optional(),
  utcOffsetMinutes: z.number().int().min(-720).max(840).default(540),
})

export function parseBoard(raw: unknown, origin = ''): BoardSource {
  const parsed = BoardSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid board definition${origin ? ` in ${origin}` : ''}`,
      formatIssues(parsed.error, origin ? `${origin}: ` : '')
    )
  }
  return parsed.data
}

/** Every `*.json` in `dir`, in file-name order */
export function loadBoards(dir: string): BoardSource[] {
  let files: string[]
  try {
    files = readdirSync(dir).filter(f => f.endsWith('.json')).sort()
  } catch (err) {
    throw new ConfigurationError(`Cannot read boards directory ${dir}`, [errorMessage(err)])
  }

  const boards: BoardSource[] = []
  const seen = new Set<string>()

  for (const file of files) {
    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(join(dir, file), 'utf-8'))
    } catch (err) {
      throw new ConfigurationError(`Cannot parse board file ${file}`, [errorMessage(err)])
    }

    const board = parseBoard(raw, file)
    if (seen.has(board.id)) {
      throw new ConfigurationError(`Duplicate board id "${board.id}"`, [`${file}: id "${board.id}" already defined`])
    }
    seen.add(board.id)
    boards.push(board)
  }

  if (boards.length === 0) {
    throw new ConfigurationError(`No board definitions found in ${dir}`)
  }

  return boards
}

/** Narrow to the ids passed with `--board`; unknown ids are a configuration error */
export function selectBoards(boards: BoardSource[], ids: string[]): BoardSource[] {
  if (ids.length === 0) return boards

  const known = new Set(boards.map(b => b.id))
  const unknown = ids.filter(id => !known.has(id))
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Unknown board id${unknown.length > 1 ? 's' : ''}: ${unknown.join(', ')}`,
      [`Configured: ${[...known].join(', ')}`]
    )
  }

  const wanted = new Set(ids)
  return boards.filter(b => wanted.has(b.id))
}
