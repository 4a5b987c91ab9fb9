import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import * as path from 'node:path'
import { fileURLToPath } from 'node:url'
import { ConfigurationError } from '../core/errors.js'
import { loadBoards, loadEnvConfig, parseBoard, selectBoards } from './config.js'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

const CREDS = { SUPABASE_URL: 'https://test-project.supabase.co', SUPABASE_SERVICE_ROLE_KEY: 'test-secret' }

function board(id: string, extra: Record<string, unknown> = {}) {
  return {
    id,
    name: `Board ${id}`,
    layout: 'dealbada',
    baseUrl: 'https://www.example.com',
    listUrl: `https://www.example.com/${id}`,
    ...extra,
  }
}

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn()
  } catch (err) {
    if (err instanceof ConfigurationError) return err
    throw err
  }
  throw new Error('expected a ConfigurationError')
}

describe('loadEnvConfig', () => {
  it('applies defaults around the store credentials', () => {
    const config = loadEnvConfig(CREDS)
    expect(config).toEqual({
      store: { url: 'https://test-project.supabase.co', key: 'test-secret' },
      concurrency: 2,
      navTimeoutMs: 60_000,
      settleMs: 2_000,
      fetchAttempts: 3,
      storeAttempts: 3,
      deadlineMs: null,
      headless: true,
      boardsDir: 'boards',
      outputDir: 'output',
    })
  })

  it('accepts SUPABASE_KEY as a fallback key', () => {
    const config = loadEnvConfig({ SUPABASE_URL: CREDS.SUPABASE_URL, SUPABASE_KEY: 'test-fallback' })
    expect(config.store?.key).toBe('test-fallback')
  })

  it('reports every missing credential', () => {
    const err = configError(() => loadEnvConfig({}))
    expect(err.issues).toEqual([
      'SUPABASE_URL is not set',
      'SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_KEY) is not set',
    ])
  })

  it('needs no credentials for a dry run', () => {
    expect(loadEnvConfig({}, { dryRun: true }).store).toBeNull()
  })

  it('parses tuning variables and treats blanks as unset', () => {
    const config = loadEnvConfig({
      ...CREDS,
      CRAWL_CONCURRENCY: '4',
      CRAWL_SETTLE_MS: '',
      CRAWL_DEADLINE_MS: '900000',
      CRAWL_HEADLESS: 'false',
      OUTPUT_DIR: '/tmp/crawl-out',
    })
    expect(config.concurrency).toBe(4)
    expect(config.settleMs).toBe(2_000)
    expect(config.deadlineMs).toBe(900_000)
    expect(config.headless).toBe(false)
    expect(config.outputDir).toBe('/tmp/crawl-out')
  })

  it('rejects concurrency outside 1..4', () => {
    const err = configError(() => loadEnvConfig({ ...CREDS, CRAWL_CONCURRENCY: '8' }))
    expect(err.issues).toHaveLength(1)
    expect(err.issues[0]).toMatch(/^CRAWL_CONCURRENCY: /)
  })

  it('rejects a malformed store URL', () => {
    expect(() => loadEnvConfig({ ...CREDS, SUPABASE_URL: 'not a url' })).toThrow(ConfigurationError)
  })
})

describe('parseBoard', () => {
  it('fills pagination and clock defaults', () => {
    expect(parseBoard(board('test'))).toEqual({
      id: 'test',
      name: 'Board test',
      layout: 'dealbada',
      baseUrl: 'https://www.example.com',
      listUrl: 'https://www.example.com/test',
      pagination: { param: 'page', start: 1, firstPageBare: true },
      maxPages: 1,
      stopWhenNoNew: false,
      utcOffsetMinutes: 540,
    })
  })

  it('rejects unknown layouts and comparable fields', () => {
    expect(() => parseBoard(board('test', { layout: 'phpbb' }))).toThrow(ConfigurationError)
    expect(() => parseBoard(board('test', { comparableFields: ['price'] }))).toThrow(ConfigurationError)
  })

  it('prefixes issues with the file name', () => {
    const err = configError(() => parseBoard(board('test', { maxPages: 0 }), 'test.json'))
    expect(err.message).toBe('Invalid board definition in test.json')
    expect(err.issues[0]).toMatch(/^test\.json: maxPages: /)
  })
})

describe('loadBoards', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'boards-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('loads boards in file-name order', () => {
    writeFileSync(path.join(dir, 'b.json'), JSON.stringify(board('second')))
    writeFileSync(path.join(dir, 'a.json'), JSON.stringify(board('first')))
    writeFileSync(path.join(dir, 'notes.txt'), 'ignored')
    expect(loadBoards(dir).map(b => b.id)).toEqual(['first', 'second'])
  })

  it('rejects duplicate ids', () => {
    writeFileSync(path.join(dir, 'a.json'), JSON.stringify(board('same')))
    writeFileSync(path.join(dir, 'b.json'), JSON.stringify(board('same')))
    expect(() => loadBoards(dir)).toThrow('Duplicate board id "same"')
  })

  it('rejects invalid JSON and empty directories', () => {
    expect(() => loadBoards(dir)).toThrow(ConfigurationError)
    writeFileSync(path.join(dir, 'a.json'), '{ nope')
    expect(() => loadBoards(dir)).toThrow('Cannot parse board file a.json')
  })

  it('rejects a missing directory', () => {
    expect(() => loadBoards(path.join(dir, 'missing'))).toThrow(ConfigurationError)
  })

  it('accepts the shipped board definitions', () => {
    const boards = loadBoards(path.join(__dirname, '..', '..', 'boards'))
    expect(boards.map(b => b.id)).toEqual([
      'arcalive',
      'bbasak_overseas',
      'clien',
      'coolenjoy',
      'dealbada',
      'eomisae_rt',
      'quasarzone',
      'ruliweb',
    ])
    expect(boards.every(b => b.keepCount === 200)).toBe(true)
  })
})

describe('selectBoards', () => {
  const boards = [parseBoard(board('a')), parseBoard(board('b')), parseBoard(board('c'))]

  it('returns every board without a selection', () => {
    expect(selectBoards(boards, [])).toBe(boards)
  })

  it('keeps configured order', () => {
    expect(selectBoards(boards, ['c', 'a']).map(b => b.id)).toEqual(['a', 'c'])
  })

  it('rejects unknown ids', () => {
    expect(() => selectBoards(boards, ['a', 'zz'])).toThrow('Unknown board id: zz')
  })
})
