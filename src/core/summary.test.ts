import { describe, it, expect, vi, afterEach } from 'vitest'
import * as fs from 'node:fs'
import { tmpdir } from 'node:os'
import * as path from 'node:path'
import type { SourceReport, SourceStatus } from '../schema/deal.js'
import { buildRunReport, printRunSummary, saveRunReport, writeReport } from './summary.js'

function source(sourceId: string, status: SourceStatus, newCount: number): SourceReport {
  return {
    sourceId,
    name: sourceId,
    status,
    pagesFetched: 1,
    candidatesFound: newCount + 1,
    skippedBlocks: 0,
    newCount,
    updatedCount: 1,
    archivedCount: 0,
    errors: status === 'Failed' ? [{ kind: 'FetchHTTPError', message: 'HTTP 404: https://x.example.com' }] : [],
    durationMs: 1_500,
  }
}

const STARTED = new Date('2026-10-19T05:00:00.000Z')
const FINISHED = new Date('2026-10-19T05:00:42.000Z')

describe('buildRunReport', () => {
  it('totals the sources and stays Completed with only degraded ones', () => {
    const report = buildRunReport('run-1', STARTED, FINISHED, [source('a', 'Completed', 2), source('b', 'Degraded', 3)])

    expect(report).toMatchObject({
      runId: 'run-1',
      status: 'Completed',
      startedAt: '2026-10-19T05:00:00.000Z',
      finishedAt: '2026-10-19T05:00:42.000Z',
      durationMs: 42_000,
      totals: {
        pagesFetched: 2,
        candidatesFound: 7,
        newCount: 5,
        updatedCount: 2,
        failedSources: 0,
        degradedSources: 1,
      },
    })
  })

  it('is PartiallyFailed when any source failed', () => {
    const report = buildRunReport('run-2', STARTED, FINISHED, [source('a', 'Completed', 2), source('b', 'Failed', 0)])
    expect(report.status).toBe('PartiallyFailed')
    expect(report.totals.failedSources).toBe(1)
  })

  it('is Completed for an empty run', () => {
    expect(buildRunReport('run-3', STARTED, STARTED, []).status).toBe('Completed')
  })
})

describe('printRunSummary', () => {
  it('prints one line per source and its errors', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    printRunSummary(buildRunReport('run-4', STARTED, FINISHED, [source('b', 'Failed', 0)]))

    const lines = log.mock.calls.map(args => String(args[0]))
    expect(lines).toContain('  Failed    b: 0 new, 1 updated, 1 pages, 1.5s')
    expect(lines).toContain('            FetchHTTPError: HTTP 404: https://x.example.com')
    expect(lines).toContain('  Status: PartiallyFailed')
  })
})

describe('writeReport', () => {
  let dir: string | null = null

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true })
    dir = null
  })

  it('writes the report as JSON, creating directories', () => {
    dir = fs.mkdtempSync(path.join(tmpdir(), 'report-'))
    const report = buildRunReport('run-5', STARTED, FINISHED, [source('a', 'Completed', 1)])
    const target = path.join(dir, 'runs', 'report.json')

    writeReport(report, target)

    expect(JSON.parse(fs.readFileSync(target, 'utf-8'))).toEqual(report)
  })
})

describe('saveRunReport', () => {
  let dir: string | null = null

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true })
    dir = null
  })

  it('names the file after the run start', () => {
    dir = fs.mkdtempSync(path.join(tmpdir(), 'report-'))
    const report = buildRunReport('run-6', STARTED, FINISHED, [])

    expect(saveRunReport(report, dir)).toBe(path.join(dir, 'runs', '2026-10-19T05-00-00.json'))
  })

  it('warns and returns null when the report cannot be written', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    dir = fs.mkdtempSync(path.join(tmpdir(), 'report-'))
    const occupied = path.join(dir, 'output')
    fs.writeFileSync(occupied, 'not a directory')

    expect(saveRunReport(buildRunReport('run-7', STARTED, FINISHED, []), occupied)).toBeNull()
    expect(warn).toHaveBeenCalledTimes(1)
  })
})
