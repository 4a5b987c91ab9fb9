/**
 * Run report builder. Totals the per-source reports, derives the overall
 * status and writes the report as JSON.
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import type { RunReport, SourceReport } from '../schema/deal.js'
import { errorMessage } from './errors.js'

export function buildRunReport(
  runId: string,
  startedAt: Date,
  finishedAt: Date,
  sources: SourceReport[]
): RunReport {
  const sum = (pick: (s: SourceReport) => number) => sources.reduce((n, s) => n + pick(s), 0)
  const failedSources = sources.filter(s => s.status === 'Failed').length

  return {
    runId,
    // Degraded sources still finished; only a Failed one makes the run partial
    status: failedSources === 0 ? 'Completed' : 'PartiallyFailed',
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    sources,
    totals: {
      pagesFetched: sum(s => s.pagesFetched),
      candidatesFound: sum(s => s.candidatesFound),
      newCount: sum(s => s.newCount),
      updatedCount: sum(s => s.updatedCount),
      failedSources,
      degradedSources: sources.filter(s => s.status === 'Degraded').length,
    },
  }
}

export function printRunSummary(report: RunReport): void {
  console.log('\n=== RUN SUMMARY ===')
  for (const s of report.sources) {
    console.log(
      `  ${s.status.padEnd(9)} ${s.sourceId}: ${s.newCount} new, ${s.updatedCount} updated, ` +
        `${s.pagesFetched} pages, ${(s.durationMs / 1000).toFixed(1)}s`
    )
    for (const e of s.errors) {
      console.log(`            ${e.kind}: ${e.message}`)
    }
  }
  const t = report.totals
  console.log(`  Status: ${report.status}`)
  console.log(`  New: ${t.newCount}  Updated: ${t.updatedCount}  Pages: ${t.pagesFetched}`)
  console.log(`  Failed: ${t.failedSources}  Degraded: ${t.degradedSources}`)
  console.log(`  Duration: ${(report.durationMs / 1000).toFixed(1)}s`)
}

export function writeReport(report: RunReport, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true })
  writeFileSync(outputPath, JSON.stringify(report, null, 2) + '\n', 'utf-8')
}

/**
 * Write the report to `<outputDir>/runs/<startedAt>.json`. The run has
 * already finished, so a failed write is logged and yields null.
 */
export function saveRunReport(report: RunReport, outputDir: string): string | null {
  const stamp = report.startedAt.replace(/[:.]/g, '-').slice(0, 19)
  const reportPath = join(outputDir, 'runs', `${stamp}.json`)
  try {
    writeReport(report, reportPath)
    return reportPath
  } catch (err) {
    console.warn(`[run] Failed to write report to ${reportPath}: ${errorMessage(err)}`)
    return null
  }
}
