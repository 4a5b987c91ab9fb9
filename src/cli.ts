#!/usr/bin/env node
/**
 * CLI runner for the hot-deal crawler.
 *
 * Usage:
 *   npm run crawl                         Crawl every board in boards/
 *   npm run crawl -- --board clien        Crawl one board (repeatable)
 *   npm run crawl -- --dry-run            Use the in-process store; nothing persisted
 *   npm run crawl -- --list               List configured boards
 *
 * Exits 0 once a run has finished, even when some sources failed; exits 1
 * only when the run cannot start.
 */

import 'dotenv/config'

import { resolve } from 'node:path'
import { adapters } from './platforms/index.js'
import { PlaywrightLauncher } from './core/browser.js'
import { ConfigurationError } from './core/errors.js'
import { RunCoordinator } from './core/runner.js'
import type { DealStore } from './core/store.js'
import { SupabaseDealStore } from './core/supabase-store.js'
import { printRunSummary, saveRunReport } from './core/summary.js'
import { loadBoards, loadEnvConfig, selectBoards } from './lib/config.js'
import { InMemoryDealStore } from './lib/memory-store.js'
import { createSupabase } from './lib/supabase.js'

const args = process.argv.slice(2)

function getFlags(name: string): string[] {
  const values: string[] = []
  args.forEach((arg, i) => {
    const value = args[i + 1]
    if (arg === `--${name}` && value !== undefined && !value.startsWith('--')) values.push(value)
  })
  return values
}

function hasFlag(name: string): boolean {
  return args.includes(`--${name}`)
}

async function main(): Promise<number> {
  const dryRun = hasFlag('dry-run')
  const config = loadEnvConfig(process.env, { dryRun: dryRun || hasFlag('list') })
  const allBoards = loadBoards(resolve(config.boardsDir))

  if (hasFlag('list')) {
    console.log('Configured boards:')
    for (const b of allBoards) {
      console.log(`  ${b.id.padEnd(16)} ${b.name.padEnd(24)} [${b.layout}] ${b.maxPages} page(s)`)
    }
    return 0
  }

  const boards = selectBoards(allBoards, getFlags('board'))

  let store: DealStore
  if (config.store && !dryRun) {
    store = new SupabaseDealStore(createSupabase(config.store))
  } else {
    console.log('Dry run: using the in-process store, nothing will be persisted')
    store = new InMemoryDealStore()
  }

  const outputDir = resolve(config.outputDir)
  const coordinator = new RunCoordinator({
    adapters,
    launcher: new PlaywrightLauncher({ headless: config.headless }),
    store,
    concurrency: config.concurrency,
    fetch: {
      timeoutMs: config.navTimeoutMs,
      settleMs: config.settleMs,
      maxAttempts: config.fetchAttempts,
    },
    storePolicy: { maxAttempts: config.storeAttempts, backoffMs: 1_000 },
    artifactDir: outputDir,
  })

  const controller = new AbortController()
  const deadline = config.deadlineMs
    ? setTimeout(() => {
        console.warn(`[run] Deadline of ${config.deadlineMs}ms reached, aborting after current pages`)
        controller.abort()
      }, config.deadlineMs)
    : null
  const onSignal = () => {
    console.warn('[run] Interrupted, aborting after current pages')
    controller.abort()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  try {
    const report = await coordinator.run(boards, { signal: controller.signal })
    printRunSummary(report)

    const reportPath = saveRunReport(report, outputDir)
    if (reportPath) console.log(`  Report: ${reportPath}`)
    return 0
  } finally {
    if (deadline) clearTimeout(deadline)
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
  }
}

main()
  .then(code => process.exit(code))
  .catch(err => {
    if (err instanceof ConfigurationError) {
      console.error(`Configuration error: ${err.message}`)
      for (const issue of err.issues) console.error(`  - ${issue}`)
    } else {
      console.error('Fatal error:', err)
    }
    process.exit(1)
  })
