/**
 * Debug artifact writer. Saves the fetched markup and the mismatch details
 * when a page no longer matches its layout, so selectors can be fixed
 * against the exact HTML the crawler saw.
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import type { RawPage } from '../schema/deal.js'
import type { ExtractionMismatch } from './extractor.js'

/** Returns the directory the artifact was written to */
export function saveMismatchArtifact(
  page: RawPage,
  mismatch: ExtractionMismatch,
  outputDir: string
): string {
  const stamp = page.fetchedAt.replace(/[:.]/g, '-').slice(0, 19)
  const debugDir = join(outputDir, 'debug', page.sourceId, stamp)
  mkdirSync(debugDir, { recursive: true })

  writeFileSync(join(debugDir, 'page.html'), page.markup, 'utf-8')

  const errorInfo = {
    kind: mismatch.kind,
    message: mismatch.message,
    selector: mismatch.selector,
    url: page.url,
    status: page.status,
    fetchedAt: page.fetchedAt,
  }
  writeFileSync(join(debugDir, 'error.json'), JSON.stringify(errorInfo, null, 2) + '\n', 'utf-8')

  console.log(`  Debug artifact saved to ${debugDir}`)
  return debugDir
}
