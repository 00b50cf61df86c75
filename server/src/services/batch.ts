/**
 * @fileoverview Batch runner: fetch, detect and score many sites with a
 * bounded worker pool.
 *
 * Each site is independent: a fetch failure or a crashing detector affects
 * that site only. Cancellation is cooperative; sites already started run to
 * completion and sites still queued come back as 'skipped'. Results are
 * returned in input order whatever order the sites finish in.
 */

import pLimit from 'p-limit'
import type { PageSnapshot, SiteReport, SiteResult } from '../types.js'
import { ConfigurationError, createLogger, getErrorMessage } from '../utils/index.js'
import type { FetchOptions, PageFetcher } from './page-fetcher.js'
import { assertConfidenceFloor, type DetectionRegistry } from './registry.js'
import { buildSiteReport } from './report.js'
import type { SeverityScorer } from './severity.js'

const log = createLogger('Batch')

// ============================================================================
// Types
// ============================================================================

/** The collaborators a scan needs, passed explicitly */
export interface ScanDependencies {
  registry: DetectionRegistry
  scorer: SeverityScorer
  fetcher: PageFetcher
}

export interface BatchProgress {
  /** Sites finished so far (analyzed, failed or skipped) */
  completed: number
  total: number
  result: SiteResult
}

export interface BatchOptions extends FetchOptions {
  concurrency: number
  /** Global confidence floor passed to the registry */
  minConfidence: number
  signal?: AbortSignal
  onProgress?: (progress: BatchProgress) => void
}

// ============================================================================
// Single Site
// ============================================================================

/**
 * Run the registry on a snapshot and assemble its report.
 */
export function analyzeSnapshot(
  snapshot: PageSnapshot,
  deps: Pick<ScanDependencies, 'registry' | 'scorer'>,
  minConfidence: number,
): SiteReport {
  const run = deps.registry.runAll(snapshot, minConfidence)
  return buildSiteReport(snapshot, run, deps.scorer)
}

/**
 * Fetch and analyze one URL. Never throws for site-level problems.
 */
export async function analyzeSite(
  url: string,
  deps: ScanDependencies,
  options: FetchOptions & { minConfidence: number },
): Promise<SiteResult> {
  log.section(`Scanning ${url}`)
  try {
    const fetched = await deps.fetcher.fetch(url, options)
    if (!fetched.ok) {
      return { status: 'failed', url, error: fetched.error.message, timestamp: new Date().toISOString() }
    }

    const report = analyzeSnapshot(fetched.snapshot, deps, options.minConfidence)
    log.success('Site analyzed', {
      url,
      detections: report.detections.length,
      severity: report.severityScore,
      detectorFailures: report.failures.length,
    })
    return { status: 'analyzed', url, report }
  } catch (error) {
    if (error instanceof ConfigurationError) throw error
    const message = getErrorMessage(error)
    log.error('Site failed', { url, error: message })
    return { status: 'failed', url, error: message, timestamp: new Date().toISOString() }
  }
}

// ============================================================================
// Batch
// ============================================================================

/**
 * Analyze a list of URLs with at most `concurrency` sites in flight.
 *
 * @throws ConfigurationError before any site is processed when the
 *         confidence floor or the concurrency is invalid
 */
export async function runBatch(
  urls: readonly string[],
  deps: ScanDependencies,
  options: BatchOptions,
): Promise<SiteResult[]> {
  assertConfidenceFloor(options.minConfidence)
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new ConfigurationError('concurrency must be a positive integer', [`got ${options.concurrency}`])
  }

  const limit = pLimit(options.concurrency)
  const total = urls.length
  let completed = 0

  const report = (result: SiteResult): SiteResult => {
    completed++
    options.onProgress?.({ completed, total, result })
    return result
  }

  log.startTimer('batch')
  const results = await Promise.all(
    urls.map((url) =>
      limit(async (): Promise<SiteResult> => {
        if (options.signal?.aborted) {
          return report({ status: 'skipped', url })
        }
        return report(await analyzeSite(url, deps, options))
      }),
    ),
  )
  log.endTimer('batch', `Batch of ${total} site(s) finished`)

  return results
}
