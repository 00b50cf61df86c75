/**
 * @fileoverview Report aggregator: builds the per-site report from a
 * registry run and folds site results into cross-site statistics.
 *
 * Aggregates are recomputed from the site results every time they are
 * asked for; nothing here keeps running totals.
 */

import type {
  AggregateReport,
  Detection,
  DetectorFailure,
  PageSnapshot,
  PatternType,
  SiteReport,
  SiteResult,
  SiteSummary,
} from '../types.js'
import { PATTERN_TYPES } from '../types.js'
import type { RegistryRun } from './registry.js'
import type { SeverityScorer } from './severity.js'

// ============================================================================
// Improvement Suggestions
// ============================================================================

/** Remediation advice shown next to each pattern group in exported reports */
export const PATTERN_SUGGESTIONS: Readonly<Record<PatternType, readonly string[]>> = {
  confirmshaming: [
    'Use neutral wording for decline options, e.g. "No, thanks".',
    'Do not attach guilt or loss framing to the choice of declining.',
  ],
  preselection: [
    'Leave opt-ins for marketing, data sharing and paid extras unchecked by default.',
    'Give opt-in labels the same size and contrast as the rest of the form.',
  ],
  hidden_costs: [
    'Show the full price, fees and taxes included, from the first step.',
    'List every mandatory charge before the final confirmation screen.',
  ],
  difficult_cancellation: [
    'Offer an online cancellation path as easy as the sign-up path.',
    'Do not require phone calls, letters or notice periods to cancel.',
  ],
  misleading_ads: [
    'Label advertising clearly as "Ad" or "Sponsored".',
    'Do not style ads as download buttons or other page controls.',
  ],
  false_urgency: [
    'Only show countdowns that reflect a real, fixed deadline.',
    'Only show stock levels that reflect real inventory.',
  ],
  confusing_interface: [
    'Give accept and reject options equal visual weight.',
    'Use the same control type (button or link) for both choices.',
  ],
}

// ============================================================================
// Per-Site Report
// ============================================================================

/**
 * Detections of one pattern type on one site.
 */
export interface PatternGroup {
  patternType: PatternType
  count: number
  maxConfidence: number
  detections: Detection[]
  suggestions: readonly string[]
}

/** Canonical-order, de-duplicated pattern types of a detection list */
export function distinctPatternTypes(detections: readonly Detection[]): PatternType[] {
  const present = new Set(detections.map((d) => d.patternType))
  return PATTERN_TYPES.filter((type) => present.has(type))
}

/**
 * Group detections by pattern type, canonical order, only types present.
 */
export function groupByPattern(detections: readonly Detection[]): PatternGroup[] {
  return distinctPatternTypes(detections).map((patternType) => {
    const group = detections.filter((d) => d.patternType === patternType)
    return {
      patternType,
      count: group.length,
      maxConfidence: Math.max(...group.map((d) => d.confidence)),
      detections: group,
      suggestions: PATTERN_SUGGESTIONS[patternType],
    }
  })
}

/**
 * Assemble the report for one analyzed page.
 */
export function buildSiteReport(
  snapshot: PageSnapshot,
  run: RegistryRun,
  scorer: SeverityScorer,
  timestamp: string = new Date().toISOString(),
): SiteReport {
  const detections = [...run.detections]
  const failures: DetectorFailure[] = [...run.failures]
  return {
    url: snapshot.url,
    title: snapshot.title,
    timestamp,
    detections,
    severityScore: scorer.score(detections),
    patternTypesPresent: distinctPatternTypes(detections),
    failures,
    screenshotRefs: { ...snapshot.screenshotRefs },
  }
}

export function summarizeSite(report: SiteReport): SiteSummary {
  return {
    url: report.url,
    title: report.title,
    timestamp: report.timestamp,
    detectionCount: report.detections.length,
    patternTypes: report.patternTypesPresent,
    severityScore: report.severityScore,
  }
}

// ============================================================================
// Cross-Site Aggregation
// ============================================================================

function emptyDistribution(): Record<PatternType, number> {
  return {
    confirmshaming: 0,
    preselection: 0,
    hidden_costs: 0,
    difficult_cancellation: 0,
    misleading_ads: 0,
    false_urgency: 0,
    confusing_interface: 0,
  }
}

/**
 * Ranking order: more detections first, then higher severity, then the
 * earlier analysis, then URL.
 */
export function compareSites(a: SiteSummary, b: SiteSummary): number {
  return (
    b.detectionCount - a.detectionCount ||
    b.severityScore - a.severityScore ||
    Date.parse(a.timestamp) - Date.parse(b.timestamp) ||
    a.url.localeCompare(b.url)
  )
}

/**
 * Fold site results into cross-site statistics. Failed and skipped sites
 * are counted but contribute nothing to the distribution or the ranking.
 *
 * @param results - Every site result of a batch (or several batches)
 * @param topN - How many sites to keep in the ranking
 */
export function aggregate(results: readonly SiteResult[], topN = 10): AggregateReport {
  const distribution = emptyDistribution()
  const summaries: SiteSummary[] = []
  const failures: { url: string; error: string }[] = []
  let skipped = 0
  let totalDetections = 0

  for (const result of results) {
    switch (result.status) {
      case 'analyzed':
        for (const detection of result.report.detections) {
          distribution[detection.patternType]++
        }
        totalDetections += result.report.detections.length
        summaries.push(summarizeSite(result.report))
        break
      case 'failed':
        failures.push({ url: result.url, error: result.error })
        break
      case 'skipped':
        skipped++
        break
    }
  }

  const severitySum = summaries.reduce((sum, s) => sum + s.severityScore, 0)
  const averageSeverity = summaries.length > 0 ? Math.round((severitySum / summaries.length) * 10) / 10 : 0

  return {
    totalSites: results.length,
    totalUrls: new Set(results.map((r) => r.url)).size,
    analyzedSites: summaries.length,
    failedSites: failures.length,
    skippedSites: skipped,
    totalDetections,
    patternDistribution: distribution,
    averageSeverity,
    topSites: [...summaries].sort(compareSites).slice(0, Math.max(0, topN)),
    failures,
  }
}
