/**
 * @fileoverview Type definitions for the dark pattern scanner.
 * Contains the page snapshot consumed by detectors, the detection unit they
 * emit, and the per-site and cross-site report structures.
 */

// ============================================================================
// Pattern Types
// ============================================================================

/** Every pattern the scanner knows, in canonical report order */
export const PATTERN_TYPES = [
  'confirmshaming',
  'preselection',
  'hidden_costs',
  'difficult_cancellation',
  'misleading_ads',
  'false_urgency',
  'confusing_interface',
] as const

/** One of the fixed dark pattern categories (never free text) */
export type PatternType = (typeof PATTERN_TYPES)[number]

/** Any value that survives a JSON round trip */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

// ============================================================================
// Page Snapshot
// ============================================================================

/**
 * One element of the rendered DOM.
 * Text nodes are folded into the `text` of every enclosing element.
 */
export interface DomNode {
  /** Lower-case tag name (e.g., 'button', 'input') */
  readonly tag: string
  /** Attribute name → value; boolean attributes carry an empty string */
  readonly attributes: Readonly<Record<string, string>>
  /** Visible text of the whole subtree in document order, whitespace-collapsed, original case */
  readonly text: string
  /** Child elements in document order */
  readonly children: readonly DomNode[]
}

/**
 * Immutable capture of one page load, shared read-only by every detector.
 */
export interface PageSnapshot {
  /** The analyzed page address */
  readonly url: string
  /** Document title ('' when absent) */
  readonly title: string
  /** Root of the DOM (the body element), or null when no DOM could be extracted */
  readonly domTree: DomNode | null
  /** Visible text, lower-cased and whitespace-collapsed */
  readonly textContent: string
  /** Logical name ('full', 'viewport', 'element:<id>') → stored image path */
  readonly screenshotRefs: Readonly<Record<string, string>>
  /** ISO timestamp of when the page was captured */
  readonly capturedAt: string
}

// ============================================================================
// Detections
// ============================================================================

/**
 * A single flagged dark pattern instance. Frozen once created.
 */
export interface Detection {
  readonly patternType: PatternType
  /** Heuristic composite in [0, 1] (not a probability) */
  readonly confidence: number
  /** Human-readable place on the page (selector, snippet or region) */
  readonly location: string
  /** Supporting data: matched phrases, attribute values, counts */
  readonly evidence: Readonly<Record<string, JsonValue>>
  /** Key into the snapshot's screenshotRefs, when one applies */
  readonly screenshotRef: string | null
  /** Source page */
  readonly url: string
}

/**
 * A detector that threw while scanning a page.
 */
export interface DetectorFailure {
  readonly detector: string
  readonly patternType: PatternType
  readonly error: string
}

// ============================================================================
// Reports
// ============================================================================

/**
 * Everything the scanner concluded about one analyzed URL.
 */
export interface SiteReport {
  readonly url: string
  readonly title: string
  /** ISO timestamp of when the report was assembled */
  readonly timestamp: string
  readonly detections: readonly Detection[]
  /** Weighted-mean severity, 0–10, one decimal */
  readonly severityScore: number
  /** Distinct pattern types found, in canonical order */
  readonly patternTypesPresent: readonly PatternType[]
  /** Detectors that crashed on this page */
  readonly failures: readonly DetectorFailure[]
  readonly screenshotRefs: Readonly<Record<string, string>>
}

/**
 * Outcome of one URL in a batch. A failed site carries no detection list at
 * all, which keeps "no data" apart from "zero detections".
 */
export type SiteResult =
  | { readonly status: 'analyzed'; readonly url: string; readonly report: SiteReport }
  | { readonly status: 'failed'; readonly url: string; readonly error: string; readonly timestamp: string }
  | { readonly status: 'skipped'; readonly url: string }

/** Per-site digest used in rankings and summary views */
export interface SiteSummary {
  readonly url: string
  readonly title: string
  readonly timestamp: string
  readonly detectionCount: number
  readonly patternTypes: readonly PatternType[]
  readonly severityScore: number
}

/**
 * Cross-site statistics, recomputed on demand from site results.
 */
export interface AggregateReport {
  /** Every site result, whatever its status */
  readonly totalSites: number
  /** Distinct URLs across all results */
  readonly totalUrls: number
  readonly analyzedSites: number
  readonly failedSites: number
  readonly skippedSites: number
  /** Detections across analyzed sites */
  readonly totalDetections: number
  readonly patternDistribution: Readonly<Record<PatternType, number>>
  /** Mean severity over analyzed sites (0 when none) */
  readonly averageSeverity: number
  readonly topSites: readonly SiteSummary[]
  readonly failures: readonly { readonly url: string; readonly error: string }[]
}

/** Output formats understood by the exporters */
export const REPORT_FORMATS = ['json', 'html', 'csv'] as const
export type ReportFormat = (typeof REPORT_FORMATS)[number]

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value)
}
