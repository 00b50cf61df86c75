/**
 * @fileoverview The detector contract and the shared base class.
 *
 * A detector turns one page snapshot into zero or more detections of its
 * own pattern type. It never mutates the snapshot, never does I/O, and
 * treats an unusable DOM as "nothing found" rather than an error. Any
 * other exception propagates to the registry, which records it as a
 * detector failure for the page.
 */

import type { DomNode, Detection, JsonValue, PageSnapshot, PatternType } from '../types.js'
import { ConfigurationError, SnapshotMalformedError } from '../utils/errors.js'
import { createLogger } from '../utils/logger.js'
import { getAttr } from './dom.js'

const log = createLogger('Detector')

// ============================================================================
// Contract
// ============================================================================

/**
 * Anything the registry can run against a snapshot.
 */
export interface Detector {
  /** Unique registry key, e.g. 'confirmshaming' */
  readonly name: string
  readonly patternType: PatternType
  /** Detections scoring below this are dropped before they are returned */
  readonly minConfidence: number
  detect(snapshot: PageSnapshot): Detection[]
}

/**
 * A candidate produced by a detector's analysis, before thresholding.
 */
export interface Finding {
  confidence: number
  location: string
  evidence: Record<string, JsonValue>
  /** Element the finding is anchored to, used to pick a screenshot */
  node?: DomNode
}

/** Minimal shape every rule file shares */
export interface BaseRules {
  minConfidence: number
  weights: Record<string, number>
}

/**
 * Construction options shared by all detectors.
 */
export interface DetectorOptions<R extends BaseRules> {
  /** Replace the rule file entirely */
  rules?: R
  /** Override individual signal weights */
  weights?: Partial<R['weights']>
  /** Override the rule file's confidence floor */
  minConfidence?: number
}

// ============================================================================
// Detection Factory
// ============================================================================

/**
 * Clamp to [0, 1] and round to three decimals. Non-finite values become 0.
 */
export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0
  return Math.round(Math.min(1, Math.max(0, value)) * 1000) / 1000
}

/**
 * Build a frozen {@link Detection} with a clamped confidence.
 */
export function createDetection(input: {
  patternType: PatternType
  confidence: number
  location: string
  evidence?: Record<string, JsonValue>
  screenshotRef?: string | null
  url: string
}): Detection {
  return Object.freeze({
    patternType: input.patternType,
    confidence: clampConfidence(input.confidence),
    location: input.location,
    evidence: Object.freeze({ ...(input.evidence ?? {}) }),
    screenshotRef: input.screenshotRef ?? null,
    url: input.url,
  })
}

/**
 * Pick the screenshot that best shows a finding: the element's own capture
 * when the fetcher took one, else the full page, else the viewport.
 */
export function screenshotRefFor(snapshot: PageSnapshot, node?: DomNode): string | null {
  const id = node ? getAttr(node, 'id') : undefined
  if (id && `element:${id}` in snapshot.screenshotRefs) return `element:${id}`
  if ('full' in snapshot.screenshotRefs) return 'full'
  if ('viewport' in snapshot.screenshotRefs) return 'viewport'
  return null
}

// ============================================================================
// Base Detector
// ============================================================================

/**
 * Common plumbing: rule loading and overrides, the missing-DOM and
 * malformed-DOM policy, confidence filtering and detection assembly.
 * Subclasses implement {@link analyze}.
 */
export abstract class BaseDetector<R extends BaseRules> implements Detector {
  abstract readonly name: string
  abstract readonly patternType: PatternType
  readonly minConfidence: number
  protected readonly rules: R

  constructor(loadRules: () => R, options: DetectorOptions<R> = {}) {
    const base = options.rules ?? loadRules()
    const minConfidence = options.minConfidence ?? base.minConfidence
    if (!Number.isFinite(minConfidence) || minConfidence < 0 || minConfidence > 1) {
      throw new ConfigurationError('Detector minConfidence must be within [0, 1]', [`got ${minConfidence}`])
    }
    for (const [signal, weight] of Object.entries(options.weights ?? {})) {
      if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0 || weight > 1) {
        throw new ConfigurationError('Detector weights must be within [0, 1]', [`${signal}: ${String(weight)}`])
      }
    }
    this.minConfidence = minConfidence
    this.rules = { ...base, minConfidence, weights: { ...base.weights, ...options.weights } }
  }

  protected get weights(): R['weights'] {
    return this.rules.weights
  }

  /**
   * Produce candidate findings for a page. May throw
   * {@link SnapshotMalformedError} when the tree cannot be interpreted.
   */
  protected abstract analyze(root: DomNode, snapshot: PageSnapshot): Finding[]

  detect(snapshot: PageSnapshot): Detection[] {
    const root = snapshot.domTree
    if (!root) {
      log.warn('Snapshot has no DOM tree, skipping', { detector: this.name, url: snapshot.url })
      return []
    }

    let findings: Finding[]
    try {
      findings = this.analyze(root, snapshot)
    } catch (error) {
      if (error instanceof SnapshotMalformedError) {
        log.warn('Malformed DOM, no detections', { detector: this.name, url: snapshot.url, error: error.message })
        return []
      }
      throw error
    }

    const detections = findings
      .filter((finding) => clampConfidence(finding.confidence) > 0)
      .filter((finding) => clampConfidence(finding.confidence) >= this.minConfidence)
      .map((finding) =>
        createDetection({
          patternType: this.patternType,
          confidence: finding.confidence,
          location: finding.location,
          evidence: finding.evidence,
          screenshotRef: screenshotRefFor(snapshot, finding.node),
          url: snapshot.url,
        }),
      )

    log.debug('Detector finished', {
      detector: this.name,
      candidates: findings.length,
      detections: detections.length,
    })
    return detections
  }
}
