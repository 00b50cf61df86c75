/**
 * @fileoverview Severity scorer: one 0–10 number per site.
 *
 *   severity = 10 × Σ(weight(type) × confidence) / Σ weight(type)
 *
 * taken over the site's detections, so it is a weighted mean of confidence
 * scaled to 10 (not a sum that grows with the number of detections).
 */

import type { Detection, PatternType } from '../types.js'
import { getSeverityWeights, severityWeightsSchema, type SeverityWeights } from '../data/index.js'
import { ConfigurationError } from '../utils/errors.js'

export type SeverityBand = 'low' | 'medium' | 'high'

/**
 * Validate a weight table: every pattern type present, each in (0, 1], no
 * unknown keys.
 */
export function validateSeverityWeights(weights: unknown): SeverityWeights {
  const result = severityWeightsSchema.safeParse(weights)
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid severity weights',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return result.data
}

export class SeverityScorer {
  private readonly weights: Readonly<Record<PatternType, number>>

  /**
   * @param weights - Weight table; defaults to severity-weights.json
   */
  constructor(weights?: unknown) {
    this.weights = weights === undefined ? getSeverityWeights() : validateSeverityWeights(weights)
  }

  weightOf(patternType: PatternType): number {
    return this.weights[patternType]
  }

  /**
   * Severity of a site, rounded to one decimal. No detections → 0.
   */
  score(detections: readonly Detection[]): number {
    if (detections.length === 0) return 0

    let weighted = 0
    let total = 0
    for (const detection of detections) {
      const weight = this.weights[detection.patternType]
      weighted += weight * detection.confidence
      total += weight
    }
    if (total === 0) return 0

    const severity = Math.min(10, Math.max(0, (10 * weighted) / total))
    return Math.round(severity * 10) / 10
  }
}

/**
 * Qualitative band for a severity score.
 */
export function severityBand(score: number): SeverityBand {
  if (score >= 7) return 'high'
  if (score >= 4) return 'medium'
  return 'low'
}
