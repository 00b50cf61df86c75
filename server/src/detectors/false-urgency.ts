/**
 * @fileoverview False urgency: countdowns and scarcity claims that are not
 * backed by a real deadline or stock level.
 *
 * Signals (each 0 or 1, weighted):
 * - repeatedScarcity:   the same "only N left" claim shown more than once
 * - staticCountdown:    a countdown with no machine-readable end time
 * - unreasonableTarget: a countdown ending in the past or implausibly far out
 * - repeatedCountdown:  several countdowns showing the same value
 * - urgencyLanguage:    pressure phrases ("hurry", "last chance")
 *
 * Nothing is reported unless at least minSignals signals fire.
 */

import type { DomNode, JsonValue, PageSnapshot, PatternType } from '../types.js'
import { falseUrgencyRulesSchema, loadDetectorRules, type FalseUrgencyRules } from '../data/index.js'
import { BaseDetector, type DetectorOptions, type Finding } from './base.js'
import { compilePatterns, describeNode, getAttr, matchClassTerms, matchTerms, normalizeText, walk } from './dom.js'

/** hh:mm or hh:mm:ss as rendered by timer widgets */
const TIME_PATTERN = /\b\d{1,2}:\d{2}(?::\d{2})?\b/

/** Children that may carry a countdown's digits without being a widget of their own */
const INLINE_TAGS = new Set(['span', 'b', 'strong', 'em', 'i', 'time', 'mark', 'small'])

type Signal = 'repeatedScarcity' | 'staticCountdown' | 'unreasonableTarget' | 'repeatedCountdown' | 'urgencyLanguage'

interface Countdown {
  node: DomNode
  text: string
  target: string | null
}

interface ScarcityClaim {
  node: DomNode
  text: string
  count: number
}

/**
 * Parse a countdown target: epoch seconds, epoch milliseconds or a date string.
 */
export function parseTargetTime(value: string): number | null {
  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) {
    const n = Number(trimmed)
    return n > 1e12 ? n : n * 1000
  }
  const parsed = Date.parse(trimmed)
  return Number.isNaN(parsed) ? null : parsed
}

export class FalseUrgencyDetector extends BaseDetector<FalseUrgencyRules> {
  readonly name = 'false_urgency'
  readonly patternType: PatternType = 'false_urgency'

  private readonly scarcityPatterns: RegExp[]

  constructor(options: DetectorOptions<FalseUrgencyRules> = {}) {
    super(() => loadDetectorRules('false_urgency', falseUrgencyRulesSchema), options)
    this.scarcityPatterns = compilePatterns(this.rules.lexicon.scarcityPatterns)
  }

  protected analyze(root: DomNode, snapshot: PageSnapshot): Finding[] {
    const { lexicon, params } = this.rules
    const countdowns: Countdown[] = []
    const claims: ScarcityClaim[] = []

    walk(root, (node) => {
      if (this.isCountdown(node)) {
        countdowns.push({ node, text: normalizeText(node.text), target: this.targetOf(node) })
        return false
      }
      const claim = this.scarcityClaim(node)
      if (claim) claims.push(claim)
      return undefined
    })

    const captured = Date.parse(snapshot.capturedAt)
    const horizonMs = params.maxHorizonHours * 3_600_000
    const unreasonable = countdowns.filter((c) => {
      const target = c.target === null ? null : parseTargetTime(c.target)
      if (target === null || Number.isNaN(captured)) return false
      const remaining = target - captured
      return remaining <= 0 || remaining > horizonMs
    })

    const urgency = matchTerms(normalizeText(snapshot.textContent || root.text), lexicon.urgencyPhrases)

    const signals: Record<Signal, number> = {
      repeatedScarcity: hasRepeat(claims.map((c) => String(c.count))) ? 1 : 0,
      staticCountdown: countdowns.some((c) => c.target === null) ? 1 : 0,
      unreasonableTarget: unreasonable.length > 0 ? 1 : 0,
      repeatedCountdown: hasRepeat(countdowns.map((c) => c.text).filter((t) => t.length > 0)) ? 1 : 0,
      urgencyLanguage: urgency.length > 0 ? 1 : 0,
    }

    const fired = Object.values(signals).filter((v) => v > 0).length
    if (fired < params.minSignals) return []

    const { weights } = this
    const confidence =
      weights.repeatedScarcity * signals.repeatedScarcity +
      weights.staticCountdown * signals.staticCountdown +
      weights.unreasonableTarget * signals.unreasonableTarget +
      weights.repeatedCountdown * signals.repeatedCountdown +
      weights.urgencyLanguage * signals.urgencyLanguage

    const anchor: DomNode | undefined = countdowns[0]?.node ?? claims[0]?.node
    const countdownEvidence: JsonValue[] = countdowns.map((c) => ({ text: c.text, target: c.target }))
    const claimEvidence: JsonValue[] = claims.map((c) => ({ text: c.text, count: c.count }))

    return [
      {
        confidence: Math.min(1, confidence),
        location: anchor ? describeNode(anchor) : 'page',
        node: anchor,
        evidence: {
          signals,
          countdowns: countdownEvidence,
          scarcityClaims: claimEvidence,
          urgencyPhrases: urgency,
        },
      },
    ]
  }

  /**
   * A timer widget by class/id, or an element pairing a clock value with a
   * cue like "ends in" where the clock sits in its own text or an inline child.
   */
  private isCountdown(node: DomNode): boolean {
    if (matchClassTerms(node, this.rules.lexicon.countdownTokens).length > 0) return true
    const text = normalizeText(node.text)
    if (!TIME_PATTERN.test(text) || matchTerms(text, this.rules.lexicon.countdownCues).length === 0) return false
    return node.children.every((child) => INLINE_TAGS.has(child.tag) || !TIME_PATTERN.test(child.text))
  }

  /** First target attribute on the countdown or inside it */
  private targetOf(node: DomNode): string | null {
    for (const name of this.rules.lexicon.targetAttributes) {
      const value = getAttr(node, name)
      if (value) return value
    }
    for (const child of node.children) {
      const value = this.targetOf(child)
      if (value) return value
    }
    return null
  }

  /** The deepest element carrying an "only N left" style claim */
  private scarcityClaim(node: DomNode): ScarcityClaim | null {
    const text = normalizeText(node.text)
    for (const pattern of this.scarcityPatterns) {
      const match = pattern.exec(text)
      if (!match) continue
      const childMatches = node.children.some((child) => pattern.test(normalizeText(child.text)))
      if (childMatches) return null
      return { node, text: node.text, count: Number(match[1]) }
    }
    return null
  }
}

function hasRepeat(values: readonly string[]): boolean {
  return new Set(values).size < values.length
}
