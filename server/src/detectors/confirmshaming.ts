/**
 * @fileoverview Confirmshaming: decline options worded to guilt or shame
 * the user ("No thanks, I enjoy paying full price").
 *
 * Each button, link or label is scored on three signals:
 * - phraseMatch:  closeness to a known shaming phrase (exact = 1, fuzzy = overlap × fuzzyFactor)
 * - negationLoss: negation plus loss framing (1), loss framing alone (0.5)
 * - dismissRole:  a decline/dismiss marker in text or attributes (1), any other
 *                 button or link (0.5)
 */

import type { DomNode, PatternType } from '../types.js'
import { confirmshamingRulesSchema, loadDetectorRules, type ConfirmshamingRules } from '../data/index.js'
import { BaseDetector, type DetectorOptions, type Finding } from './base.js'
import {
  containsTerm,
  describeNode,
  interactiveLabel,
  isInteractive,
  matchClassTerms,
  matchTerms,
  normalizeText,
  tokenize,
  walk,
} from './dom.js'

/** Class or id parts that mark a control as a dismiss button */
const DISMISS_CLASS_TERMS = ['close', 'dismiss', 'decline', 'reject', 'cancel', 'optout']

interface PhraseMatch {
  phrase: string
  kind: 'exact' | 'fuzzy'
  score: number
}

export class ConfirmshamingDetector extends BaseDetector<ConfirmshamingRules> {
  readonly name = 'confirmshaming'
  readonly patternType: PatternType = 'confirmshaming'

  constructor(options: DetectorOptions<ConfirmshamingRules> = {}) {
    super(() => loadDetectorRules('confirmshaming', confirmshamingRulesSchema), options)
  }

  protected analyze(root: DomNode): Finding[] {
    const findings: Finding[] = []
    walk(root, (node) => {
      if (!isInteractive(node) && node.tag !== 'label') return
      const label = interactiveLabel(node)
      if (label && label.length <= this.rules.params.maxTextLength) {
        const finding = this.score(node, label)
        if (finding) findings.push(finding)
      }
      // Anything nested inside a control is part of its label
      return false
    })
    return findings
  }

  private score(node: DomNode, label: string): Finding | null {
    const { lexicon } = this.rules
    const text = normalizeText(label)

    const phrase = this.matchPhrase(text)
    const negations = matchTerms(text, lexicon.negationWords)
    const losses = matchTerms(text, lexicon.lossWords)
    if (!phrase && losses.length === 0) return null

    const negationLoss = losses.length === 0 ? 0 : negations.length > 0 ? 1 : 0.5
    const marker = lexicon.dismissMarkers.find((m) => startsWithTerm(text, normalizeText(m))) ?? null
    const dismissRole = this.dismissRole(node, marker)

    const confidence =
      this.weights.phraseMatch * (phrase?.score ?? 0) +
      this.weights.negationLoss * negationLoss +
      this.weights.dismissRole * dismissRole

    return {
      confidence,
      location: describeNode(node),
      node,
      evidence: {
        text: label,
        matchedPhrase: phrase?.phrase ?? null,
        matchType: phrase?.kind ?? null,
        phraseScore: phrase ? Math.round(phrase.score * 1000) / 1000 : 0,
        negationWords: negations,
        lossWords: losses,
        dismissMarker: marker,
      },
    }
  }

  private dismissRole(node: DomNode, marker: string | null): number {
    if (marker || matchClassTerms(node, DISMISS_CLASS_TERMS).length > 0) return 1
    return isInteractive(node) ? 0.5 : 0
  }

  /**
   * Best phrase match: a verbatim occurrence wins outright, otherwise the
   * phrase whose words are most covered by the text.
   */
  private matchPhrase(text: string): PhraseMatch | null {
    const { phrases } = this.rules.lexicon
    const { fuzzyThreshold, fuzzyFactor } = this.rules.params

    const exact = phrases.find((phrase) => containsTerm(text, phrase))
    if (exact) return { phrase: exact, kind: 'exact', score: 1 }

    const words = new Set(tokenize(text))
    let best: PhraseMatch | null = null
    for (const phrase of phrases) {
      const phraseWords = tokenize(phrase)
      const overlap = phraseWords.filter((word) => words.has(word)).length / phraseWords.length
      if (overlap >= fuzzyThreshold) {
        const score = overlap * fuzzyFactor
        if (!best || score > best.score) {
          best = { phrase, kind: 'fuzzy', score }
        }
      }
    }
    return best
  }
}

function startsWithTerm(text: string, term: string): boolean {
  return text.startsWith(term) && !/[\p{L}\p{N}]/u.test(text.charAt(term.length))
}
