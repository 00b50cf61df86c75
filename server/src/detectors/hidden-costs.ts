/**
 * @fileoverview Hidden costs: charges that appear late in a flow and push
 * the final total above the price shown first.
 *
 * The detector reads every price on the page in document order, takes the
 * first non-total price as the advertised one and the last price on a
 * "total" line as the final one, then scores:
 * - discrepancy:  relative increase, ignored below materialThreshold
 * - extraCharges: fee lines and "not included" disclaimers near the total
 * - finePrint:    any of those charges is rendered as fine print
 *
 * A page without a total is never flagged.
 */

import type { DomNode, JsonValue, PatternType } from '../types.js'
import { hiddenCostsRulesSchema, loadDetectorRules, type HiddenCostsRules } from '../data/index.js'
import { BaseDetector, type DetectorOptions, type Finding } from './base.js'
import {
  commonAncestorDistance,
  compilePatterns,
  describeNode,
  fontSizePx,
  matchClassTerms,
  matchTerms,
  normalizeText,
  walk,
} from './dom.js'

// ============================================================================
// Price Parsing
// ============================================================================

/** A currency amount with a symbol or code before or after it */
const PRICE_PATTERN = /(?:[$€£¥]\s?(\d[\d.,]*))|(?:(\d[\d.,]*)\s?(?:€|£|\b(?:eur|usd|gbp)\b))/gi

/**
 * Parse an amount written with either thousands convention.
 *
 * @example
 * parseAmount('1,299.00') // 1299
 * parseAmount('1.299,00') // 1299
 * parseAmount('49,99')    // 49.99
 */
export function parseAmount(raw: string): number | null {
  let s = raw.replace(/[.,]+$/, '')
  if (/^\d{1,3}(,\d{3})+(\.\d+)?$/.test(s)) {
    s = s.replace(/,/g, '')
  } else if (/^\d{1,3}(\.\d{3})+(,\d+)?$/.test(s)) {
    s = s.replace(/\./g, '').replace(',', '.')
  } else if (/^\d+,\d{1,2}$/.test(s)) {
    s = s.replace(',', '.')
  } else if (!/^\d+(\.\d+)?$/.test(s)) {
    return null
  }
  const value = Number(s)
  return Number.isFinite(value) ? value : null
}

/** Raw price strings and their amounts, in text order */
export function extractPrices(text: string): { raw: string; amount: number }[] {
  const prices: { raw: string; amount: number }[] = []
  for (const match of text.matchAll(PRICE_PATTERN)) {
    const amount = parseAmount(match[1] ?? match[2] ?? '')
    if (amount !== null) prices.push({ raw: match[0], amount })
  }
  return prices
}

// ============================================================================
// Detector
// ============================================================================

/** One price, anchored to the smallest element showing it */
interface PriceToken {
  raw: string
  amount: number
  /** Deepest element containing the price text */
  node: DomNode
  /** Path to the widest ancestor that still shows only this one price */
  line: readonly DomNode[]
  isTotal: boolean
  isFee: boolean
  finePrint: boolean
}

interface Disclaimer {
  text: string
  path: readonly DomNode[]
  finePrint: boolean
}

export class HiddenCostsDetector extends BaseDetector<HiddenCostsRules> {
  readonly name = 'hidden_costs'
  readonly patternType: PatternType = 'hidden_costs'

  private readonly disclaimerPatterns: RegExp[]

  constructor(options: DetectorOptions<HiddenCostsRules> = {}) {
    super(() => loadDetectorRules('hidden_costs', hiddenCostsRulesSchema), options)
    this.disclaimerPatterns = compilePatterns(this.rules.lexicon.disclaimerPatterns)
  }

  protected analyze(root: DomNode): Finding[] {
    const { tokens, disclaimers } = this.collect(root)

    const finalIndex = findLastIndex(tokens, (t) => t.isTotal)
    if (finalIndex < 0) return []
    const final = tokens[finalIndex]

    const earlyIndex = tokens.findIndex((t) => !t.isTotal)
    if (earlyIndex < 0 || earlyIndex > finalIndex) return []
    const early = tokens[earlyIndex]

    const { params } = this.rules
    const near = (path: readonly DomNode[]) => commonAncestorDistance(path, final.line) <= params.proximityLevels

    const fees = tokens.filter(
      (t, i) => i > earlyIndex && i < finalIndex && t.isFee && !t.isTotal && t.amount > 0 && near(t.line),
    )
    const nearDisclaimers = disclaimers.filter((d) => near(d.path))

    const increase = early.amount > 0 ? (final.amount - early.amount) / early.amount : 0
    const discrepancy =
      increase > params.materialThreshold ? Math.min(1, increase / params.discrepancySaturation) : 0
    const extraCharges = Math.min(1, (fees.length + nearDisclaimers.length) / params.extraChargeSaturation)
    const finePrint = fees.some((f) => f.finePrint) || nearDisclaimers.some((d) => d.finePrint) ? 1 : 0

    if (discrepancy === 0 && extraCharges === 0) return []

    const confidence =
      this.weights.discrepancy * discrepancy +
      this.weights.extraCharges * extraCharges +
      this.weights.finePrint * finePrint

    const feeEvidence: JsonValue[] = fees.map((f) => ({
      text: f.line[f.line.length - 1].text,
      amount: f.amount,
      finePrint: f.finePrint,
    }))

    return [
      {
        confidence,
        location: describeNode(final.line[final.line.length - 1]),
        node: final.node,
        evidence: {
          advertisedPrice: early.amount,
          advertisedText: early.raw,
          finalPrice: final.amount,
          finalText: final.raw,
          increaseRatio: Math.round(increase * 1000) / 1000,
          fees: feeEvidence,
          disclaimers: nearDisclaimers.map((d) => d.text),
          finePrint: finePrint === 1,
        },
      },
    ]
  }

  /**
   * Walk the tree once, anchoring every price to its deepest element and
   * noting "not included"-style disclaimers.
   */
  private collect(root: DomNode): { tokens: PriceToken[]; disclaimers: Disclaimer[] } {
    const tokens: PriceToken[] = []
    const disclaimers: Disclaimer[] = []

    walk(root, (node, ancestors) => {
      if (!node.text) return false
      const path = [...ancestors, node]

      for (const price of extractPrices(node.text)) {
        if (node.children.some((child) => child.text.includes(price.raw))) continue
        const line = lineOf(path)
        const lineNode = line[line.length - 1]
        const lineText = normalizeText(lineNode.text)
        tokens.push({
          ...price,
          node,
          line,
          isTotal:
            matchTerms(lineText, this.rules.lexicon.totalKeywords).length > 0 ||
            matchClassTerms(lineNode, ['total', 'grand-total', 'order-total']).length > 0,
          isFee: matchTerms(lineText, this.rules.lexicon.feeKeywords).length > 0,
          finePrint: this.isFinePrint(path, line.length),
        })
      }

      const text = normalizeText(node.text)
      const ownsDisclaimer = this.disclaimerPatterns.some(
        (p) => p.test(text) && !node.children.some((child) => p.test(normalizeText(child.text))),
      )
      if (ownsDisclaimer) {
        disclaimers.push({ text: node.text, path, finePrint: this.isFinePrint(path, path.length) })
      }
    })

    return { tokens, disclaimers }
  }

  /**
   * Fine print if anything between the element and its line is a <small>,
   * carries a fine-print class or sets a small font size.
   */
  private isFinePrint(path: readonly DomNode[], lineDepth: number): boolean {
    const { lexicon, params } = this.rules
    const node = path[path.length - 1]
    const span = path.slice(Math.max(0, lineDepth - 1))
    if (span.some((n) => n.tag === 'small' || matchClassTerms(n, lexicon.finePrintClasses, false).length > 0)) {
      return true
    }
    const size = fontSizePx(node, path.slice(0, -1))
    return size !== null && size < params.smallFontPx
  }
}

/**
 * Climb from a price's element while the parent still shows a single price,
 * so a `<td>Total</td><td>$10</td>` row becomes one line.
 */
function lineOf(path: readonly DomNode[]): readonly DomNode[] {
  let end = path.length
  while (end > 1 && extractPrices(path[end - 2].text).length === 1) {
    end--
  }
  return path.slice(0, end)
}

function findLastIndex<T>(items: readonly T[], predicate: (item: T) => boolean): number {
  for (let i = items.length - 1; i >= 0; i--) {
    if (predicate(items[i])) return i
  }
  return -1
}
