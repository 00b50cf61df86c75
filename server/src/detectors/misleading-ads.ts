/**
 * @fileoverview Misleading ads: advertising dressed up as page controls or
 * content, without a visible "Ad"/"Sponsored" label.
 *
 * Links are scored as a product of three factors, so each one can veto:
 *   disclosure (undisclosed 1, disclosed 0.3)
 *   × mimicry (styled as a button/download control 1, plain link 0.3)
 *   × destination (external ad URL 1, external 0.7, internal ad URL 0.6)
 * Ad containers (class or id naming an ad slot) are scored as
 *   disclosure × adContainer × promotional keyword density.
 */

import type { DomNode, PageSnapshot, PatternType } from '../types.js'
import { loadDetectorRules, misleadingAdsRulesSchema, type MisleadingAdsRules } from '../data/index.js'
import { isThirdParty } from '../utils/url.js'
import { BaseDetector, type DetectorOptions, type Finding } from './base.js'
import {
  compilePatterns,
  describeNode,
  getAttr,
  interactiveLabel,
  matchClassTerms,
  matchTerms,
  normalizeText,
  walk,
} from './dom.js'

const CONTAINER_TAGS = new Set(['div', 'section', 'aside', 'article', 'iframe', 'ins', 'li', 'figure'])

export class MisleadingAdsDetector extends BaseDetector<MisleadingAdsRules> {
  readonly name = 'misleading_ads'
  readonly patternType: PatternType = 'misleading_ads'

  private readonly adUrlPatterns: RegExp[]

  constructor(options: DetectorOptions<MisleadingAdsRules> = {}) {
    super(() => loadDetectorRules('misleading_ads', misleadingAdsRulesSchema), options)
    this.adUrlPatterns = compilePatterns(this.rules.lexicon.adUrlPatterns)
  }

  protected analyze(root: DomNode, snapshot: PageSnapshot): Finding[] {
    const findings: Finding[] = []
    walk(root, (node, ancestors) => {
      if (node.tag === 'a') {
        const finding = this.scoreLink(node, ancestors, snapshot.url)
        if (finding) findings.push(finding)
        return false
      }
      if (CONTAINER_TAGS.has(node.tag)) {
        const finding = this.scoreContainer(node, ancestors)
        if (finding) {
          findings.push(finding)
          // Links inside a flagged slot belong to the same ad
          return false
        }
      }
      return undefined
    })
    return findings
  }

  private scoreLink(node: DomNode, ancestors: readonly DomNode[], pageUrl: string): Finding | null {
    const href = getAttr(node, 'href')
    if (!href || /^(#|javascript:|mailto:|tel:)/i.test(href)) return null

    const { weights } = this
    const external = isThirdParty(href, pageUrl)
    const adUrlIndex = this.adUrlPatterns.findIndex((p) => p.test(href))
    const adUrl = adUrlIndex >= 0 ? this.rules.lexicon.adUrlPatterns[adUrlIndex] : null
    let destination: number
    if (external && adUrl) destination = weights.externalAdDestination
    else if (external) destination = weights.externalDestination
    else if (adUrl) destination = weights.internalAdDestination
    else return null

    const label = interactiveLabel(node)
    const controlClasses = matchClassTerms(node, this.rules.lexicon.controlClasses)
    const controlText = this.rules.lexicon.controlTexts.find((t) => normalizeText(label) === t)
    const mimicsControl =
      controlClasses.length > 0 || (getAttr(node, 'role') ?? '').toLowerCase() === 'button' || controlText !== undefined
    const disclosure = this.findDisclosure(node, ancestors)

    const confidence =
      (disclosure ? weights.disclosed : weights.undisclosed) *
      (mimicsControl ? weights.controlMimicry : weights.plainLink) *
      destination

    return {
      confidence,
      location: describeNode(node),
      node,
      evidence: {
        href,
        text: label,
        external,
        adUrlPattern: adUrl,
        mimicsControl,
        controlClasses,
        disclosureLabel: disclosure,
      },
    }
  }

  private scoreContainer(node: DomNode, ancestors: readonly DomNode[]): Finding | null {
    const { lexicon, params } = this.rules
    const tokens = matchClassTerms(node, lexicon.adContainerTokens)
    if (tokens.length === 0) return null

    const promo = matchTerms(normalizeText(node.text), lexicon.promoKeywords)
    const density = Math.min(1, promo.length / params.promoSaturation)
    if (density === 0) return null
    const disclosure = this.findDisclosure(node, ancestors)

    const confidence =
      (disclosure ? this.weights.disclosed : this.weights.undisclosed) * this.weights.adContainer * density

    return {
      confidence,
      location: describeNode(node),
      node,
      evidence: {
        containerTokens: tokens,
        promoKeywords: promo,
        disclosureLabel: disclosure,
      },
    }
  }

  /**
   * A visible ad label on the element, its ARIA text, or within the
   * nearest enclosing elements. Class names do not count as disclosure.
   */
  private findDisclosure(node: DomNode, ancestors: readonly DomNode[]): string | null {
    const labels = this.rules.lexicon.disclosureLabels
    const nearby = ancestors.slice(Math.max(0, ancestors.length - this.rules.params.disclosureLevels))
    const texts = [
      node.text,
      getAttr(node, 'aria-label') ?? '',
      getAttr(node, 'title') ?? '',
      ...nearby.map((n) => n.text),
    ]
    for (const text of texts) {
      const found = matchTerms(normalizeText(text), labels)
      if (found.length > 0) return found[0]
    }
    return null
  }
}
