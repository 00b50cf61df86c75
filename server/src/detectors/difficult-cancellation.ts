/**
 * @fileoverview Difficult cancellation ("roach motel"): easy to sign up,
 * hard to leave. Only pages that talk about cancelling are considered.
 *
 * Signals:
 * - obstruction:  phrasing that routes cancellation through phone, mail,
 *                 notice periods or fees
 * - asymmetry:    sign-up controls outnumber cancel controls, graded by
 *                 the share of sign-ups with no cancel counterpart
 * - contactOnly:  the only way out is a phone number or email address
 *
 * A phone number only counts when it shares a sentence with a cancel or
 * contact mention, so dates and order numbers stay out.
 */

import type { DomNode, PageSnapshot, PatternType } from '../types.js'
import {
  difficultCancellationRulesSchema,
  loadDetectorRules,
  type DifficultCancellationRules,
} from '../data/index.js'
import { BaseDetector, type DetectorOptions, type Finding } from './base.js'
import {
  compilePatterns,
  describeNode,
  getAttr,
  interactiveLabel,
  isInteractive,
  matchTerms,
  normalizeText,
  walk,
} from './dom.js'

/** Elements that flow inside a sentence rather than starting a new block */
const PHRASING_TAGS = new Set([
  'a', 'abbr', 'b', 'bdi', 'cite', 'code', 'em', 'i', 'mark', 'q', 's', 'small', 'span', 'strong', 'sub',
  'sup', 'time', 'u',
])

function sentences(text: string): string[] {
  return normalizeText(text).split(/(?<=[.!?])\s+/)
}

export class DifficultCancellationDetector extends BaseDetector<DifficultCancellationRules> {
  readonly name = 'difficult_cancellation'
  readonly patternType: PatternType = 'difficult_cancellation'

  private readonly obstructionPatterns: RegExp[]
  private readonly phonePattern: RegExp

  constructor(options: DetectorOptions<DifficultCancellationRules> = {}) {
    super(() => loadDetectorRules('difficult_cancellation', difficultCancellationRulesSchema), options)
    this.obstructionPatterns = compilePatterns(this.rules.lexicon.obstructionPatterns)
    this.phonePattern = new RegExp(this.rules.lexicon.phonePattern)
  }

  protected analyze(root: DomNode, snapshot: PageSnapshot): Finding[] {
    const { lexicon, params } = this.rules
    const pageText = normalizeText(snapshot.textContent || root.text)

    const mentions = matchTerms(pageText, lexicon.cancelMentions)
    if (mentions.length === 0) return []

    const obstructions: string[] = []
    for (const pattern of this.obstructionPatterns) {
      const match = pattern.exec(pageText)
      if (match) obstructions.push(match[0])
    }

    const cancelControls: string[] = []
    const signUpControls: string[] = []
    const contactChannels: string[] = []
    const obstructionNodes: DomNode[] = []
    const signUpNodes: DomNode[] = []

    walk(root, (node) => {
      const href = node.tag === 'a' ? getAttr(node, 'href') : undefined
      if (href && /^(tel|mailto):/i.test(href)) {
        contactChannels.push(href)
      }
      if (!isInteractive(node)) {
        if (obstructions.length > 0 && this.ownsObstruction(node)) obstructionNodes.push(node)
        return
      }
      const label = normalizeText(interactiveLabel(node))
      if (!label) return false
      if (matchTerms(label, lexicon.cancelActions).length > 0) {
        cancelControls.push(label)
      } else if (matchTerms(label, lexicon.subscribeActions).length > 0) {
        signUpControls.push(label)
        signUpNodes.push(node)
      }
      return false
    })

    const phoneInText = this.hasCancelPhone(root)
    const obstruction = Math.min(1, obstructions.length / params.obstructionSaturation)
    const asymmetry =
      signUpControls.length > 0 ? Math.max(0, 1 - cancelControls.length / signUpControls.length) : 0
    const contactOnly = cancelControls.length === 0 && (contactChannels.length > 0 || phoneInText) ? 1 : 0

    const confidence =
      this.weights.obstruction * obstruction + this.weights.asymmetry * asymmetry + this.weights.contactOnly * contactOnly

    const anchor: DomNode | undefined = obstructionNodes[0] ?? signUpNodes[0]
    return [
      {
        confidence,
        location: anchor ? describeNode(anchor) : 'page',
        node: anchor,
        evidence: {
          cancelMentions: mentions,
          obstructionPhrases: obstructions,
          signUpControls,
          cancelControls,
          contactChannels,
          phoneNumberInText: phoneInText,
        },
      },
    ]
  }

  /**
   * Whether a phone number appears in the same sentence as a cancel or
   * contact mention. Each number is read in its nearest block element.
   */
  private hasCancelPhone(root: DomNode): boolean {
    const { lexicon } = this.rules
    const context = [...lexicon.cancelMentions, ...lexicon.contactMentions]
    let found = false
    walk(root, (node, ancestors) => {
      if (found) return false
      if (!this.phonePattern.test(node.text)) return false
      if (node.children.some((child) => this.phonePattern.test(child.text))) return

      let block = node
      for (let i = ancestors.length - 1; i >= 0 && PHRASING_TAGS.has(block.tag); i--) {
        block = ancestors[i]
      }
      found = sentences(block.text).some(
        (sentence) => this.phonePattern.test(sentence) && matchTerms(sentence, context).length > 0,
      )
      return false
    })
    return found
  }

  /**
   * The deepest element whose own text carries an obstruction phrase.
   */
  private ownsObstruction(node: DomNode): boolean {
    const matches = (text: string) => this.obstructionPatterns.some((p) => p.test(normalizeText(text)))
    return matches(node.text) && !node.children.some((child) => matches(child.text))
  }
}
