/**
 * @fileoverview Preselection: opt-ins for marketing, data sharing or paid
 * add-ons that arrive already checked.
 *
 * Signals: the control is pre-checked, its label matches the opt-in
 * lexicon, and the label is visually played down (small, faded or muted).
 * A label with no opt-in keyword never produces a finding; a pre-checked
 * "Remember me" box is not a dark pattern.
 *
 * A `<select>` whose pre-selected `<option>` (or the select's own label)
 * names an upsell is scored the same way as a checked box.
 */

import type { DomNode, PatternType } from '../types.js'
import { loadDetectorRules, preselectionRulesSchema, type PreselectionRules } from '../data/index.js'
import { BaseDetector, type DetectorOptions, type Finding } from './base.js'
import {
  WHITE,
  contrastRatio,
  fontSizePx,
  getAttr,
  hasAttr,
  matchClassTerms,
  matchTerms,
  normalizeText,
  parseColor,
  parseStyle,
  truncate,
  walk,
} from './dom.js'

const TOGGLE_ROLES = new Set(['checkbox', 'switch'])

/** Longest parent text still treated as a label */
const MAX_FALLBACK_LABEL = 200

interface Toggle {
  node: DomNode
  path: DomNode[]
}

/** A pre-selected option and the select that owns it */
interface SelectedOption extends Toggle {
  select: Toggle
}

/** Text of a label and the path that leads to it */
interface ResolvedLabel {
  text: string
  path: readonly DomNode[]
}

function isPreChecked(node: DomNode): boolean {
  if (node.tag === 'input') {
    const type = (getAttr(node, 'type') ?? '').toLowerCase()
    return (type === 'checkbox' || type === 'radio') && hasAttr(node, 'checked')
  }
  const role = (getAttr(node, 'role') ?? '').toLowerCase()
  return TOGGLE_ROLES.has(role) && getAttr(node, 'aria-checked') === 'true'
}

/** The select that owns a pre-selected option, or null */
function owningSelect(node: DomNode, path: DomNode[]): Toggle | null {
  if (node.tag !== 'option' || !hasAttr(node, 'selected') || !node.text) return null
  for (let i = path.length - 2; i >= 0; i--) {
    if (path[i].tag === 'select') return { node: path[i], path: path.slice(0, i + 1) }
  }
  return null
}

export class PreselectionDetector extends BaseDetector<PreselectionRules> {
  readonly name = 'preselection'
  readonly patternType: PatternType = 'preselection'

  constructor(options: DetectorOptions<PreselectionRules> = {}) {
    super(() => loadDetectorRules('preselection', preselectionRulesSchema), options)
  }

  protected analyze(root: DomNode): Finding[] {
    const toggles: Toggle[] = []
    const options: SelectedOption[] = []
    const labelsFor = new Map<string, ResolvedLabel>()
    const byId = new Map<string, ResolvedLabel>()

    walk(root, (node, ancestors) => {
      const path = [...ancestors, node]
      const id = getAttr(node, 'id')
      if (id && !byId.has(id)) byId.set(id, { text: node.text, path })
      const target = node.tag === 'label' ? getAttr(node, 'for') : undefined
      if (target) labelsFor.set(target, { text: node.text, path })
      if (isPreChecked(node)) toggles.push({ node, path })
      const select = owningSelect(node, path)
      if (select) options.push({ node, path, select })
    })

    const findings: Finding[] = []
    for (const toggle of toggles) {
      const label = this.resolveLabel(toggle, labelsFor, byId)
      if (!label) continue
      const finding = this.score(toggle.node, label)
      if (finding) findings.push(finding)
    }
    for (const option of options) {
      const finding = this.scoreOption(option, this.resolveSelectLabel(option.select, labelsFor, byId))
      if (finding) findings.push(finding)
    }
    return findings
  }

  /**
   * Label of a select. Its own text is every option joined, so only
   * explicit, wrapping and ARIA labelling count.
   */
  private resolveSelectLabel(
    select: Toggle,
    labelsFor: Map<string, ResolvedLabel>,
    byId: Map<string, ResolvedLabel>,
  ): ResolvedLabel | null {
    const { node, path } = select
    const id = getAttr(node, 'id')
    const explicit = id ? labelsFor.get(id) : undefined
    if (explicit?.text) return explicit

    for (let i = path.length - 2; i >= 0; i--) {
      if (path[i].tag === 'label' && path[i].text) {
        return { text: path[i].text, path: path.slice(0, i + 1) }
      }
    }

    const ariaLabel = getAttr(node, 'aria-label')
    if (ariaLabel) return { text: ariaLabel, path }

    const labelledBy = getAttr(node, 'aria-labelledby')
    const referenced = labelledBy ? byId.get(labelledBy.split(/\s+/)[0]) : undefined
    return referenced?.text ? referenced : null
  }

  /**
   * Find the text a user reads next to a toggle: an explicit label, a
   * wrapping label, ARIA labelling, or as a last resort the parent's text.
   */
  private resolveLabel(
    toggle: Toggle,
    labelsFor: Map<string, ResolvedLabel>,
    byId: Map<string, ResolvedLabel>,
  ): ResolvedLabel | null {
    const { node, path } = toggle
    const id = getAttr(node, 'id')
    const explicit = id ? labelsFor.get(id) : undefined
    if (explicit?.text) return explicit

    for (let i = path.length - 2; i >= 0; i--) {
      if (path[i].tag === 'label' && path[i].text) {
        return { text: path[i].text, path: path.slice(0, i + 1) }
      }
    }

    const ariaLabel = getAttr(node, 'aria-label') ?? node.text
    if (ariaLabel) return { text: ariaLabel, path }

    const labelledBy = getAttr(node, 'aria-labelledby')
    const referenced = labelledBy ? byId.get(labelledBy.split(/\s+/)[0]) : undefined
    if (referenced?.text) return referenced

    const parentPath = path.slice(0, -1)
    const parent = parentPath[parentPath.length - 1]
    if (parent?.text && parent.text.length <= MAX_FALLBACK_LABEL) {
      return { text: parent.text, path: parentPath }
    }
    return null
  }

  /** Preselection confidence for a pre-checked control, or null without a keyword */
  private confidenceFor(keywords: readonly string[], hints: readonly string[]): number | null {
    if (keywords.length === 0) return null
    const { params } = this.rules
    const labelMatch = Math.min(1, keywords.length / params.keywordSaturation)
    const deEmphasis = Math.min(1, hints.length / params.deEmphasisSaturation)
    return this.weights.preChecked * 1 + this.weights.labelMatch * labelMatch + this.weights.deEmphasis * deEmphasis
  }

  private score(toggle: DomNode, label: ResolvedLabel): Finding | null {
    const keywords = matchTerms(normalizeText(label.text), this.rules.lexicon.keywords)
    const hints = this.deEmphasisHints(label.path)
    const confidence = this.confidenceFor(keywords, hints)
    if (confidence === null) return null

    const type = (getAttr(toggle, 'type') ?? getAttr(toggle, 'role') ?? toggle.tag).toLowerCase()
    const name = getAttr(toggle, 'name') ?? getAttr(toggle, 'id') ?? null
    return {
      confidence,
      location: `${toggle.tag}[type=${type}]${name ? `[name=${name}]` : ''} "${truncate(label.text, 60)}"`,
      node: toggle,
      evidence: {
        label: label.text,
        inputType: type,
        inputName: name,
        preChecked: true,
        matchedKeywords: keywords,
        deEmphasis: hints,
      },
    }
  }

  private scoreOption(option: SelectedOption, selectLabel: ResolvedLabel | null): Finding | null {
    const text = selectLabel ? `${option.node.text} ${selectLabel.text}` : option.node.text
    const keywords = matchTerms(normalizeText(text), this.rules.lexicon.keywords)
    const hints = this.deEmphasisHints(selectLabel?.path ?? option.select.path)
    const confidence = this.confidenceFor(keywords, hints)
    if (confidence === null) return null

    const select = option.select.node
    const name = getAttr(select, 'name') ?? getAttr(select, 'id') ?? null
    return {
      confidence,
      location: `select${name ? `[name=${name}]` : ''} option "${truncate(option.node.text, 60)}"`,
      node: select,
      evidence: {
        label: selectLabel?.text ?? null,
        selectedOption: option.node.text,
        inputType: 'select',
        inputName: name,
        preChecked: true,
        matchedKeywords: keywords,
        deEmphasis: hints,
      },
    }
  }

  /**
   * Reasons the label reads as fine print, checked on the label and up to
   * two enclosing elements.
   */
  private deEmphasisHints(path: readonly DomNode[]): string[] {
    const { lexicon, params } = this.rules
    const labelNode = path[path.length - 1]
    const ancestors = path.slice(0, -1)
    const chain = [labelNode, ...ancestors.slice(-2).reverse()]
    const hints: string[] = []

    const size = fontSizePx(labelNode, ancestors)
    if (size !== null && size < params.smallFontPx) hints.push('small-font')

    if (chain.some((n) => n.tag === 'small') || labelNode.children.some((c) => c.tag === 'small')) {
      hints.push('small-tag')
    }

    if (chain.some((n) => matchClassTerms(n, lexicon.deEmphasisClasses, false).length > 0)) {
      hints.push('muted-class')
    }

    const faded = chain.some((n) => {
      const opacity = parseStyle(n)['opacity']
      return opacity !== undefined && Number(opacity) < params.lowOpacity
    })
    if (faded) hints.push('low-opacity')

    const colored = chain.find((n) => parseStyle(n)['color'] !== undefined)
    const color = colored ? parseColor(parseStyle(colored)['color']) : null
    if (color && contrastRatio(color, WHITE) < params.lowContrastRatio) hints.push('low-contrast')

    return hints
  }
}
