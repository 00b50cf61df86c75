/**
 * @fileoverview Confusing interface: the accepting choice is loud and the
 * declining one is played down (a big filled "Accept all" next to a grey
 * text link).
 *
 * Each control gets a visual weight from font size, fill, text contrast
 * and class-based prominence. Accept/reject pairs that sit close together
 * are compared; when the accept option outweighs the reject option by at
 * least minAsymmetry, the pair is scored on asymmetry, link-versus-button
 * styling and colour inversion (a green "no" or red "yes").
 */

import type { DomNode, PatternType } from '../types.js'
import { confusingInterfaceRulesSchema, loadDetectorRules, type ConfusingInterfaceRules } from '../data/index.js'
import { BaseDetector, type DetectorOptions, type Finding } from './base.js'
import {
  BLACK,
  WHITE,
  backgroundColor,
  commonAncestorDistance,
  contrastRatio,
  describeNode,
  fontSizePx,
  getAttr,
  interactiveLabel,
  isInteractive,
  matchClassTerms,
  matchTerms,
  normalizeText,
  parseColor,
  parseStyle,
  relativeLuminance,
  type Rgba,
  walk,
} from './dom.js'

/** Bootstrap's muted grey, assumed for muted controls without a colour */
const MUTED_TEXT: Rgba = { r: 108, g: 117, b: 125, a: 1 }

type Choice = 'accept' | 'reject'

interface Control {
  node: DomNode
  path: readonly DomNode[]
  label: string
  choice: Choice
}

interface Appearance {
  weight: number
  fill: Rgba | null
  buttonStyled: boolean
}

function isGoColour(c: Rgba): boolean {
  return c.g - Math.max(c.r, c.b) > 40
}

function isStopColour(c: Rgba): boolean {
  return c.r - Math.max(c.g, c.b) > 60
}

const round = (n: number) => Math.round(n * 1000) / 1000

export class ConfusingInterfaceDetector extends BaseDetector<ConfusingInterfaceRules> {
  readonly name = 'confusing_interface'
  readonly patternType: PatternType = 'confusing_interface'

  constructor(options: DetectorOptions<ConfusingInterfaceRules> = {}) {
    super(() => loadDetectorRules('confusing_interface', confusingInterfaceRulesSchema), options)
  }

  protected analyze(root: DomNode): Finding[] {
    const controls = this.collectControls(root)
    const accepts = controls.filter((c) => c.choice === 'accept')
    const findings: Finding[] = []

    for (const reject of controls.filter((c) => c.choice === 'reject')) {
      const accept = this.nearestAccept(reject, accepts)
      if (!accept) continue
      const finding = this.comparePair(accept, reject)
      if (finding) findings.push(finding)
    }
    return findings
  }

  private collectControls(root: DomNode): Control[] {
    const { lexicon } = this.rules
    const controls: Control[] = []
    walk(root, (node, ancestors) => {
      if (!isInteractive(node)) return undefined
      const label = interactiveLabel(node)
      const text = normalizeText(label)
      // Decline wording wins: "continue without accepting" is a reject
      const choice: Choice | null =
        matchTerms(text, lexicon.rejectActions).length > 0
          ? 'reject'
          : matchTerms(text, lexicon.acceptActions).length > 0
            ? 'accept'
            : null
      if (choice) controls.push({ node, path: [...ancestors, node], label, choice })
      return false
    })
    return controls
  }

  /** Closest accept control sharing an ancestor within groupLevels */
  private nearestAccept(reject: Control, accepts: readonly Control[]): Control | null {
    let best: Control | null = null
    let bestDistance = Infinity
    for (const accept of accepts) {
      const distance = commonAncestorDistance(accept.path, reject.path)
      if (distance <= this.rules.params.groupLevels && distance < bestDistance) {
        best = accept
        bestDistance = distance
      }
    }
    return best
  }

  private comparePair(accept: Control, reject: Control): Finding | null {
    const { params } = this.rules
    const a = this.appearance(accept.node, accept.path)
    const r = this.appearance(reject.node, reject.path)
    const asymmetry = a.weight - r.weight
    if (asymmetry < params.minAsymmetry) return null

    const linkVsButton = a.buttonStyled && !r.buttonStyled ? 1 : 0
    const colorInversion = (r.fill && isGoColour(r.fill)) || (a.fill && isStopColour(a.fill)) ? 1 : 0

    const confidence =
      this.weights.asymmetry * Math.min(1, asymmetry / params.asymmetrySaturation) +
      this.weights.linkVsButton * linkVsButton +
      this.weights.colorInversion * colorInversion

    return {
      confidence,
      location: `${describeNode(accept.node)} vs ${describeNode(reject.node)}`,
      node: reject.node,
      evidence: {
        acceptText: accept.label,
        rejectText: reject.label,
        acceptWeight: round(a.weight),
        rejectWeight: round(r.weight),
        asymmetry: round(asymmetry),
        linkVsButton: linkVsButton === 1,
        colorInversion: colorInversion === 1,
      },
    }
  }

  /**
   * Visual weight in [0, 1] plus the pieces the pair comparison reuses.
   */
  private appearance(node: DomNode, path: readonly DomNode[]): Appearance {
    const { lexicon, params, visualWeights } = this.rules
    const ancestors = path.slice(0, -1)

    const font = fontSizePx(node, ancestors, lexicon.sizeClasses) ?? params.defaultFontPx
    const size = Math.min(1, font / params.maxFontPx)

    const primary = matchClassTerms(node, lexicon.primaryClasses, false).length > 0
    const muted = matchClassTerms(node, lexicon.mutedClasses, false).length > 0
    const buttonStyled =
      node.tag === 'button' ||
      node.tag === 'input' ||
      (getAttr(node, 'role') ?? '').toLowerCase() === 'button' ||
      matchClassTerms(node, lexicon.buttonClasses, false).length > 0

    const background = backgroundColor(node)
    const painted = background !== null && background.a > 0 && relativeLuminance(background) < 0.9
    const fill = painted ? 1 : background === null && primary && !muted ? 1 : node.tag === 'button' ? 0.5 : 0

    const declared = parseStyle(node)['color']
    const textColour = (declared ? parseColor(declared) : null) ?? (muted ? MUTED_TEXT : BLACK)
    const contrast = Math.min(1, contrastRatio(textColour, painted && background ? background : WHITE) / params.maxContrast)

    const prominence = primary ? 1 : muted ? 0 : 0.5

    return {
      weight:
        visualWeights.size * size +
        visualWeights.fill * fill +
        visualWeights.contrast * contrast +
        visualWeights.prominence * prominence,
      fill: painted ? background : null,
      buttonStyled,
    }
  }
}
