/**
 * @fileoverview Read-only helpers over the snapshot DOM tree: traversal,
 * attribute and class lookup, inline style parsing, colour contrast and
 * lexicon matching. Every detector goes through these instead of touching
 * node fields directly, so malformed nodes surface as one error type.
 */

import type { DomNode } from '../types.js'
import { SnapshotMalformedError } from '../utils/errors.js'

// ============================================================================
// Text
// ============================================================================

/**
 * Lower-case, straighten typographic apostrophes and collapse whitespace.
 */
export function normalizeText(value: string): string {
  return value
    .toLowerCase()
    .replace(/[‘’ʼ]/g, "'")
    .replace(/\s+/g, ' ')
    .trim()
}

/** Split text into lower-case word tokens (apostrophes kept) */
export function tokenize(value: string): string[] {
  return normalizeText(value)
    .split(/[^\p{L}\p{N}']+/u)
    .filter((token) => token.length > 0)
}

export function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 1)}…` : value
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

const termPatterns = new Map<string, RegExp>()

/**
 * Compile a lexicon term into a pattern that only matches whole words.
 * Edges that are punctuation (e.g. '% off') match anywhere.
 */
function termPattern(term: string): RegExp {
  let pattern = termPatterns.get(term)
  if (!pattern) {
    const normalized = normalizeText(term)
    const start = /^[\p{L}\p{N}]/u.test(normalized) ? '(?<![\\p{L}\\p{N}])' : ''
    const end = /[\p{L}\p{N}]$/u.test(normalized) ? '(?![\\p{L}\\p{N}])' : ''
    pattern = new RegExp(`${start}${escapeRegExp(normalized)}${end}`, 'u')
    termPatterns.set(term, pattern)
  }
  return pattern
}

/**
 * Whether normalized text contains a lexicon term as whole words.
 *
 * @example
 * containsTerm('subscribe me to marketing emails', 'email') // false
 * containsTerm('subscribe me to marketing emails', 'emails') // true
 */
export function containsTerm(normalizedText: string, term: string): boolean {
  return termPattern(term).test(normalizedText)
}

/** Every term of a lexicon found in normalized text, in lexicon order */
export function matchTerms(normalizedText: string, terms: readonly string[]): string[] {
  return terms.filter((term) => containsTerm(normalizedText, term))
}

/** Compile regex sources from a rule file, case-insensitive */
export function compilePatterns(sources: readonly string[], flags = 'i'): RegExp[] {
  return sources.map((source) => new RegExp(source, flags))
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * Throw {@link SnapshotMalformedError} unless the value has the DomNode shape.
 */
export function assertNode(node: DomNode): void {
  if (
    typeof node !== 'object' ||
    node === null ||
    typeof node.tag !== 'string' ||
    typeof node.text !== 'string' ||
    typeof node.attributes !== 'object' ||
    node.attributes === null ||
    !Array.isArray(node.children)
  ) {
    throw new SnapshotMalformedError(`Malformed DOM node: ${String(JSON.stringify(node)).slice(0, 80)}`)
  }
}

/**
 * Visitor called for each node with its ancestors (root first).
 * Return false to skip the node's subtree. The ancestors array is reused
 * between calls; copy it before keeping it.
 */
export type Visitor = (node: DomNode, ancestors: readonly DomNode[]) => boolean | void

/**
 * Depth-first, document-order traversal.
 */
export function walk(root: DomNode, visit: Visitor): void {
  const ancestors: DomNode[] = []
  const visitNode = (node: DomNode): void => {
    assertNode(node)
    if (visit(node, ancestors) === false) return
    ancestors.push(node)
    for (const child of node.children) {
      visitNode(child)
    }
    ancestors.pop()
  }
  visitNode(root)
}

/** A node together with its root-first path (the node itself is last) */
export interface Located {
  readonly node: DomNode
  readonly path: readonly DomNode[]
}

/**
 * Collect every node matching a predicate, in document order.
 */
export function findAll(root: DomNode, predicate: (node: DomNode, ancestors: readonly DomNode[]) => boolean): Located[] {
  const found: Located[] = []
  walk(root, (node, ancestors) => {
    if (predicate(node, ancestors)) {
      found.push({ node, path: [...ancestors, node] })
    }
  })
  return found
}

/**
 * How many levels separate two nodes from their nearest common ancestor,
 * taking the longer of the two climbs. Paths are root-first.
 */
export function commonAncestorDistance(a: readonly DomNode[], b: readonly DomNode[]): number {
  let shared = 0
  while (shared < a.length && shared < b.length && a[shared] === b[shared]) {
    shared++
  }
  return Math.max(a.length - shared, b.length - shared)
}

// ============================================================================
// Attributes
// ============================================================================

export function getAttr(node: DomNode, name: string): string | undefined {
  const value = node.attributes[name]
  return typeof value === 'string' ? value : undefined
}

export function hasAttr(node: DomNode, name: string): boolean {
  return getAttr(node, name) !== undefined
}

/** Lower-case class tokens */
export function classTokens(node: DomNode): string[] {
  return (getAttr(node, 'class') ?? '')
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > 0)
}

/**
 * Terms that match a class token (or the id) either whole or as one of its
 * dash/underscore-separated parts, so 'btn-primary' matches 'primary'.
 */
export function matchClassTerms(node: DomNode, terms: readonly string[], includeId = true): string[] {
  const tokens = classTokens(node)
  const id = getAttr(node, 'id')
  if (includeId && id) {
    tokens.push(id.toLowerCase())
  }
  const matched = new Set<string>()
  for (const token of tokens) {
    const parts = token.split(/[-_]+/)
    for (const term of terms) {
      if (token === term || parts.includes(term)) {
        matched.add(term)
      }
    }
  }
  return [...matched]
}

/**
 * Short human-readable locator, e.g. `button#decline.btn.link "No thanks"`.
 */
export function describeNode(node: DomNode): string {
  const id = getAttr(node, 'id')
  const classes = classTokens(node)
    .slice(0, 3)
    .map((token) => `.${token}`)
    .join('')
  const label = node.text || getAttr(node, 'aria-label') || getAttr(node, 'value') || ''
  const base = `${node.tag}${id ? `#${id}` : ''}${classes}`
  return label ? `${base} "${truncate(label, 60)}"` : base
}

// ============================================================================
// Interactive Elements
// ============================================================================

const BUTTON_INPUT_TYPES = new Set(['submit', 'button', 'reset', 'image'])
const INTERACTIVE_ROLES = new Set(['button', 'link', 'menuitem', 'tab'])

/**
 * Buttons, links, button-like inputs and elements with an interactive role.
 */
export function isInteractive(node: DomNode): boolean {
  if (node.tag === 'button' || node.tag === 'summary') return true
  if (node.tag === 'a') return hasAttr(node, 'href') || hasAttr(node, 'onclick')
  if (node.tag === 'input') return BUTTON_INPUT_TYPES.has((getAttr(node, 'type') ?? '').toLowerCase())
  const role = getAttr(node, 'role')
  return role !== undefined && INTERACTIVE_ROLES.has(role.toLowerCase())
}

/**
 * The label a user reads on an interactive element.
 */
export function interactiveLabel(node: DomNode): string {
  return (node.text || getAttr(node, 'value') || getAttr(node, 'aria-label') || getAttr(node, 'title') || '').trim()
}

// ============================================================================
// Inline Styles
// ============================================================================

/**
 * Parse an inline style attribute into lower-case property → value pairs.
 */
export function parseStyle(node: DomNode): Record<string, string> {
  const style: Record<string, string> = {}
  for (const declaration of (getAttr(node, 'style') ?? '').split(';')) {
    const colon = declaration.indexOf(':')
    if (colon <= 0) continue
    const property = declaration.slice(0, colon).trim().toLowerCase()
    const value = declaration.slice(colon + 1).trim().toLowerCase()
    if (property && value) {
      style[property] = value
    }
  }
  return style
}

const FONT_SIZE_KEYWORDS: Record<string, number> = {
  'xx-small': 9,
  'x-small': 10,
  small: 13,
  medium: 16,
  large: 18,
  'x-large': 24,
  'xx-large': 32,
}

/**
 * Convert a CSS length to pixels. Relative units resolve against basePx.
 */
export function parseCssLength(value: string, basePx = 16): number | null {
  const trimmed = value.trim().toLowerCase()
  if (trimmed in FONT_SIZE_KEYWORDS) return FONT_SIZE_KEYWORDS[trimmed]
  const match = /^(-?\d*\.?\d+)\s*(px|pt|em|rem|%)?$/.exec(trimmed)
  if (!match) return null
  const amount = Number(match[1])
  switch (match[2]) {
    case 'pt':
      return (amount * 4) / 3
    case 'em':
    case 'rem':
      return amount * basePx
    case '%':
      return (amount / 100) * basePx
    default:
      return amount
  }
}

/**
 * Effective font size from inline styles or size classes, climbing the
 * ancestors (nearest first). Null when nothing on the path sets one.
 */
export function fontSizePx(
  node: DomNode,
  ancestors: readonly DomNode[] = [],
  sizeClasses: Readonly<Record<string, number>> = {},
): number | null {
  const chain = [node, ...[...ancestors].reverse()]
  for (const current of chain) {
    const declared = parseStyle(current)['font-size']
    if (declared) {
      const px = parseCssLength(declared)
      if (px !== null) return px
    }
    for (const token of classTokens(current)) {
      if (token in sizeClasses) return sizeClasses[token]
    }
  }
  return null
}

// ============================================================================
// Colour
// ============================================================================

export interface Rgba {
  r: number
  g: number
  b: number
  a: number
}

const NAMED_COLORS: Record<string, [number, number, number]> = {
  black: [0, 0, 0],
  white: [255, 255, 255],
  red: [255, 0, 0],
  darkred: [139, 0, 0],
  green: [0, 128, 0],
  lime: [0, 255, 0],
  blue: [0, 0, 255],
  navy: [0, 0, 128],
  gray: [128, 128, 128],
  grey: [128, 128, 128],
  darkgray: [169, 169, 169],
  darkgrey: [169, 169, 169],
  silver: [192, 192, 192],
  lightgray: [211, 211, 211],
  lightgrey: [211, 211, 211],
  orange: [255, 165, 0],
  yellow: [255, 255, 0],
}

/**
 * Parse hex, rgb()/rgba() and a handful of named colours.
 */
export function parseColor(value: string): Rgba | null {
  const v = value.trim().toLowerCase()
  if (v === 'transparent') return { r: 0, g: 0, b: 0, a: 0 }
  const named = NAMED_COLORS[v]
  if (named) return { r: named[0], g: named[1], b: named[2], a: 1 }

  const hex = /^#([0-9a-f]{3,8})$/.exec(v)
  if (hex) {
    let digits = hex[1]
    if (digits.length === 3 || digits.length === 4) {
      digits = [...digits].map((d) => d + d).join('')
    }
    if (digits.length !== 6 && digits.length !== 8) return null
    return {
      r: parseInt(digits.slice(0, 2), 16),
      g: parseInt(digits.slice(2, 4), 16),
      b: parseInt(digits.slice(4, 6), 16),
      a: digits.length === 8 ? parseInt(digits.slice(6, 8), 16) / 255 : 1,
    }
  }

  const rgb = /^rgba?\(\s*(\d{1,3})[\s,]+(\d{1,3})[\s,]+(\d{1,3})(?:\s*[,/]\s*([\d.]+)(%?))?\s*\)$/.exec(v)
  if (rgb) {
    let alpha = rgb[4] === undefined ? 1 : Number(rgb[4])
    if (rgb[5] === '%') alpha /= 100
    return { r: Number(rgb[1]), g: Number(rgb[2]), b: Number(rgb[3]), a: Math.min(1, Math.max(0, alpha)) }
  }
  return null
}

/**
 * Colour of a `background` or `background-color` declaration.
 */
export function backgroundColor(node: DomNode): Rgba | null {
  const style = parseStyle(node)
  const declared = style['background-color'] ?? style['background']
  if (!declared) return null
  const whole = parseColor(declared)
  if (whole) return whole
  for (const part of declared.split(/\s+(?![^(]*\))/)) {
    const color = parseColor(part)
    if (color) return color
  }
  return null
}

/** WCAG relative luminance */
export function relativeLuminance(color: Rgba): number {
  const channel = (c: number) => {
    const s = c / 255
    return s <= 0.03928 ? s / 12.92 : ((s + 0.055) / 1.055) ** 2.4
  }
  return 0.2126 * channel(color.r) + 0.7152 * channel(color.g) + 0.0722 * channel(color.b)
}

/** WCAG contrast ratio, 1 to 21 */
export function contrastRatio(a: Rgba, b: Rgba): number {
  const la = relativeLuminance(a)
  const lb = relativeLuminance(b)
  return (Math.max(la, lb) + 0.05) / (Math.min(la, lb) + 0.05)
}

export const WHITE: Rgba = { r: 255, g: 255, b: 255, a: 1 }
export const BLACK: Rgba = { r: 0, g: 0, b: 0, a: 1 }
