/**
 * @fileoverview Snapshot builder: rendered HTML → immutable PageSnapshot.
 * Parses with cheerio and converts the body into the DomNode tree the
 * detectors read. Scripts, styles and other non-rendered elements are left
 * out of the tree and of every text field.
 */

import * as cheerio from 'cheerio'
import { isTag, isText, type Element } from 'domhandler'
import type { DomNode, PageSnapshot } from '../types.js'
import { normalizeText } from '../detectors/dom.js'

/** Elements that never render text */
const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template', 'head', 'svg'])

/** Elements whose text is kept apart from its neighbours' */
const SEPARATED_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'br', 'button', 'dd', 'div', 'dl', 'dt', 'fieldset',
  'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr',
  'input', 'label', 'li', 'main', 'nav', 'ol', 'option', 'p', 'section', 'select', 'summary',
  'table', 'tbody', 'td', 'textarea', 'tfoot', 'th', 'thead', 'tr', 'ul', 'a',
])

/** What the fetcher (or an API caller) hands over */
export interface SnapshotInput {
  url: string
  html: string
  screenshotRefs?: Record<string, string>
  /** Defaults to now */
  capturedAt?: string
}

function collapse(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

/**
 * Convert one element and its subtree. Text nodes are folded into the
 * text of every enclosing element, in document order.
 */
function toDomNode(element: Element): DomNode {
  const children: DomNode[] = []
  let text = ''

  for (const child of element.children) {
    if (isText(child)) {
      text += child.data
    } else if (isTag(child) && !SKIPPED_TAGS.has(child.name.toLowerCase())) {
      const node = toDomNode(child)
      children.push(node)
      text += SEPARATED_TAGS.has(node.tag) ? ` ${node.text} ` : node.text
    }
  }

  return Object.freeze({
    tag: element.name.toLowerCase(),
    attributes: Object.freeze({ ...element.attribs }),
    text: collapse(text),
    children: Object.freeze(children),
  })
}

/**
 * Build a frozen snapshot from page HTML.
 *
 * @example
 * const snapshot = buildSnapshot({ url: 'https://shop.example.com', html })
 * registry.runAll(snapshot, 0.5)
 */
export function buildSnapshot(input: SnapshotInput): PageSnapshot {
  const $ = cheerio.load(input.html)
  const title = collapse($('title').first().text())
  const body = $('body').get(0)
  const domTree = body ? toDomNode(body) : null

  return Object.freeze({
    url: input.url,
    title,
    domTree,
    textContent: domTree ? normalizeText(domTree.text) : '',
    screenshotRefs: Object.freeze({ ...(input.screenshotRefs ?? {}) }),
    capturedAt: input.capturedAt ?? new Date().toISOString(),
  })
}
