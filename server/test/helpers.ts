/**
 * Shared fixtures: snapshots from HTML fragments and an in-memory page fetcher.
 */

import { buildSnapshot } from '../src/services/snapshot.js'
import type { FetchOptions, FetchResult, PageFetcher } from '../src/services/page-fetcher.js'
import type { Detection, DomNode, PageSnapshot, PatternType, SiteResult } from '../src/types.js'
import { createDetection } from '../src/detectors/base.js'
import { FetchError } from '../src/utils/errors.js'

export const CAPTURED_AT = '2026-01-15T12:00:00.000Z'
export const PAGE_URL = 'https://shop.example.com/'

export function pageHtml(body: string, title = 'Test page'): string {
  return `<!DOCTYPE html><html><head><title>${title}</title></head><body>${body}</body></html>`
}

export function snapshotFromHtml(
  body: string,
  options: { url?: string; title?: string; screenshotRefs?: Record<string, string> } = {},
): PageSnapshot {
  return buildSnapshot({
    url: options.url ?? PAGE_URL,
    html: pageHtml(body, options.title),
    screenshotRefs: options.screenshotRefs,
    capturedAt: CAPTURED_AT,
  })
}

/** Hand-built DOM node for tests that bypass the snapshot builder */
export function el(tag: string, attributes: Record<string, string> = {}, children: DomNode[] = [], text = ''): DomNode {
  return { tag, attributes, children, text }
}

export function detection(patternType: PatternType, confidence: number, url = PAGE_URL): Detection {
  return createDetection({ patternType, confidence, location: `${patternType} location`, url })
}

export function analyzed(
  url: string,
  detections: Detection[],
  severityScore: number,
  timestamp = CAPTURED_AT,
): SiteResult {
  const types = [...new Set(detections.map((d) => d.patternType))]
  return {
    status: 'analyzed',
    url,
    report: {
      url,
      title: `Title of ${url}`,
      timestamp,
      detections,
      severityScore,
      patternTypesPresent: types,
      failures: [],
      screenshotRefs: {},
    },
  }
}

/**
 * Serves canned HTML per URL. A URL mapped to a FetchError fails with it,
 * an unknown URL fails with a navigation error.
 */
export class FakePageFetcher implements PageFetcher {
  readonly calls: string[] = []
  /** Most fetches observed in flight at once */
  maxInFlight = 0
  private inFlight = 0

  constructor(
    private readonly pages: Record<string, string | FetchError>,
    private readonly delayMs = 0,
  ) {}

  async fetch(url: string, _options: FetchOptions): Promise<FetchResult> {
    this.calls.push(url)
    this.inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs))
      }
      const page = this.pages[url]
      if (page === undefined) {
        return { ok: false, error: new FetchError(url, 'navigation', `net::ERR_NAME_NOT_RESOLVED at ${url}`) }
      }
      if (page instanceof FetchError) {
        return { ok: false, error: page }
      }
      return { ok: true, snapshot: buildSnapshot({ url, html: page, capturedAt: CAPTURED_AT }) }
    } finally {
      this.inFlight--
    }
  }
}

export const FETCH_OPTIONS: FetchOptions = { headless: true, timeoutMs: 1000, interactionDelaySec: 0 }
