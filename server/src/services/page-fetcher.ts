/**
 * @fileoverview Page fetching: loads a URL in a real browser and turns the
 * rendered page into a snapshot. Every failure comes back as a FetchError
 * value so the batch runner can mark the site failed and move on.
 */

import { mkdir } from 'fs/promises'
import { join } from 'path'
import type { PageSnapshot } from '../types.js'
import { FetchError, createLogger, getErrorMessage, isValidUrl, urlToFileStem } from '../utils/index.js'
import { BrowserSession } from './browser-session.js'
import { buildSnapshot } from './snapshot.js'

const log = createLogger('Fetcher')

/** Upper bound on waiting for network idle after the DOM is ready */
const NETWORK_IDLE_CAP_MS = 10000

// ============================================================================
// Types
// ============================================================================

export interface FetchOptions {
  headless: boolean
  timeoutMs: number
  /** Seconds to wait after load so popups and timers can appear */
  interactionDelaySec: number
}

export type FetchResult = { ok: true; snapshot: PageSnapshot } | { ok: false; error: FetchError }

/**
 * Anything that can turn a URL into a snapshot. The batch runner and the
 * HTTP routes depend on this, so tests can hand in an in-memory fetcher.
 */
export interface PageFetcher {
  fetch(url: string, options: FetchOptions): Promise<FetchResult>
}

export interface PlaywrightFetcherSettings {
  /** Where screenshots go; null disables them */
  screenshotsDir: string | null
  executablePath?: string
}

function failure(error: FetchError): FetchResult {
  log.warn('Fetch failed', { url: error.url, kind: error.kind, error: error.message })
  return { ok: false, error }
}

// ============================================================================
// Playwright Fetcher
// ============================================================================

/**
 * Fetches each URL in its own short-lived browser session.
 */
export class PlaywrightPageFetcher implements PageFetcher {
  constructor(private readonly settings: PlaywrightFetcherSettings) {}

  async fetch(url: string, options: FetchOptions): Promise<FetchResult> {
    if (!isValidUrl(url)) {
      return failure(new FetchError(url, 'invalid-url', `Not an http(s) URL: ${url}`))
    }

    const session = new BrowserSession({ headless: options.headless, executablePath: this.settings.executablePath })
    log.startTimer(`fetch ${url}`)

    try {
      try {
        await session.launch()
      } catch (error) {
        return failure(new FetchError(url, 'browser', `Browser launch failed: ${getErrorMessage(error)}`))
      }

      const navigation = await session.navigateTo(url, options.timeoutMs)
      if (!navigation.success) {
        const kind = navigation.isAccessDenied
          ? 'access-denied'
          : navigation.timedOut
            ? 'timeout'
            : navigation.statusCode !== null
              ? 'http-status'
              : 'navigation'
        return failure(new FetchError(url, kind, navigation.errorMessage ?? 'Navigation failed', navigation.statusCode))
      }

      await session.waitForNetworkIdle(Math.min(options.timeoutMs, NETWORK_IDLE_CAP_MS))
      await session.settle(options.interactionDelaySec * 1000)
      await session.scrollThrough()

      const access = await session.checkForAccessDenied()
      if (access.denied) {
        return failure(new FetchError(url, 'access-denied', access.reason ?? 'Access denied', navigation.statusCode))
      }

      const capturedAt = new Date().toISOString()
      const screenshotRefs = await this.captureScreenshots(session, url, capturedAt)
      const html = await session.getPageContent()

      return { ok: true, snapshot: buildSnapshot({ url, html, screenshotRefs, capturedAt }) }
    } catch (error) {
      return failure(new FetchError(url, 'browser', getErrorMessage(error)))
    } finally {
      await session.close()
      log.endTimer(`fetch ${url}`, `Fetched ${url}`)
    }
  }

  /**
   * Save viewport and full-page screenshots. A failed capture is logged and
   * left out of the refs; it never fails the fetch.
   */
  private async captureScreenshots(
    session: BrowserSession,
    url: string,
    capturedAt: string,
  ): Promise<Record<string, string>> {
    const directory = this.settings.screenshotsDir
    if (!directory) return {}

    const refs: Record<string, string> = {}
    const stem = `${urlToFileStem(url)}_${capturedAt.replace(/[:.]/g, '-')}`
    try {
      await mkdir(directory, { recursive: true })
      for (const [name, fullPage] of [['viewport', false], ['full', true]] as const) {
        const path = join(directory, `${stem}_${name}.png`)
        await session.saveScreenshot(path, fullPage)
        refs[name] = path
      }
    } catch (error) {
      log.warn('Screenshot capture failed', { url, error: getErrorMessage(error) })
    }
    return refs
  }
}
