/**
 * @fileoverview Browser session management for concurrent scanning.
 * Each BrowserSession instance owns its own browser, context and page, so
 * several sites can be fetched at once without sharing cookies or state.
 */

import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright-core'
import { createLogger, getErrorMessage, isTransientError, withRetry } from '../utils/index.js'
import { detectAccessDenial, type AccessDenialResult } from './access-detection.js'

const log = createLogger('Browser')

// ============================================================================
// Constants
// ============================================================================

/** Desktop viewport used for every capture */
const VIEWPORT = { width: 1366, height: 900 }

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'

/** Wheel steps used to trigger lazy-loaded content */
const SCROLL_STEPS = 6
const SCROLL_DELTA_PX = 900

// ============================================================================
// Types
// ============================================================================

export interface BrowserSessionOptions {
  headless: boolean
  /** Chromium binary; playwright-core does not download one */
  executablePath?: string
}

/**
 * Result of a navigation attempt.
 */
export interface NavigationResult {
  success: boolean
  statusCode: number | null
  statusText: string | null
  isAccessDenied: boolean
  timedOut: boolean
  errorMessage: string | null
}

// ============================================================================
// BrowserSession Class
// ============================================================================

/**
 * Manages an isolated browser session for a single page fetch.
 */
export class BrowserSession {
  /** Active browser instance */
  private browser: Browser | null = null
  /** Browser context (incognito-like session) */
  private context: BrowserContext | null = null
  /** Current page being controlled */
  private page: Page | null = null

  constructor(private readonly options: BrowserSessionOptions) {}

  private requirePage(): Page {
    if (!this.page) {
      throw new Error('No browser session active')
    }
    return this.page
  }

  // ==========================================================================
  // Browser Lifecycle
  // ==========================================================================

  /**
   * Launch a fresh Chromium instance with no stored state.
   */
  async launch(): Promise<void> {
    await this.close()

    this.browser = await chromium.launch({
      headless: this.options.headless,
      executablePath: this.options.executablePath,
      args: ['--no-first-run', '--no-default-browser-check'],
    })

    this.context = await this.browser.newContext({
      viewport: VIEWPORT,
      userAgent: USER_AGENT,
      locale: 'en-GB',
      timezoneId: 'Europe/London',
      javaScriptEnabled: true,
    })

    this.page = await this.context.newPage()
  }

  /**
   * Navigate to a URL and wait for the DOM. Transient network errors are
   * retried with backoff; HTTP errors and timeouts are reported, not thrown.
   *
   * @param url - The URL to navigate to
   * @param timeout - Maximum time to wait in milliseconds
   */
  async navigateTo(url: string, timeout: number): Promise<NavigationResult> {
    const page = this.requirePage()

    try {
      const response = await withRetry(() => page.goto(url, { waitUntil: 'domcontentloaded', timeout }), {
        context: `navigate ${url}`,
        shouldRetry: (error) => !(error instanceof errors.TimeoutError) && isTransientError(error),
      })
      const statusCode = response?.status() ?? null
      const statusText = response?.statusText() ?? null

      if (statusCode && statusCode >= 400) {
        const isAccessDenied = statusCode === 403 || statusCode === 401
        return {
          success: false,
          statusCode,
          statusText,
          isAccessDenied,
          timedOut: false,
          errorMessage: isAccessDenied ? `Access denied (${statusCode})` : `Server error (${statusCode}: ${statusText})`,
        }
      }

      return { success: true, statusCode, statusText, isAccessDenied: false, timedOut: false, errorMessage: null }
    } catch (error) {
      return {
        success: false,
        statusCode: null,
        statusText: null,
        isAccessDenied: false,
        timedOut: error instanceof errors.TimeoutError,
        errorMessage: getErrorMessage(error),
      }
    }
  }

  /**
   * Wait for the network to become idle.
   *
   * @returns True if network became idle, false if timed out
   */
  async waitForNetworkIdle(timeout: number): Promise<boolean> {
    const page = this.requirePage()
    try {
      await page.waitForLoadState('networkidle', { timeout })
      return true
    } catch (error) {
      log.debug('Network did not go idle', { error: getErrorMessage(error) })
      return false
    }
  }

  /**
   * Wait a fixed time so timers, popups and late scripts can render.
   */
  async settle(ms: number): Promise<void> {
    if (ms > 0) {
      await this.requirePage().waitForTimeout(ms)
    }
  }

  /**
   * Scroll down the page in steps, then back to the top, so lazy content
   * (late banners, infinite feeds) is present in the capture.
   */
  async scrollThrough(): Promise<void> {
    const page = this.requirePage()
    for (let step = 0; step < SCROLL_STEPS; step++) {
      await page.mouse.wheel(0, SCROLL_DELTA_PX)
      await page.waitForTimeout(150)
    }
    await page.mouse.wheel(0, -SCROLL_DELTA_PX * SCROLL_STEPS)
  }

  // ==========================================================================
  // Data Capture Functions
  // ==========================================================================

  /**
   * Get the full rendered HTML of the current page.
   */
  async getPageContent(): Promise<string> {
    return this.requirePage().content()
  }

  /**
   * Check whether the current page is a bot wall or access-denied page.
   */
  async checkForAccessDenied(): Promise<AccessDenialResult> {
    const page = this.requirePage()
    const title = await page.title()
    const bodyText = await page.innerText('body', { timeout: 5000 }).catch((error: unknown) => {
      log.debug('Could not read body text', { error: getErrorMessage(error) })
      return ''
    })
    return detectAccessDenial(title, bodyText)
  }

  /**
   * Write a PNG screenshot of the current page.
   *
   * @param path - Destination file
   * @param fullPage - Capture the entire scrollable page instead of the viewport
   */
  async saveScreenshot(path: string, fullPage: boolean): Promise<void> {
    await this.requirePage().screenshot({ path, type: 'png', fullPage })
  }

  // ==========================================================================
  // Cleanup Functions
  // ==========================================================================

  /**
   * Close the browser and clean up all resources.
   * Safe to call multiple times or when no browser is active.
   */
  async close(): Promise<void> {
    if (this.page) {
      this.page.removeAllListeners()
      this.page = null
    }

    if (this.context) {
      await this.context.close().catch((error: unknown) => {
        log.warn('Error closing browser context', { error: getErrorMessage(error) })
      })
      this.context = null
    }

    if (this.browser) {
      await this.browser.close().catch((error: unknown) => {
        log.warn('Error closing browser', { error: getErrorMessage(error) })
      })
      this.browser = null
    }
  }
}
