/**
 * @fileoverview Retry utility with exponential backoff for transient failures.
 * Used by the page fetcher around navigation, where connection resets and
 * DNS hiccups are common on large crawls.
 */

import { createLogger } from './logger.js'
import { getErrorMessage } from './errors.js'

const log = createLogger('Retry')

/** Options for configuring retry behavior */
export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2) */
  maxRetries?: number
  /** Initial delay in milliseconds before first retry (default: 1000) */
  initialDelayMs?: number
  /** Maximum delay in milliseconds between retries (default: 10000) */
  maxDelayMs?: number
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number
  /** Decide whether an error deserves another attempt (default: {@link isTransientError}) */
  shouldRetry?: (error: unknown) => boolean
  /** Optional context string for logging */
  context?: string
}

const DEFAULT_OPTIONS = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
}

/** Chromium network error codes and Node socket codes worth retrying */
const TRANSIENT_MARKERS = [
  'net::ERR_CONNECTION_RESET',
  'net::ERR_CONNECTION_CLOSED',
  'net::ERR_NETWORK_CHANGED',
  'net::ERR_NAME_RESOLUTION_FAILED',
  'net::ERR_TIMED_OUT',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EPIPE',
]

/**
 * Check if an error looks like a transient network failure.
 */
export function isTransientError(error: unknown): boolean {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    if (TRANSIENT_MARKERS.includes(error.code)) return true
  }
  const message = getErrorMessage(error)
  return TRANSIENT_MARKERS.some((marker) => message.includes(marker))
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Execute an async function with automatic retry on transient failures.
 *
 * @param fn - The async function to execute
 * @param options - Retry configuration options
 * @returns The result of the function if successful
 * @throws The last error if all retries are exhausted or the error is not retryable
 *
 * @example
 * const response = await withRetry(
 *   () => page.goto(url, { timeout }),
 *   { context: `navigate ${url}` }
 * )
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_OPTIONS.maxRetries
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs
  const backoffMultiplier = options.backoffMultiplier ?? DEFAULT_OPTIONS.backoffMultiplier
  const shouldRetry = options.shouldRetry ?? isTransientError

  let delay = options.initialDelayMs ?? DEFAULT_OPTIONS.initialDelayMs

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error
      }
      if (attempt >= maxRetries) {
        log.warn('All retry attempts exhausted', {
          context: options.context,
          attempts: attempt + 1,
          error: getErrorMessage(error),
        })
        throw error
      }

      // ±20% jitter so parallel workers do not retry in lockstep
      const jitter = delay * 0.2 * (Math.random() * 2 - 1)
      const waitMs = Math.max(0, Math.min(Math.round(delay + jitter), maxDelayMs))

      log.warn('Retrying after transient error', {
        context: options.context,
        attempt: attempt + 1,
        maxRetries,
        delayMs: waitMs,
        error: getErrorMessage(error).slice(0, 100),
      })

      await sleep(waitMs)
      delay = Math.min(delay * backoffMultiplier, maxDelayMs)
    }
  }
}
