/**
 * @fileoverview Error types for the scanning pipeline and safe message extraction.
 *
 * Only {@link ConfigurationError} is meant to reach the top level; the other
 * errors are contained by the detector, the registry or the batch runner.
 */

/**
 * Safely extract an error message from an unknown error type.
 *
 * @param error - The caught error of unknown type
 * @returns The error message string, or 'Unknown error' for non-Error values
 *
 * @example
 * try {
 *   registry.runAll(snapshot, 0.5)
 * } catch (error) {
 *   log.error(getErrorMessage(error))
 * }
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string' && error.length > 0) return error
  return 'Unknown error'
}

/**
 * Invalid startup configuration: a threshold outside [0, 1], a weight table
 * with unknown pattern keys, an unparsable environment variable.
 */
export class ConfigurationError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

/**
 * A detector met snapshot data it cannot interpret. Detectors recover from
 * this locally by returning no detections.
 */
export class SnapshotMalformedError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SnapshotMalformedError'
  }
}

/** Why a page could not be turned into a snapshot */
export type FetchFailureKind = 'navigation' | 'http-status' | 'access-denied' | 'timeout' | 'invalid-url' | 'browser'

/**
 * A page fetch failed. The site is reported as failed and excluded from
 * pattern statistics.
 */
export class FetchError extends Error {
  readonly url: string
  readonly kind: FetchFailureKind
  readonly statusCode: number | null

  constructor(url: string, kind: FetchFailureKind, message: string, statusCode: number | null = null) {
    super(message)
    this.name = 'FetchError'
    this.url = url
    this.kind = kind
    this.statusCode = statusCode
  }
}
