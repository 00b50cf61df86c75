/**
 * @fileoverview Barrel export for utility modules.
 *
 * @example
 * import { createLogger, getErrorMessage, isThirdParty, withRetry } from '../utils/index.js'
 */

export * from './url.js'
export * from './errors.js'
export * from './logger.js'
export * from './retry.js'
