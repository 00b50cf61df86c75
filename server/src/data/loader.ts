/**
 * @fileoverview Data loader for detector rules and severity weights.
 * Reads the JSON files under ./rules (or a directory named by RULES_DIR),
 * validates them with zod and caches the raw content per file.
 *
 * Lexicons, weights and thresholds live in these files so they can be
 * tuned without touching detector code.
 */

import { readFileSync } from 'fs'
import { join, dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import type { z } from 'zod'
import type { PatternType } from '../types.js'
import { ConfigurationError, getErrorMessage } from '../utils/errors.js'
import { severityWeightsSchema, type SeverityWeights } from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

/** Rule files shipped with the scanner */
export const BUILTIN_RULES_DIR = join(__dirname, 'rules')

let rulesDirectory = BUILTIN_RULES_DIR

/** Raw JSON keyed by absolute path - loaded once per file */
const rawCache = new Map<string, unknown>()

// ============================================================================
// Rule Directory
// ============================================================================

/**
 * Point the loader at another rules directory, or back at the built-in one
 * with `null`. Clears the cache.
 */
export function setRulesDirectory(directory: string | null): void {
  rulesDirectory = directory ? resolve(directory) : BUILTIN_RULES_DIR
  rawCache.clear()
}

export function getRulesDirectory(): string {
  return rulesDirectory
}

// ============================================================================
// JSON File Loading
// ============================================================================

/**
 * Load and parse a JSON file from the rules directory.
 */
function loadJson(filename: string): unknown {
  const fullPath = join(rulesDirectory, filename)
  if (!rawCache.has(fullPath)) {
    let content: string
    try {
      content = readFileSync(fullPath, 'utf-8')
    } catch (error) {
      throw new ConfigurationError(`Cannot read rule file ${fullPath}`, [getErrorMessage(error)])
    }
    try {
      rawCache.set(fullPath, JSON.parse(content))
    } catch (error) {
      throw new ConfigurationError(`Rule file ${fullPath} is not valid JSON`, [getErrorMessage(error)])
    }
  }
  return rawCache.get(fullPath)
}

/**
 * Validate a rule file against its schema.
 *
 * @throws ConfigurationError listing every issue zod found
 */
function parseRuleFile<S extends z.ZodTypeAny>(filename: string, schema: S): z.infer<S> {
  const result = schema.safeParse(loadJson(filename))
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigurationError(`Invalid rule file ${filename}`, issues)
  }
  return result.data
}

// ============================================================================
// Public Accessors
// ============================================================================

/**
 * File name holding a detector's rules, e.g. 'hidden_costs' → 'hidden-costs.json'.
 */
export function ruleFileName(patternType: PatternType): string {
  return `${patternType.replace(/_/g, '-')}.json`
}

/**
 * Load and validate the rules of one detector.
 *
 * @example
 * const rules = loadDetectorRules('confirmshaming', confirmshamingRulesSchema)
 */
export function loadDetectorRules<S extends z.ZodTypeAny>(patternType: PatternType, schema: S): z.infer<S> {
  return parseRuleFile(ruleFileName(patternType), schema)
}

/**
 * Get the per-pattern severity weights.
 */
export function getSeverityWeights(): SeverityWeights {
  return parseRuleFile('severity-weights.json', severityWeightsSchema)
}
