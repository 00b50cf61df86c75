/**
 * @fileoverview Runtime configuration from environment variables.
 * Entry points load `.env` through dotenv first; this module only parses
 * and validates what ends up in the environment.
 */

import { z } from 'zod'
import { REPORT_FORMATS, type ReportFormat } from './types.js'
import { setRulesDirectory } from './data/index.js'
import { ConfigurationError } from './utils/errors.js'
import { configureLogging, type LogThreshold } from './utils/logger.js'

// ============================================================================
// Schema
// ============================================================================

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HEADLESS: flag.default('true'),
  TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  INTERACTION_DELAY_SEC: z.coerce.number().min(0).max(120).default(3),
  CHROMIUM_EXECUTABLE_PATH: z.string().min(1).optional(),
  MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.5),
  CONCURRENCY: z.coerce.number().int().min(1).max(32).default(2),
  REPORT_FORMATS: z
    .string()
    .default('json,html')
    .transform((value) =>
      value
        .split(',')
        .map((part) => part.trim().toLowerCase())
        .filter((part) => part.length > 0),
    )
    .pipe(z.array(z.enum(REPORT_FORMATS)).min(1)),
  OUTPUT_DIR: z.string().min(1).default('output'),
  SCREENSHOTS_DIR: z.string().min(1).default('output/screenshots'),
  RULES_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  WRITE_LOG_TO_FILE: flag.default('false'),
})

// ============================================================================
// Types
// ============================================================================

export interface ScannerConfig {
  port: number
  headless: boolean
  timeoutMs: number
  interactionDelaySec: number
  chromiumExecutablePath: string | null
  /** Global confidence floor applied by the registry */
  minConfidence: number
  concurrency: number
  reportFormats: ReportFormat[]
  outputDir: string
  screenshotsDir: string
  rulesDir: string | null
  logLevel: LogThreshold
  writeLogToFile: boolean
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Parse and validate the scanner configuration. Empty variables count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScannerConfig {
  const present: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim()
    }
  }

  const result = envSchema.safeParse(present)
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid environment configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const parsed = result.data
  return {
    port: parsed.PORT,
    headless: parsed.HEADLESS,
    timeoutMs: parsed.TIMEOUT_MS,
    interactionDelaySec: parsed.INTERACTION_DELAY_SEC,
    chromiumExecutablePath: parsed.CHROMIUM_EXECUTABLE_PATH ?? null,
    minConfidence: parsed.MIN_CONFIDENCE,
    concurrency: parsed.CONCURRENCY,
    reportFormats: parsed.REPORT_FORMATS,
    outputDir: parsed.OUTPUT_DIR,
    screenshotsDir: parsed.SCREENSHOTS_DIR,
    rulesDir: parsed.RULES_DIR ?? null,
    logLevel: parsed.LOG_LEVEL,
    writeLogToFile: parsed.WRITE_LOG_TO_FILE,
  }
}

/**
 * Apply the process-wide parts of a configuration: logging and the rules
 * directory. Call before constructing detectors.
 */
export function applyConfig(config: ScannerConfig): void {
  configureLogging({ level: config.logLevel, writeToFile: config.writeLogToFile })
  setRulesDirectory(config.rulesDir)
}
