/**
 * @fileoverview Command-line scanner.
 *
 * @example
 * darkscan https://shop.example.com --formats json,csv
 * darkscan --file sites.csv --concurrency 4 --output reports
 */

import { parseArgs } from 'node:util'
import { z } from 'zod'
import { applyConfig, loadConfig, type ScannerConfig } from './config.js'
import { createDefaultDetectors, type Detector } from './detectors/index.js'
import {
  DetectionRegistry,
  PlaywrightPageFetcher,
  SeverityScorer,
  aggregate,
  cleanUrlRecords,
  loadUrlFile,
  runBatch,
  writeReports,
  type BatchOptions,
  type PageFetcher,
} from './services/index.js'
import { isReportFormat, type ReportFormat, type SiteResult } from './types.js'
import { ConfigurationError, createLogger, getErrorMessage } from './utils/index.js'

const log = createLogger('CLI')

export const USAGE = `Usage: darkscan <url...> | --file <path> [options]

Options:
  -f, --file <path>           Read URLs from a .csv, .json or .txt file
  -o, --output <dir>          Report directory (default: OUTPUT_DIR or ./output)
      --formats <list>        Comma-separated report formats: json,html,csv
      --min-confidence <n>    Drop detections below n (0-1)
      --concurrency <n>       Sites scanned at once
      --timeout <ms>          Navigation timeout per site
      --delay <seconds>       Wait after load before capturing
      --visible               Show the browser window
  -q, --quiet                 Only print the summary
  -h, --help                  Show this help`

const OPTIONS = {
  file: { type: 'string', short: 'f' },
  output: { type: 'string', short: 'o' },
  formats: { type: 'string' },
  'min-confidence': { type: 'string' },
  concurrency: { type: 'string' },
  timeout: { type: 'string' },
  delay: { type: 'string' },
  visible: { type: 'boolean' },
  quiet: { type: 'boolean', short: 'q' },
  help: { type: 'boolean', short: 'h' },
} as const

/**
 * Hooks for tests; the defaults scan real pages with Playwright.
 */
export interface CliDependencies {
  env?: NodeJS.ProcessEnv
  createFetcher?: (config: ScannerConfig) => PageFetcher
  createDetectors?: () => Detector[]
  /** Replaces the SIGINT handler as the cancellation source */
  signal?: AbortSignal
  print?: (line: string) => void
}

// ============================================================================
// Option Parsing
// ============================================================================

/** Ranges for numeric overrides, matching the environment schema */
const NUMBER_RANGES = {
  timeout: z.number().int().positive(),
  delay: z.number().min(0).max(120),
  concurrency: z.number().int().min(1),
  'min-confidence': z.number(),
} satisfies Record<string, z.ZodType<number>>

function numberOption(value: string | undefined, name: keyof typeof NUMBER_RANGES, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`--${name} must be a number`, [`got "${value}"`])
  }
  const result = NUMBER_RANGES[name].safeParse(parsed)
  if (!result.success) {
    throw new ConfigurationError(
      `--${name} is out of range`,
      result.error.issues.map((issue) => issue.message),
    )
  }
  return result.data
}

function parseFormats(value: string | undefined, fallback: ReportFormat[]): ReportFormat[] {
  if (value === undefined) return fallback
  const formats: ReportFormat[] = []
  for (const part of value.split(',')) {
    const format = part.trim().toLowerCase()
    if (!isReportFormat(format)) {
      throw new ConfigurationError('--formats accepts json, html and csv', [`got "${part.trim()}"`])
    }
    if (!formats.includes(format)) formats.push(format)
  }
  if (formats.length === 0) throw new ConfigurationError('--formats is empty')
  return formats
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true })
}

function defaultFetcher(config: ScannerConfig): PageFetcher {
  return new PlaywrightPageFetcher({
    screenshotsDir: config.screenshotsDir,
    executablePath: config.chromiumExecutablePath ?? undefined,
  })
}

// ============================================================================
// Entry
// ============================================================================

/**
 * Run the scanner with command-line arguments.
 *
 * @returns Process exit code: 0 once the batch has run (site failures and
 *          report write errors included), 1 for bad arguments or configuration
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line))

  let parsed: ReturnType<typeof parseCliArgs>
  try {
    parsed = parseCliArgs(argv)
  } catch (error) {
    print(getErrorMessage(error))
    print(USAGE)
    return 1
  }
  const { values, positionals } = parsed

  if (values.help) {
    print(USAGE)
    return 0
  }

  const controller = new AbortController()
  const onSigint = (): void => {
    print('Interrupted: finishing sites in progress, skipping the rest')
    controller.abort()
  }
  if (deps.signal?.aborted) {
    controller.abort()
  } else if (deps.signal) {
    deps.signal.addEventListener('abort', () => controller.abort(), { once: true })
  } else {
    process.once('SIGINT', onSigint)
  }

  try {
    const config = loadConfig(deps.env ?? process.env)
    applyConfig(values.quiet ? { ...config, logLevel: 'silent' } : config)

    const options: BatchOptions = {
      headless: values.visible ? false : config.headless,
      timeoutMs: numberOption(values.timeout, 'timeout', config.timeoutMs),
      interactionDelaySec: numberOption(values.delay, 'delay', config.interactionDelaySec),
      concurrency: numberOption(values.concurrency, 'concurrency', config.concurrency),
      minConfidence: numberOption(values['min-confidence'], 'min-confidence', config.minConfidence),
      signal: controller.signal,
    }
    const formats = parseFormats(values.formats, config.reportFormats)
    const outputDir = values.output ?? config.outputDir

    const records = cleanUrlRecords([
      ...positionals.map((url) => ({ url, category: null, notes: null })),
      ...(values.file ? await loadUrlFile(values.file) : []),
    ])
    if (records.length === 0) {
      throw new ConfigurationError('No valid http(s) URLs to scan')
    }

    const registry = new DetectionRegistry((deps.createDetectors ?? createDefaultDetectors)())
    const fetcher = (deps.createFetcher ?? defaultFetcher)(config)
    const results = await runBatch(
      records.map((record) => record.url),
      { registry, scorer: new SeverityScorer(), fetcher },
      options,
    )

    let files: string[] = []
    let writeError: string | null = null
    try {
      files = await writeReports(outputDir, results, formats)
    } catch (error) {
      writeError = getErrorMessage(error)
      log.error('Could not write reports', { outputDir, error: writeError })
    }
    printSummary(print, results, files)
    if (writeError) print(`Could not write reports to ${outputDir}: ${writeError}`)
    return 0
  } catch (error) {
    if (error instanceof ConfigurationError) {
      print(`Configuration error: ${error.message}`)
      return 1
    }
    log.error('Scan aborted', { error: getErrorMessage(error) })
    print(`Scan failed: ${getErrorMessage(error)}`)
    return 1
  } finally {
    process.off('SIGINT', onSigint)
  }
}

function printSummary(
  print: (line: string) => void,
  results: readonly SiteResult[],
  files: readonly string[],
): void {
  const summary = aggregate(results)
  print(
    `Scanned ${summary.totalSites} site(s): ${summary.analyzedSites} analyzed, ${summary.failedSites} failed, ${summary.skippedSites} skipped`,
  )
  print(`Detections: ${summary.totalDetections}, average severity ${summary.averageSeverity.toFixed(1)}`)
  for (const site of summary.topSites) {
    print(`  ${site.url}  severity ${site.severityScore.toFixed(1)}  ${site.detectionCount} detection(s)`)
  }
  for (const failure of summary.failures) {
    print(`  FAILED ${failure.url}: ${failure.error}`)
  }
  if (files.length > 0) print(`Reports: ${files.join(', ')}`)
}
