/**
 * @fileoverview Logging utility with timestamps, level filtering and timing support.
 * Provides colourised console output for scan stages and, when enabled,
 * mirrors every line (without ANSI codes) into a timestamped log file.
 */

import * as fs from 'fs'
import * as path from 'path'

// ============================================================================
// Types
// ============================================================================

/** Log level for categorizing messages */
type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug' | 'timing'

/** Minimum level a logger prints; 'silent' suppresses everything */
export type LogThreshold = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/** Options accepted by {@link configureLogging} */
export interface LoggingOptions {
  /** Minimum level to print */
  level?: LogThreshold
  /** Write a copy of every line to logs/darkscan_<timestamp>.log */
  writeToFile?: boolean
  /** Directory for log files (default: ./logs) */
  directory?: string
}

/** Numeric rank of each message level, compared against the threshold */
const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  timing: 20,
  info: 20,
  success: 20,
  warn: 30,
  error: 40,
}

const THRESHOLD_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/** Timer storage for tracking operation durations */
const timers: Map<string, number> = new Map()

// ============================================================================
// Shared Output State
// ============================================================================

function isLogThreshold(value: string | undefined): value is LogThreshold {
  return value !== undefined && value in THRESHOLD_RANK
}

let threshold: LogThreshold = isLogThreshold(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info'

let logFileStream: fs.WriteStream | null = null

/**
 * Apply logging options for the whole process.
 * Safe to call more than once; the log file is only opened the first time.
 */
export function configureLogging(options: LoggingOptions): void {
  if (options.level) {
    threshold = options.level
  }
  if (options.writeToFile && !logFileStream) {
    const logsDir = path.resolve(process.cwd(), options.directory ?? 'logs')
    fs.mkdirSync(logsDir, { recursive: true })

    const now = new Date()
    const stamp = now.toISOString().replace(/[:.]/g, '-').replace('T', '_').slice(0, 19)
    const logFilePath = path.join(logsDir, `darkscan_${stamp}.log`)

    logFileStream = fs.createWriteStream(logFilePath, { flags: 'a' })
    logFileStream.write(`${'='.repeat(80)}\n  Dark Pattern Scanner log - started ${now.toISOString()}\n${'='.repeat(80)}\n`)
  }
}

/** Current threshold, mostly useful for tests and the CLI */
export function getLogThreshold(): LogThreshold {
  return threshold
}

/**
 * Write a line to the log file (without ANSI colors).
 */
function writeToLogFile(line: string): void {
  if (!logFileStream) return
  // eslint-disable-next-line no-control-regex
  logFileStream.write(line.replace(/\x1b\[[0-9;]*m/g, '') + '\n')
}

function emit(line: string, level: LogLevel): void {
  if (level === 'error') {
    console.error(line)
  } else {
    console.log(line)
  }
  writeToLogFile(line)
}

// ============================================================================
// ANSI Colors
// ============================================================================

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
}

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Get current timestamp in HH:MM:SS.mmm format.
 */
function getTimestamp(): string {
  const now = new Date()
  const pad = (n: number, width = 2) => n.toString().padStart(width, '0')
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`
}

/**
 * Format duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`
  }
  const minutes = Math.floor(ms / 60000)
  const seconds = ((ms % 60000) / 1000).toFixed(1)
  return `${minutes}m ${seconds}s`
}

const LEVEL_STYLE: Record<LogLevel, { color: string; symbol: string }> = {
  info: { color: colors.cyan, symbol: 'ℹ' },
  success: { color: colors.green, symbol: '✓' },
  warn: { color: colors.yellow, symbol: '⚠' },
  error: { color: colors.red, symbol: '✗' },
  debug: { color: colors.gray, symbol: '•' },
  timing: { color: colors.magenta, symbol: '⏱' },
}

/**
 * Format a structured value for display.
 */
function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return `${colors.dim}null${colors.reset}`
  }
  if (typeof value === 'number') {
    return `${colors.yellow}${value}${colors.reset}`
  }
  if (typeof value === 'boolean') {
    return value ? `${colors.green}true${colors.reset}` : `${colors.red}false${colors.reset}`
  }
  if (typeof value === 'string') {
    const display = value.length > 60 ? value.substring(0, 57) + '...' : value
    return `${colors.green}"${display}"${colors.reset}`
  }
  if (Array.isArray(value)) {
    return `${colors.cyan}[${value.length} items]${colors.reset}`
  }
  if (typeof value === 'object') {
    return `${colors.cyan}{${Object.keys(value).length} keys}${colors.reset}`
  }
  return String(value)
}

// ============================================================================
// Core Logger
// ============================================================================

/**
 * Logger bound to a context label such as 'Registry' or 'Fetcher'.
 */
export class Logger {
  constructor(private readonly context: string = 'Scanner') {}

  /**
   * Create a logger for a sub-context, e.g. `log.child('Confirmshaming')`.
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`)
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < THRESHOLD_RANK[threshold]) return

    const { color, symbol } = LEVEL_STYLE[level]
    const prefix = `${colors.gray}[${getTimestamp()}]${colors.reset} ${color}${symbol}${colors.reset} ${colors.bright}[${this.context}]${colors.reset}`

    if (data && Object.keys(data).length > 0) {
      const dataStr = Object.entries(data)
        .map(([k, v]) => `${colors.dim}${k}=${colors.reset}${formatValue(v)}`)
        .join(' ')
      emit(`${prefix} ${message} ${dataStr}`, level)
    } else {
      emit(`${prefix} ${message}`, level)
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data)
  }

  success(message: string, data?: Record<string, unknown>): void {
    this.log('success', message, data)
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data)
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data)
  }

  /**
   * Start a timer for an operation.
   * @param label - Unique label for the timer within this context
   */
  startTimer(label: string): void {
    timers.set(`${this.context}:${label}`, Date.now())
    this.log('timing', `Starting: ${label}`)
  }

  /**
   * End a timer and log the duration.
   * @returns Duration in milliseconds, 0 when the timer was never started
   */
  endTimer(label: string, message?: string): number {
    const key = `${this.context}:${label}`
    const start = timers.get(key)

    if (start === undefined) {
      this.warn(`Timer "${label}" was not started`)
      return 0
    }

    const duration = Date.now() - start
    timers.delete(key)

    const durationStr = `${colors.magenta}${formatDuration(duration)}${colors.reset}`
    this.log('timing', `${message ?? `Completed: ${label}`} ${colors.dim}took${colors.reset} ${durationStr}`)
    return duration
  }

  /**
   * Log a section header for visual separation (one per scanned site).
   */
  section(title: string): void {
    if (THRESHOLD_RANK[threshold] > LEVEL_RANK.info) return
    const line = '─'.repeat(60)
    for (const l of ['', `${colors.blue}${line}${colors.reset}`, `${colors.blue}${colors.bright}  ${title}${colors.reset}`, `${colors.blue}${line}${colors.reset}`, '']) {
      emit(l, 'info')
    }
  }
}

// ============================================================================
// Exports
// ============================================================================

/** Main logger instance */
export const logger = new Logger('Scanner')

/** Create a logger for a specific module */
export function createLogger(context: string): Logger {
  return new Logger(context)
}
