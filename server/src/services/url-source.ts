/**
 * @fileoverview URL source: loads the sites to scan from CSV, JSON or TXT
 * files. Entries that are not absolute http(s) URLs are dropped with a
 * warning and duplicates keep their first occurrence.
 */

import { readFile } from 'fs/promises'
import { extname } from 'path'
import { ConfigurationError, createLogger, getErrorMessage, isValidUrl } from '../utils/index.js'

const log = createLogger('UrlSource')

export interface UrlRecord {
  url: string
  category: string | null
  notes: string | null
}

export type UrlFileFormat = 'csv' | 'json' | 'txt'

/** Column or key names that hold the address */
const URL_KEY = /url|link|site/i

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function textField(source: Record<string, unknown>, key: string): string | null {
  const value = source[key]
  return typeof value === 'string' && value.trim() ? value.trim() : null
}

// ============================================================================
// Format Parsers
// ============================================================================

/**
 * Split CSV content into records of fields, honouring double-quoted fields,
 * "" escapes and line breaks inside quotes. Blank records are dropped.
 */
export function splitCsvRecords(content: string): string[][] {
  const records: string[][] = []
  let fields: string[] = []
  let field = ''
  let quoted = false

  const endField = (): void => {
    fields.push(field.trim())
    field = ''
  }
  const endRecord = (): void => {
    endField()
    if (fields.some((value) => value.length > 0)) records.push(fields)
    fields = []
  }

  for (let i = 0; i < content.length; i++) {
    const ch = content[i]
    if (quoted) {
      if (ch === '"' && content[i + 1] === '"') {
        field += '"'
        i++
      } else if (ch === '"') {
        quoted = false
      } else {
        field += ch
      }
    } else if (ch === '"') {
      quoted = true
    } else if (ch === ',') {
      endField()
    } else if (ch === '\n' || (ch === '\r' && content[i + 1] !== '\n')) {
      endRecord()
    } else if (ch !== '\r') {
      field += ch
    }
  }
  endRecord()
  return records
}

/**
 * CSV with a header row. The first column whose name mentions url, link or
 * site holds the address; without one, the first column does and a header
 * row that is itself a URL is kept as data.
 */
function parseCsv(content: string): UrlRecord[] {
  const rows = splitCsvRecords(content)
  if (rows.length === 0) return []

  const header = rows[0].map((name) => name.toLowerCase())
  const urlColumn = header.findIndex((name) => URL_KEY.test(name))
  const hasHeader = urlColumn >= 0 || !isValidUrl(header[0] ?? '')
  const column = Math.max(0, urlColumn)
  const categoryColumn = header.indexOf('category')
  const notesColumn = header.indexOf('notes')

  return rows.slice(hasHeader ? 1 : 0).map((fields) => ({
    url: fields[column] ?? '',
    category: categoryColumn >= 0 ? fields[categoryColumn] || null : null,
    notes: notesColumn >= 0 ? fields[notesColumn] || null : null,
  }))
}

function recordsFromEntry(entry: unknown): UrlRecord[] {
  if (typeof entry === 'string') {
    return [{ url: entry, category: null, notes: null }]
  }
  if (!isRecord(entry)) return []
  const category = textField(entry, 'category')
  const notes = textField(entry, 'notes')
  return Object.entries(entry)
    .filter(([key, value]) => URL_KEY.test(key) && typeof value === 'string')
    .map(([key]) => ({ url: textField(entry, key) ?? '', category, notes }))
}

/**
 * JSON: an array of strings, an array of objects with url-ish keys, or an
 * object whose url-ish keys hold a string or an array of strings.
 */
function parseJson(content: string): UrlRecord[] {
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (error) {
    throw new ConfigurationError('URL file is not valid JSON', [getErrorMessage(error)])
  }

  if (Array.isArray(data)) {
    return data.flatMap(recordsFromEntry)
  }
  if (isRecord(data)) {
    return Object.entries(data).flatMap(([key, value]) => {
      if (!URL_KEY.test(key)) return []
      if (typeof value === 'string') return recordsFromEntry(value)
      return Array.isArray(value) ? value.flatMap(recordsFromEntry) : []
    })
  }
  return []
}

/** One URL per line; blank lines and lines starting with # are ignored */
function parseTxt(content: string): UrlRecord[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map((url) => ({ url, category: null, notes: null }))
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Drop invalid URLs (with a warning) and duplicates, keeping input order.
 */
export function cleanUrlRecords(records: readonly UrlRecord[]): UrlRecord[] {
  const seen = new Set<string>()
  const cleaned: UrlRecord[] = []
  for (const record of records) {
    const url = record.url.trim()
    if (!isValidUrl(url)) {
      log.warn('Skipping invalid URL', { url })
      continue
    }
    if (seen.has(url)) continue
    seen.add(url)
    cleaned.push({ ...record, url })
  }
  return cleaned
}

/**
 * Parse URL records from file content in a known format.
 */
export function parseUrlList(content: string, format: UrlFileFormat): UrlRecord[] {
  const raw = format === 'csv' ? parseCsv(content) : format === 'json' ? parseJson(content) : parseTxt(content)
  return cleanUrlRecords(raw)
}

/**
 * Map a file extension to a format.
 *
 * @throws ConfigurationError for anything but .csv, .json and .txt
 */
export function formatFromPath(path: string): UrlFileFormat {
  const extension = extname(path).toLowerCase()
  if (extension === '.csv') return 'csv'
  if (extension === '.json') return 'json'
  if (extension === '.txt') return 'txt'
  throw new ConfigurationError(`Unsupported URL file format: ${extension || '(none)'}`)
}

/**
 * Load URL records from a file.
 *
 * @throws ConfigurationError if the file is missing, unreadable or of an unknown format
 */
export async function loadUrlFile(path: string): Promise<UrlRecord[]> {
  const format = formatFromPath(path)
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    throw new ConfigurationError(`Cannot read URL file ${path}`, [getErrorMessage(error)])
  }
  const records = parseUrlList(content, format)
  log.info('Loaded URLs', { path, format, count: records.length })
  return records
}
