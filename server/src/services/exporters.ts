/**
 * @fileoverview Report exporters: JSON, CSV and HTML renderings of site
 * results, plus writing them to an output directory.
 *
 * Renderers are pure (results in, string out) so the HTTP API can stream
 * them; {@link writeReports} is the only function here that touches disk.
 */

import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import { createObjectCsvStringifier } from 'csv-writer'
import type { ReportFormat, SiteReport, SiteResult } from '../types.js'
import { createLogger, urlToFileStem } from '../utils/index.js'
import { aggregate, groupByPattern } from './report.js'
import { severityBand } from './severity.js'

const log = createLogger('Export')

// ============================================================================
// JSON
// ============================================================================

function siteToJson(result: SiteResult) {
  if (result.status !== 'analyzed') return result
  return {
    status: result.status,
    ...result.report,
    severityBand: severityBand(result.report.severityScore),
    patterns: groupByPattern(result.report.detections),
  }
}

/**
 * Full nested export: aggregate summary plus every site with its
 * detections grouped by pattern and the matching suggestions.
 */
export function renderJson(results: readonly SiteResult[], generatedAt: string = new Date().toISOString()): string {
  return JSON.stringify(
    {
      generatedAt,
      summary: aggregate(results),
      sites: results.map(siteToJson),
    },
    null,
    2,
  )
}

// ============================================================================
// CSV
// ============================================================================

const CSV_HEADER = [
  { id: 'row_type', title: 'row_type' },
  { id: 'status', title: 'status' },
  { id: 'url', title: 'url' },
  { id: 'title', title: 'title' },
  { id: 'timestamp', title: 'timestamp' },
  { id: 'severity_score', title: 'severity_score' },
  { id: 'detection_count', title: 'detection_count' },
  { id: 'pattern_types', title: 'pattern_types' },
  { id: 'pattern_type', title: 'pattern_type' },
  { id: 'confidence', title: 'confidence' },
  { id: 'location', title: 'location' },
  { id: 'evidence', title: 'evidence' },
  { id: 'screenshot_ref', title: 'screenshot_ref' },
  { id: 'error', title: 'error' },
]

type CsvRow = Record<string, string | number>

function csvRows(result: SiteResult): CsvRow[] {
  if (result.status === 'failed') {
    return [{ row_type: 'summary', status: 'failed', url: result.url, timestamp: result.timestamp, error: result.error }]
  }
  if (result.status === 'skipped') {
    return [{ row_type: 'summary', status: 'skipped', url: result.url }]
  }

  const { report } = result
  const rows: CsvRow[] = [
    {
      row_type: 'summary',
      status: 'analyzed',
      url: report.url,
      title: report.title,
      timestamp: report.timestamp,
      severity_score: report.severityScore,
      detection_count: report.detections.length,
      pattern_types: report.patternTypesPresent.join(';'),
    },
  ]
  for (const detection of report.detections) {
    rows.push({
      row_type: 'detection',
      status: 'analyzed',
      url: report.url,
      timestamp: report.timestamp,
      pattern_type: detection.patternType,
      confidence: detection.confidence,
      location: detection.location,
      evidence: JSON.stringify(detection.evidence),
      screenshot_ref: detection.screenshotRef ?? '',
    })
  }
  return rows
}

/**
 * One `summary` row per site followed by one `detection` row per detection.
 */
export function renderCsv(results: readonly SiteResult[]): string {
  const stringifier = createObjectCsvStringifier({ header: CSV_HEADER })
  return (stringifier.getHeaderString() ?? '') + stringifier.stringifyRecords(results.flatMap(csvRows))
}

// ============================================================================
// HTML
// ============================================================================

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch)
}

const STYLES = `
body { font-family: system-ui, sans-serif; margin: 2rem; color: #1f2933; }
h1 { margin-bottom: 0.25rem; }
.site { border: 1px solid #d9e2ec; border-radius: 8px; padding: 1rem 1.5rem; margin: 1.5rem 0; }
.badge { display: inline-block; padding: 0.15rem 0.6rem; border-radius: 999px; color: #fff; font-weight: 600; }
.badge.high { background: #c53030; } .badge.medium { background: #dd6b20; } .badge.low { background: #2f855a; }
.failed { color: #c53030; } .skipped { color: #7b8794; }
table { border-collapse: collapse; width: 100%; margin-top: 0.5rem; }
th, td { border-bottom: 1px solid #e4e7eb; padding: 0.4rem; text-align: left; vertical-align: top; font-size: 0.9rem; }
code { font-size: 0.8rem; word-break: break-all; }
`

function renderSiteHtml(report: SiteReport): string {
  const band = severityBand(report.severityScore)
  const groups = groupByPattern(report.detections)
    .map(
      (group) => `
    <h3>${escapeHtml(group.patternType)} (${group.count})</h3>
    <table>
      <tr><th>Confidence</th><th>Location</th><th>Evidence</th></tr>
      ${group.detections
        .map(
          (d) =>
            `<tr><td>${d.confidence.toFixed(2)}</td><td>${escapeHtml(d.location)}</td><td><code>${escapeHtml(JSON.stringify(d.evidence))}</code></td></tr>`,
        )
        .join('\n      ')}
    </table>
    <ul>${group.suggestions.map((s) => `<li>${escapeHtml(s)}</li>`).join('')}</ul>`,
    )
    .join('\n')

  const failures = report.failures.length
    ? `<p class="failed">Detectors that failed: ${report.failures.map((f) => escapeHtml(`${f.detector}: ${f.error}`)).join('; ')}</p>`
    : ''

  return `
  <section class="site">
    <h2>${escapeHtml(report.title || report.url)}</h2>
    <p><a href="${escapeHtml(report.url)}">${escapeHtml(report.url)}</a> · ${escapeHtml(report.timestamp)}</p>
    <p>Severity <span class="badge ${band}">${report.severityScore.toFixed(1)} ${band}</span> · ${report.detections.length} detection(s)</p>
    ${failures}
    ${groups || '<p>No dark patterns detected.</p>'}
  </section>`
}

/**
 * Self-contained HTML page. Every value taken from a page is escaped.
 */
export function renderHtml(results: readonly SiteResult[], generatedAt: string = new Date().toISOString()): string {
  const summary = aggregate(results)
  const sites = results
    .map((result) => {
      switch (result.status) {
        case 'analyzed':
          return renderSiteHtml(result.report)
        case 'failed':
          return `\n  <section class="site failed"><h2>${escapeHtml(result.url)}</h2><p>Failed: ${escapeHtml(result.error)}</p></section>`
        case 'skipped':
          return `\n  <section class="site skipped"><h2>${escapeHtml(result.url)}</h2><p>Skipped</p></section>`
      }
    })
    .join('\n')

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Dark pattern report</title>
  <style>${STYLES}</style>
</head>
<body>
  <h1>Dark pattern report</h1>
  <p>Generated ${escapeHtml(generatedAt)} · ${summary.analyzedSites} analyzed, ${summary.failedSites} failed, ${summary.skippedSites} skipped · ${summary.totalDetections} detection(s) · average severity ${summary.averageSeverity.toFixed(1)}</p>
  ${sites}
</body>
</html>
`
}

// ============================================================================
// Dispatch and Files
// ============================================================================

export const CONTENT_TYPES: Record<ReportFormat, string> = {
  json: 'application/json; charset=utf-8',
  csv: 'text/csv; charset=utf-8',
  html: 'text/html; charset=utf-8',
}

export function renderReport(format: ReportFormat, results: readonly SiteResult[]): string {
  switch (format) {
    case 'json':
      return renderJson(results)
    case 'csv':
      return renderCsv(results)
    case 'html':
      return renderHtml(results)
  }
}

/** 2026-01-15T12:00:00.000Z → 20260115_120000 */
function fileStamp(iso: string): string {
  return iso.replace(/[-:]/g, '').replace('T', '_').slice(0, 15)
}

/**
 * Write one file per site and format, named `<host>_<stamp>.<ext>`, plus
 * an aggregate `summary_<stamp>.json`. Skipped sites get no site files.
 *
 * @returns Paths of every file written
 */
export async function writeReports(
  directory: string,
  results: readonly SiteResult[],
  formats: readonly ReportFormat[],
  now: Date = new Date(),
): Promise<string[]> {
  await mkdir(directory, { recursive: true })
  const stamp = fileStamp(now.toISOString())
  const used = new Set<string>()
  const written: string[] = []

  for (const result of results) {
    if (result.status === 'skipped') continue
    let stem = `${urlToFileStem(result.url)}_${stamp}`
    for (let n = 2; used.has(stem); n++) {
      stem = `${urlToFileStem(result.url)}_${stamp}_${n}`
    }
    used.add(stem)

    for (const format of formats) {
      const path = join(directory, `${stem}.${format}`)
      await writeFile(path, renderReport(format, [result]), 'utf-8')
      written.push(path)
    }
  }

  const summaryPath = join(directory, `summary_${stamp}.json`)
  await writeFile(
    summaryPath,
    JSON.stringify({ generatedAt: now.toISOString(), ...aggregate(results) }, null, 2),
    'utf-8',
  )
  written.push(summaryPath)

  log.success('Reports written', { directory, files: written.length })
  return written
}
