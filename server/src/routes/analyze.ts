/**
 * @fileoverview Analysis endpoints.
 *
 * POST /api/analyze starts a background scan task for one or many URLs and
 * answers 202 with the task id; progress and results are read through the
 * task endpoints. POST /api/analyze/html runs the detectors on posted HTML
 * synchronously, without a browser.
 */

import express, { type Response, type Router } from 'express'
import { z } from 'zod'
import { analyzeSnapshot, buildSnapshot, groupByPattern, runBatch, severityBand } from '../services/index.js'
import { createLogger, isValidUrl } from '../utils/index.js'
import type { ApiContext } from './context.js'

const log = createLogger('API')

/** Most URLs accepted in one request */
const MAX_URLS = 500

/** Settled tasks are forgotten after this long */
export const TASK_TTL_MS = 60 * 60 * 1000

// ============================================================================
// Request Schemas
// ============================================================================

const analyzeBodySchema = z
  .object({
    url: z.string().min(1).optional(),
    urls: z.array(z.string().min(1)).min(1).max(MAX_URLS).optional(),
    minConfidence: z.number().min(0).max(1).optional(),
    concurrency: z.number().int().min(1).max(32).optional(),
    headless: z.boolean().optional(),
    timeoutMs: z.number().int().positive().optional(),
    interactionDelaySec: z.number().min(0).max(120).optional(),
  })
  .strict()
  .refine((body) => body.url !== undefined || body.urls !== undefined, { message: 'url or urls is required' })

const analyzeHtmlBodySchema = z
  .object({
    html: z.string().min(1),
    url: z.string().url().default('about:blank'),
    minConfidence: z.number().min(0).max(1).optional(),
    screenshotRefs: z.record(z.string()).optional(),
  })
  .strict()

/**
 * Answer 400 with a message and the individual problems.
 */
export function sendBadRequest(res: Response, error: string, issues: string[] = []): void {
  res.status(400).json({ error, issues })
}

function zodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}

// ============================================================================
// Router
// ============================================================================

export function createAnalyzeRouter(ctx: ApiContext): Router {
  const router = express.Router()

  /**
   * POST /api/analyze - Start a scan task.
   *
   * Body: { url } or { urls: [...] }, plus optional minConfidence,
   * concurrency, headless, timeoutMs and interactionDelaySec overriding the
   * server configuration for this task.
   */
  router.post('/api/analyze', (req, res) => {
    const parsed = analyzeBodySchema.safeParse(req.body ?? {})
    if (!parsed.success) {
      sendBadRequest(res, 'Invalid analyze request', zodIssues(parsed.error))
      return
    }

    const body = parsed.data
    const urls = [...new Set([...(body.url !== undefined ? [body.url] : []), ...(body.urls ?? [])])]
    const invalid = urls.filter((url) => !isValidUrl(url))
    if (invalid.length > 0) {
      sendBadRequest(res, 'Only absolute http(s) URLs can be scanned', invalid)
      return
    }

    ctx.store.prune(TASK_TTL_MS)
    const task = ctx.store.create(urls)
    const options = {
      headless: body.headless ?? ctx.config.headless,
      timeoutMs: body.timeoutMs ?? ctx.config.timeoutMs,
      interactionDelaySec: body.interactionDelaySec ?? ctx.config.interactionDelaySec,
      concurrency: body.concurrency ?? ctx.config.concurrency,
      minConfidence: body.minConfidence ?? ctx.config.minConfidence,
    }

    ctx.store.track(task.id, (signal, onProgress) => runBatch(urls, ctx, { ...options, signal, onProgress }))
    log.info('Scan task started', { id: task.id, urls: urls.length })

    res.status(202).json({ taskId: task.id, state: 'running', total: urls.length })
  })

  /**
   * POST /api/analyze/html - Analyze posted HTML and return the site report.
   *
   * Body: { html, url?, minConfidence?, screenshotRefs? }
   */
  router.post('/api/analyze/html', (req, res) => {
    const parsed = analyzeHtmlBodySchema.safeParse(req.body ?? {})
    if (!parsed.success) {
      sendBadRequest(res, 'Invalid HTML analysis request', zodIssues(parsed.error))
      return
    }

    const { html, url, minConfidence, screenshotRefs } = parsed.data
    const snapshot = buildSnapshot({ url, html, screenshotRefs })
    const report = analyzeSnapshot(snapshot, ctx, minConfidence ?? ctx.config.minConfidence)

    res.json({
      report,
      severityBand: severityBand(report.severityScore),
      patterns: groupByPattern(report.detections),
    })
  })

  return router
}
