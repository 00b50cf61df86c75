/**
 * @fileoverview Dashboard and health endpoints.
 */

import express, { type Router } from 'express'
import { aggregate, type TaskState } from '../services/index.js'
import type { ApiContext } from './context.js'
import { sendBadRequest } from './analyze.js'

const DEFAULT_TOP_SITES = 10

export function createDashboardRouter(ctx: ApiContext): Router {
  const router = express.Router()

  /**
   * GET /api/dashboard/summary - Aggregate statistics over every completed
   * task the server still remembers. `?top=N` sets the ranking length.
   */
  router.get('/api/dashboard/summary', (req, res) => {
    const top = typeof req.query.top === 'string' ? Number(req.query.top) : DEFAULT_TOP_SITES
    if (!Number.isInteger(top) || top < 0) {
      sendBadRequest(res, 'top must be a non-negative integer')
      return
    }

    const tasks: Record<TaskState, number> = { pending: 0, running: 0, completed: 0, failed: 0 }
    for (const task of ctx.store.list()) {
      tasks[task.state]++
    }

    res.json({ tasks, ...aggregate(ctx.store.completedResults(), top) })
  })

  /** GET /api/health - Liveness plus the registered detectors */
  router.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      detectors: ctx.registry.list().map((detector) => detector.name),
      tasks: ctx.store.size,
    })
  })

  return router
}
