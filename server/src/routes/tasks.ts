/**
 * @fileoverview Task endpoints: status, results, cancellation and export of
 * scan tasks started through POST /api/analyze.
 */

import express, { type Response, type Router } from 'express'
import { CONTENT_TYPES, aggregate, renderReport, type ScanTask } from '../services/index.js'
import { isReportFormat } from '../types.js'
import type { ApiContext } from './context.js'
import { sendBadRequest } from './analyze.js'

function sendNotFound(res: Response, id: string): void {
  res.status(404).json({ error: `Unknown task: ${id}` })
}

/** Task status without the (possibly large) result list */
function taskStatus(task: ScanTask) {
  return {
    id: task.id,
    state: task.state,
    urls: task.urls,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
    progress: task.progress,
    cancelRequested: task.cancelRequested,
    error: task.error,
  }
}

export function createTasksRouter(ctx: ApiContext): Router {
  const router = express.Router()

  /** GET /api/tasks/:id - Task state and progress counters */
  router.get('/api/tasks/:id', (req, res) => {
    const task = ctx.store.get(req.params.id)
    if (!task) {
      sendNotFound(res, req.params.id)
      return
    }
    res.json(taskStatus(task))
  })

  /**
   * GET /api/tasks/:id/results - Site results so far plus their aggregate.
   * While the task runs, results appear in the order sites finish.
   */
  router.get('/api/tasks/:id/results', (req, res) => {
    const task = ctx.store.get(req.params.id)
    if (!task) {
      sendNotFound(res, req.params.id)
      return
    }
    res.json({ ...taskStatus(task), results: task.results, summary: aggregate(task.results) })
  })

  /** POST /api/tasks/:id/cancel - Skip every site not yet started */
  router.post('/api/tasks/:id/cancel', (req, res) => {
    const task = ctx.store.get(req.params.id)
    if (!task) {
      sendNotFound(res, req.params.id)
      return
    }
    if (!ctx.store.cancel(task.id)) {
      res.status(409).json({ error: `Task ${task.id} has already ${task.state}` })
      return
    }
    res.status(202).json({ id: task.id, cancelRequested: true })
  })

  /** GET /api/tasks/:id/export/:format - Download a completed task as json, csv or html */
  router.get('/api/tasks/:id/export/:format', (req, res) => {
    const { id, format } = req.params
    if (!isReportFormat(format)) {
      sendBadRequest(res, `Unsupported export format: ${format}`, ['expected one of json, csv, html'])
      return
    }
    const task = ctx.store.get(id)
    if (!task) {
      sendNotFound(res, id)
      return
    }
    if (task.state !== 'completed') {
      res.status(409).json({ error: `Task ${id} is ${task.state}; only completed tasks can be exported` })
      return
    }

    res.setHeader('Content-Type', CONTENT_TYPES[format])
    res.setHeader('Content-Disposition', `attachment; filename="scan-${id}.${format}"`)
    res.send(renderReport(format, task.results))
  })

  return router
}
