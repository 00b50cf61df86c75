/**
 * @fileoverview Express app setup and route configuration.
 * Builds the app around explicitly passed collaborators so tests can run it
 * in process with a fake page fetcher.
 */

import express, { type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import { ConfigurationError, createLogger, getErrorMessage } from './utils/index.js'
import { createAnalyzeRouter, createDashboardRouter, createTasksRouter, type ApiContext } from './routes/index.js'

const log = createLogger('Server')

/** Largest JSON body accepted (posted HTML included) */
const BODY_LIMIT = '10mb'

export function createApp(ctx: ApiContext): express.Express {
  const app = express()

  // ============================================================================
  // Middleware
  // ============================================================================

  app.use(cors())
  app.use(express.json({ limit: BODY_LIMIT }))

  // ============================================================================
  // API Routes
  // ============================================================================

  app.use(createAnalyzeRouter(ctx))
  app.use(createTasksRouter(ctx))
  app.use(createDashboardRouter(ctx))

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' })
  })

  // ============================================================================
  // Errors
  // ============================================================================

  // Four parameters mark this as the error handler
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ConfigurationError) {
      res.status(400).json({ error: error.message, issues: error.issues })
      return
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body is not valid JSON', issues: [error.message] })
      return
    }
    log.error('Unhandled request error', { error: getErrorMessage(error) })
    res.status(500).json({ error: 'Internal server error' })
  })

  return app
}
