/**
 * @fileoverview Collaborators shared by the API route handlers. One context
 * is built per app instance and passed to every router explicitly.
 */

import type { ScannerConfig } from '../config.js'
import type { DetectionRegistry, PageFetcher, SeverityScorer, TaskStore } from '../services/index.js'

export interface ApiContext {
  store: TaskStore
  registry: DetectionRegistry
  scorer: SeverityScorer
  fetcher: PageFetcher
  config: ScannerConfig
}
