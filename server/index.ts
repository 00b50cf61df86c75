/**
 * @fileoverview Server entry point. Loads `.env`, validates the
 * configuration, builds the detectors and starts the HTTP API.
 */

import 'dotenv/config'
import { createApp } from './src/app.js'
import { applyConfig, loadConfig } from './src/config.js'
import { createDefaultDetectors } from './src/detectors/index.js'
import { DetectionRegistry, PlaywrightPageFetcher, SeverityScorer, TaskStore } from './src/services/index.js'
import { createLogger, getErrorMessage } from './src/utils/index.js'

const log = createLogger('Server')

function start(): void {
  const config = loadConfig()
  applyConfig(config)

  const registry = new DetectionRegistry(createDefaultDetectors())
  const scorer = new SeverityScorer()
  const fetcher = new PlaywrightPageFetcher({
    screenshotsDir: config.screenshotsDir,
    executablePath: config.chromiumExecutablePath ?? undefined,
  })

  const app = createApp({ store: new TaskStore(), registry, scorer, fetcher, config })

  app.listen(config.port, () => {
    log.success(`Server running on http://localhost:${config.port}`, {
      detectors: registry.size,
      minConfidence: config.minConfidence,
    })
  })
}

try {
  start()
} catch (error) {
  log.error('Startup failed', { error: getErrorMessage(error) })
  process.exitCode = 1
}
