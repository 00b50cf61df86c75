// Service layer exports

export { DetectionRegistry, assertConfidenceFloor, type RegistryRun } from './registry.js'
export { SeverityScorer, severityBand, validateSeverityWeights, type SeverityBand } from './severity.js'
export {
  PATTERN_SUGGESTIONS,
  aggregate,
  buildSiteReport,
  compareSites,
  distinctPatternTypes,
  groupByPattern,
  summarizeSite,
  type PatternGroup,
} from './report.js'
export { buildSnapshot, type SnapshotInput } from './snapshot.js'
export { detectAccessDenial, type AccessDenialResult } from './access-detection.js'
export { BrowserSession } from './browser-session.js'
export {
  PlaywrightPageFetcher,
  type FetchOptions,
  type FetchResult,
  type PageFetcher,
  type PlaywrightFetcherSettings,
} from './page-fetcher.js'
export {
  analyzeSite,
  analyzeSnapshot,
  runBatch,
  type BatchOptions,
  type BatchProgress,
  type ScanDependencies,
} from './batch.js'
export {
  cleanUrlRecords,
  formatFromPath,
  loadUrlFile,
  parseUrlList,
  splitCsvRecords,
  type UrlFileFormat,
  type UrlRecord,
} from './url-source.js'
export {
  CONTENT_TYPES,
  escapeHtml,
  renderCsv,
  renderHtml,
  renderJson,
  renderReport,
  writeReports,
} from './exporters.js'
export { TaskStore, type ScanTask, type TaskState, type TaskWork } from './task-store.js'
