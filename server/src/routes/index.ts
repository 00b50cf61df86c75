// Route exports

export type { ApiContext } from './context.js'
export { createAnalyzeRouter, sendBadRequest, TASK_TTL_MS } from './analyze.js'
export { createTasksRouter } from './tasks.js'
export { createDashboardRouter } from './dashboard.js'
