/**
 * @fileoverview In-memory store of scan tasks started through the HTTP API.
 *
 * The store is an ordinary object handed to the routes, so tests and
 * separate app instances never share task state.
 */

import { v4 as uuidv4 } from 'uuid'
import type { SiteResult } from '../types.js'
import { createLogger, getErrorMessage } from '../utils/index.js'
import type { BatchProgress } from './batch.js'

const log = createLogger('Tasks')

// ============================================================================
// Types
// ============================================================================

export type TaskState = 'pending' | 'running' | 'completed' | 'failed'

/** Read-only view of a task as returned to API clients */
export interface ScanTask {
  readonly id: string
  readonly state: TaskState
  readonly urls: readonly string[]
  readonly createdAt: string
  readonly updatedAt: string
  readonly progress: { readonly completed: number; readonly total: number }
  /** Results in input order once completed; in finishing order while running */
  readonly results: readonly SiteResult[]
  readonly error: string | null
  readonly cancelRequested: boolean
}

/**
 * The work a task runs. It receives the task's abort signal and a progress
 * callback and resolves with one result per URL.
 */
export type TaskWork = (
  signal: AbortSignal,
  onProgress: (progress: BatchProgress) => void,
) => Promise<SiteResult[]>

interface TaskEntry {
  task: ScanTask
  controller: AbortController
  settled: Promise<void>
}

function isSettled(state: TaskState): boolean {
  return state === 'completed' || state === 'failed'
}

// ============================================================================
// Store
// ============================================================================

export class TaskStore {
  private readonly entries = new Map<string, TaskEntry>()

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Register a task for the given URLs in the 'pending' state.
   */
  create(urls: readonly string[]): ScanTask {
    const timestamp = this.now().toISOString()
    const task: ScanTask = {
      id: uuidv4(),
      state: 'pending',
      urls: [...urls],
      createdAt: timestamp,
      updatedAt: timestamp,
      progress: { completed: 0, total: urls.length },
      results: [],
      error: null,
      cancelRequested: false,
    }
    this.entries.set(task.id, { task, controller: new AbortController(), settled: Promise.resolve() })
    log.info('Task created', { id: task.id, urls: urls.length })
    return task
  }

  get(id: string): ScanTask | undefined {
    return this.entries.get(id)?.task
  }

  list(): ScanTask[] {
    return [...this.entries.values()].map((entry) => entry.task)
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * Run work for a pending task. The task moves to 'running' immediately
   * and to 'completed' or 'failed' when the work settles; the work's
   * rejection is recorded on the task and never rethrown.
   *
   * @throws Error if the task is unknown or was already started
   */
  track(id: string, work: TaskWork): void {
    const entry = this.entries.get(id)
    if (!entry) throw new Error(`Unknown task: ${id}`)
    if (entry.task.state !== 'pending') throw new Error(`Task ${id} was already started`)

    this.update(entry, { state: 'running' })
    const partial: SiteResult[] = []

    entry.settled = work(entry.controller.signal, (progress) => {
      partial.push(progress.result)
      this.update(entry, {
        progress: { completed: progress.completed, total: progress.total },
        results: [...partial],
      })
    }).then(
      (results) => {
        this.update(entry, {
          state: 'completed',
          results,
          progress: { completed: results.length, total: entry.task.progress.total },
        })
        log.success('Task completed', { id, sites: results.length })
      },
      (error: unknown) => {
        const message = getErrorMessage(error)
        this.update(entry, { state: 'failed', error: message })
        log.error('Task failed', { id, error: message })
      },
    )
  }

  /**
   * Resolves once the task's work has settled (immediately for unknown or
   * never-started tasks).
   */
  whenSettled(id: string): Promise<void> {
    return this.entries.get(id)?.settled ?? Promise.resolve()
  }

  /**
   * Request cooperative cancellation. Sites already being scanned finish,
   * queued ones are reported as skipped.
   *
   * @returns false when the task is unknown or already settled
   */
  cancel(id: string): boolean {
    const entry = this.entries.get(id)
    if (!entry || isSettled(entry.task.state)) return false
    entry.controller.abort()
    this.update(entry, { cancelRequested: true })
    log.warn('Task cancellation requested', { id })
    return true
  }

  /**
   * Forget settled tasks last updated more than `maxAgeMs` ago.
   *
   * @returns Number of tasks removed
   */
  prune(maxAgeMs: number): number {
    const cutoff = this.now().getTime() - maxAgeMs
    let removed = 0
    for (const [id, entry] of this.entries) {
      if (isSettled(entry.task.state) && Date.parse(entry.task.updatedAt) < cutoff) {
        this.entries.delete(id)
        removed++
      }
    }
    if (removed > 0) log.debug('Pruned tasks', { removed })
    return removed
  }

  /** Results of every completed task, oldest task first */
  completedResults(): SiteResult[] {
    return this.list()
      .filter((task) => task.state === 'completed')
      .flatMap((task) => task.results)
  }

  private update(entry: TaskEntry, changes: Partial<Omit<ScanTask, 'id'>>): void {
    entry.task = { ...entry.task, ...changes, updatedAt: this.now().toISOString() }
  }
}
