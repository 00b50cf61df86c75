import { describe, it, expect } from 'vitest'
import { TaskStore } from '../../src/services/task-store.js'
import type { SiteResult } from '../../src/types.js'
import { CAPTURED_AT, analyzed } from '../helpers.js'

const A = 'https://a.example.com/'
const B = 'https://b.example.com/'

function clock(start = CAPTURED_AT) {
  let time = Date.parse(start)
  return {
    now: () => new Date(time),
    advance: (ms: number) => {
      time += ms
    },
  }
}

describe('TaskStore', () => {
  it('should create pending tasks with unique ids', () => {
    const store = new TaskStore()
    const first = store.create([A, B])
    const second = store.create([A])

    expect(first.id).not.toBe(second.id)
    expect(first).toMatchObject({ state: 'pending', urls: [A, B], progress: { completed: 0, total: 2 }, results: [] })
    expect(store.size).toBe(2)
    expect(store.get(first.id)).toBe(first)
    expect(store.get('nope')).toBeUndefined()
  })

  it('should expose partial results while running and all of them once completed', async () => {
    const store = new TaskStore()
    const { id } = store.create([A, B])
    const first = analyzed(A, [], 0)
    let finish: (results: SiteResult[]) => void = () => {}

    store.track(
      id,
      (_signal, onProgress) =>
        new Promise<SiteResult[]>((resolve) => {
          onProgress({ completed: 1, total: 2, result: first })
          finish = resolve
        }),
    )

    expect(store.get(id)).toMatchObject({ state: 'running', progress: { completed: 1, total: 2 }, results: [first] })

    finish([first, analyzed(B, [], 0)])
    await store.whenSettled(id)

    expect(store.get(id)).toMatchObject({ state: 'completed', progress: { completed: 2, total: 2 } })
    expect(store.get(id)?.results).toHaveLength(2)
    expect(store.completedResults().map((r) => r.url)).toEqual([A, B])
  })

  it('should record a rejected work function as a failed task', async () => {
    const store = new TaskStore()
    const { id } = store.create([A])

    store.track(id, () => Promise.reject(new Error('browser crashed')))
    await store.whenSettled(id)

    expect(store.get(id)).toMatchObject({ state: 'failed', error: 'browser crashed' })
    expect(store.completedResults()).toEqual([])
  })

  it('should refuse to start a task twice or an unknown task', () => {
    const store = new TaskStore()
    const { id } = store.create([A])
    store.track(id, () => new Promise<SiteResult[]>(() => {}))

    expect(() => store.track(id, () => Promise.resolve([]))).toThrow(`Task ${id} was already started`)
    expect(() => store.track('nope', () => Promise.resolve([]))).toThrow('Unknown task: nope')
  })

  it('should abort the running work on cancel', async () => {
    const store = new TaskStore()
    const { id } = store.create([A])
    const seen: { signal?: AbortSignal } = {}

    store.track(
      id,
      (signal) =>
        new Promise<SiteResult[]>((resolve) => {
          seen.signal = signal
          signal.addEventListener('abort', () => resolve([{ status: 'skipped', url: A }]))
        }),
    )

    expect(store.cancel(id)).toBe(true)
    expect(seen.signal?.aborted).toBe(true)
    expect(store.get(id)?.cancelRequested).toBe(true)

    await store.whenSettled(id)
    expect(store.get(id)?.state).toBe('completed')
    expect(store.cancel(id)).toBe(false)
    expect(store.cancel('nope')).toBe(false)
  })

  it('should prune only settled tasks older than the cutoff', async () => {
    const time = clock()
    const store = new TaskStore(time.now)
    const done = store.create([A])
    const running = store.create([B])
    store.track(done.id, () => Promise.resolve([]))
    store.track(running.id, () => new Promise<SiteResult[]>(() => {}))
    await store.whenSettled(done.id)

    time.advance(30_000)
    expect(store.prune(60_000)).toBe(0)

    time.advance(60_000)
    expect(store.prune(60_000)).toBe(1)
    expect(store.get(done.id)).toBeUndefined()
    expect(store.get(running.id)?.state).toBe('running')
  })
})
