import request from 'supertest'
import { describe, it, expect } from 'vitest'
import { createApp } from '../../src/app.js'
import { loadConfig } from '../../src/config.js'
import { createDefaultDetectors } from '../../src/detectors/index.js'
import { DetectionRegistry, SeverityScorer, TaskStore } from '../../src/services/index.js'
import type { ApiContext } from '../../src/routes/index.js'
import { FetchError } from '../../src/utils/errors.js'
import { FakePageFetcher, pageHtml } from '../helpers.js'

const SHAMING = 'https://shaming.example.com/'
const DOWN = 'https://down.example.com/'
const PLAIN = 'https://plain.example.com/'
const SHAMING_BODY = '<div class="modal"><button>No thanks, I enjoy paying full price</button></div>'

const PAGES = {
  [SHAMING]: pageHtml(SHAMING_BODY),
  [DOWN]: new FetchError(DOWN, 'http-status', 'HTTP 503 Service Unavailable', 503),
  [PLAIN]: pageHtml('<h1>About us</h1><p>We make tea.</p>'),
}

function setup(delayMs = 0): ApiContext {
  return {
    store: new TaskStore(),
    registry: new DetectionRegistry(createDefaultDetectors()),
    scorer: new SeverityScorer(),
    fetcher: new FakePageFetcher(PAGES, delayMs),
    config: loadConfig({}),
  }
}

async function startScan(ctx: ApiContext, body: object): Promise<string> {
  const res = await request(createApp(ctx)).post('/api/analyze').send(body).expect(202)
  return res.body.taskId
}

describe('POST /api/analyze', () => {
  it('should start a task and finish it in the background', async () => {
    const ctx = setup()
    const app = createApp(ctx)

    const started = await request(app).post('/api/analyze').send({ urls: [SHAMING, DOWN, SHAMING] }).expect(202)
    expect(started.body).toMatchObject({ state: 'running', total: 2 })

    await ctx.store.whenSettled(started.body.taskId)
    const status = await request(app).get(`/api/tasks/${started.body.taskId}`).expect(200)

    expect(status.body).toMatchObject({
      id: started.body.taskId,
      state: 'completed',
      urls: [SHAMING, DOWN],
      progress: { completed: 2, total: 2 },
      cancelRequested: false,
      error: null,
    })
    expect(status.body.results).toBeUndefined()
  })

  it('should reject a request without URLs', async () => {
    const res = await request(createApp(setup())).post('/api/analyze').send({}).expect(400)
    expect(res.body).toEqual({ error: 'Invalid analyze request', issues: ['url or urls is required'] })
  })

  it('should reject relative or non-http URLs', async () => {
    const res = await request(createApp(setup()))
      .post('/api/analyze')
      .send({ urls: [SHAMING, 'shop.example.com', 'ftp://files.example.com/'] })
      .expect(400)
    expect(res.body).toEqual({
      error: 'Only absolute http(s) URLs can be scanned',
      issues: ['shop.example.com', 'ftp://files.example.com/'],
    })
  })

  it('should reject an out-of-range confidence floor', async () => {
    const res = await request(createApp(setup())).post('/api/analyze').send({ url: SHAMING, minConfidence: 2 }).expect(400)
    expect(res.body.issues[0]).toMatch(/^minConfidence: /)
  })

  it('should answer 400 for a body that is not JSON', async () => {
    const res = await request(createApp(setup()))
      .post('/api/analyze')
      .set('Content-Type', 'application/json')
      .send('{"url": ')
      .expect(400)
    expect(res.body.error).toBe('Request body is not valid JSON')
  })
})

describe('POST /api/analyze/html', () => {
  it('should analyze posted HTML synchronously', async () => {
    const res = await request(createApp(setup()))
      .post('/api/analyze/html')
      .send({ html: pageHtml(SHAMING_BODY, 'Checkout'), url: 'https://shop.example.com/' })
      .expect(200)

    expect(res.body.report).toMatchObject({ url: 'https://shop.example.com/', title: 'Checkout' })
    expect(res.body.report.patternTypesPresent).toContain('confirmshaming')
    expect(res.body.patterns[0]).toMatchObject({ patternType: 'confirmshaming', maxConfidence: 1 })
  })

  it('should default the URL for fragments without one', async () => {
    const res = await request(createApp(setup())).post('/api/analyze/html').send({ html: '<p>Hi</p>' }).expect(200)
    expect(res.body.report).toMatchObject({ url: 'about:blank', detections: [], severityScore: 0 })
    expect(res.body.severityBand).toBe('low')
  })

  it('should require html', async () => {
    const res = await request(createApp(setup())).post('/api/analyze/html').send({ url: PLAIN }).expect(400)
    expect(res.body.error).toBe('Invalid HTML analysis request')
  })
})

describe('task endpoints', () => {
  it('should return results with their aggregate', async () => {
    const ctx = setup()
    const id = await startScan(ctx, { urls: [SHAMING, DOWN, PLAIN] })
    await ctx.store.whenSettled(id)

    const res = await request(createApp(ctx)).get(`/api/tasks/${id}/results`).expect(200)

    expect(res.body.results.map((r: { status: string }) => r.status)).toEqual(['analyzed', 'failed', 'analyzed'])
    expect(res.body.summary).toMatchObject({ totalSites: 3, analyzedSites: 2, failedSites: 1 })
    expect(res.body.summary.failures).toEqual([{ url: DOWN, error: 'HTTP 503 Service Unavailable' }])
  })

  it('should answer 404 for unknown tasks', async () => {
    const app = createApp(setup())
    expect((await request(app).get('/api/tasks/nope').expect(404)).body).toEqual({ error: 'Unknown task: nope' })
    await request(app).get('/api/tasks/nope/results').expect(404)
    await request(app).post('/api/tasks/nope/cancel').expect(404)
    await request(app).get('/api/tasks/nope/export/json').expect(404)
  })

  it('should skip queued sites after a cancel', async () => {
    const ctx = setup(100)
    const app = createApp(ctx)
    const id = await startScan(ctx, { urls: [SHAMING, PLAIN, DOWN], concurrency: 1 })

    const cancelled = await request(app).post(`/api/tasks/${id}/cancel`).expect(202)
    expect(cancelled.body).toEqual({ id, cancelRequested: true })
    await ctx.store.whenSettled(id)

    const res = await request(app).get(`/api/tasks/${id}/results`).expect(200)
    expect(res.body.results.map((r: { status: string }) => r.status)).toEqual(['analyzed', 'skipped', 'skipped'])
    expect(res.body.summary.skippedSites).toBe(2)

    const again = await request(app).post(`/api/tasks/${id}/cancel`).expect(409)
    expect(again.body.error).toBe(`Task ${id} has already completed`)
  })

  it('should export a completed task as CSV', async () => {
    const ctx = setup()
    const id = await startScan(ctx, { urls: [DOWN] })
    await ctx.store.whenSettled(id)

    const res = await request(createApp(ctx)).get(`/api/tasks/${id}/export/csv`).expect(200)

    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8')
    expect(res.headers['content-disposition']).toBe(`attachment; filename="scan-${id}.csv"`)
    expect(res.text.split('\n')[1]).toMatch(/^summary,failed,https:\/\/down\.example\.com\/,,/)
  })

  it('should refuse to export a running task or an unknown format', async () => {
    const ctx = setup(100)
    const app = createApp(ctx)
    const id = await startScan(ctx, { urls: [PLAIN] })

    await request(app).get(`/api/tasks/${id}/export/json`).expect(409)
    const bad = await request(app).get(`/api/tasks/${id}/export/pdf`).expect(400)
    expect(bad.body.error).toBe('Unsupported export format: pdf')

    await ctx.store.whenSettled(id)
  })
})

describe('dashboard and health', () => {
  it('should aggregate every completed task', async () => {
    const ctx = setup()
    const first = await startScan(ctx, { urls: [SHAMING] })
    const second = await startScan(ctx, { urls: [PLAIN, DOWN] })
    await Promise.all([ctx.store.whenSettled(first), ctx.store.whenSettled(second)])

    const res = await request(createApp(ctx)).get('/api/dashboard/summary?top=1').expect(200)

    expect(res.body.tasks).toEqual({ pending: 0, running: 0, completed: 2, failed: 0 })
    expect(res.body).toMatchObject({ totalSites: 3, analyzedSites: 2, failedSites: 1 })
    expect(res.body.topSites.map((s: { url: string }) => s.url)).toEqual([SHAMING])
  })

  it('should validate the ranking length', async () => {
    await request(createApp(setup())).get('/api/dashboard/summary?top=-1').expect(400)
  })

  it('should report health with the registered detectors', async () => {
    const res = await request(createApp(setup())).get('/api/health').expect(200)
    expect(res.body).toEqual({
      status: 'ok',
      detectors: [
        'confirmshaming',
        'preselection',
        'hidden_costs',
        'difficult_cancellation',
        'misleading_ads',
        'false_urgency',
        'confusing_interface',
      ],
      tasks: 0,
    })
  })

  it('should answer 404 for unknown API paths', async () => {
    const res = await request(createApp(setup())).get('/api/nothing').expect(404)
    expect(res.body).toEqual({ error: 'Not found' })
  })
})
