import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type Database from 'better-sqlite3'
import { unwrap } from '../../src/common/index.js'
import { openDatabase } from '../../src/storage/index.js'
import { defaultEngineConfig } from '../../src/config/index.js'
import { AnchorRepository } from '../../src/anchors/index.js'
import { LinkRepository } from '../../src/links/index.js'
import { PipelineStateTracker, PipelineRunRepository, runPipeline } from '../../src/pipeline/index.js'
import type { PipelineDeps } from '../../src/pipeline/index.js'
import { ThresholdStatisticsService } from '../../src/statistics/index.js'
import { EmbeddingResolver } from '../../src/vectors/index.js'
import { FakeVectorStore, docId, seedDocument } from '../fixtures.js'

const config = defaultEngineConfig()
const NOW = new Date('2026-03-02T00:00:00.000Z')

let db: Database.Database
let store: FakeVectorStore
let deps: PipelineDeps

beforeEach(() => {
  db = openDatabase(':memory:')
  store = new FakeVectorStore()
  deps = {
    db,
    anchors: new AnchorRepository(db),
    links: new LinkRepository(db),
    tracker: new PipelineStateTracker(db),
    resolver: new EmbeddingResolver(store),
    statistics: new ThresholdStatisticsService(db, config.statistics),
    runs: new PipelineRunRepository(db),
  }
  store.setComponent('tag', 'alignment', [1, 0])
  unwrap(deps.anchors.create({ name: 'Alignment', components: [{ type: 'tag', componentId: 'alignment' }] }))
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('runPipeline', () => {
  it('matches, refreshes statistics, classifies and records the run', async () => {
    seedDocument(db, { n: 1, category: 'Think Tank', through: 'index' })
    seedDocument(db, { n: 2, category: 'Academic', through: 'index' })
    store.setChunks(docId(1), [[1, 0]])
    store.setChunks(docId(2), [[0, 1]])

    const report = unwrap(await runPipeline(deps, { config, now: () => NOW }))
    expect(report.match?.documentsMatched).toBe(2)
    expect(report.match?.linksWritten).toBe(2)
    expect(report.matchError).toBeNull()
    expect(report.statisticsRefreshed).toBe(true)
    expect(report.classify.linksResolved).toBe(2)
    expect(report.classify.orgHighlights).toBe(1)

    expect(report.run.status).toBe('success')
    expect(report.run.startedAt).toBe(NOW.toISOString())
    expect(report.run.endedAt).toBe(NOW.toISOString())
    expect(report.run.documentsMatched).toBe(2)
    expect(report.run.linksWritten).toBe(2)
    expect(report.run.linksResolved).toBe(2)
    expect(report.run.highlightsFound).toBe(1)
  })

  it('does not refresh statistics again within the interval', async () => {
    unwrap(await runPipeline(deps, { config, now: () => NOW }))
    const second = unwrap(await runPipeline(deps, { config, now: () => NOW }))
    expect(second.statisticsRefreshed).toBe(false)
    expect(unwrap(deps.runs.list())).toHaveLength(2)
  })

  it('classifies already matched documents when the vector store is unavailable', async () => {
    seedDocument(db, { n: 1, through: 'index' })
    seedDocument(db, { n: 2, through: 'match' })
    store.goOffline()

    const report = unwrap(await runPipeline(deps, { config, now: () => NOW }))
    expect(report.match).toBeNull()
    expect(report.matchError?.code).toBe('VECTOR_ERROR')
    expect(report.classify.documentsEnriched).toBe(1)

    expect(report.run.status).toBe('failure')
    expect(report.run.error).toBe('Vector store unavailable: connection refused')
    expect(report.run.documentsMatched).toBe(0)
    expect(unwrap(deps.tracker.getState(docId(2))).enrichedAt).toBe(NOW.toISOString())
    expect(unwrap(deps.tracker.getState(docId(1))).matchedAt).toBeNull()
  })
})
