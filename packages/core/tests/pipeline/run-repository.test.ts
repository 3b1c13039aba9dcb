import { describe, it, expect, beforeEach } from 'vitest'
import type Database from 'better-sqlite3'
import { unwrap } from '../../src/common/index.js'
import { openDatabase } from '../../src/storage/index.js'
import { PipelineRunRepository, EMPTY_METRICS } from '../../src/pipeline/index.js'

let db: Database.Database
let runs: PipelineRunRepository

beforeEach(() => {
  db = openDatabase(':memory:')
  runs = new PipelineRunRepository(db)
})

describe('PipelineRunRepository', () => {
  it('starts a run with zero counters', () => {
    const run = unwrap(runs.start('2026-03-01T00:00:00.000Z'))
    expect(run.status).toBe('running')
    expect(run.endedAt).toBeNull()
    expect(run.documentsMatched).toBe(0)

    const stored = unwrap(runs.get(run.id))
    expect(stored).toEqual(run)
  })

  it('finishes a run with its counters', () => {
    const run = unwrap(runs.start('2026-03-01T00:00:00.000Z'))
    const finished = runs.finish(
      run.id,
      'success',
      { documentsMatched: 4, linksWritten: 6, linksResolved: 6, highlightsFound: 2 },
      '2026-03-01T00:05:00.000Z',
    )
    expect(finished.ok).toBe(true)
    if (!finished.ok) return
    expect(finished.value.status).toBe('success')
    expect(finished.value.endedAt).toBe('2026-03-01T00:05:00.000Z')
    expect(finished.value.linksWritten).toBe(6)
    expect(finished.value.highlightsFound).toBe(2)
    expect(finished.value.error).toBeNull()
  })

  it('keeps the error of a failed run', () => {
    const run = unwrap(runs.start('2026-03-01T00:00:00.000Z'))
    const finished = unwrap(runs.finish(run.id, 'failure', EMPTY_METRICS, '2026-03-01T00:01:00.000Z', 'store offline'))
    expect(finished.status).toBe('failure')
    expect(finished.error).toBe('store offline')
  })

  it('returns NOT_FOUND when finishing an unknown run', () => {
    const result = runs.finish('missing', 'success', EMPTY_METRICS, '2026-03-01T00:00:00.000Z')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('NOT_FOUND')
  })

  it('lists the most recent runs first', () => {
    runs.start('2026-03-01T00:00:00.000Z')
    runs.start('2026-03-03T00:00:00.000Z')
    runs.start('2026-03-02T00:00:00.000Z')

    const listed = unwrap(runs.list(2))
    expect(listed.map((r) => r.startedAt)).toEqual(['2026-03-03T00:00:00.000Z', '2026-03-02T00:00:00.000Z'])
  })
})
