/**
 * Pipeline run log: one row per orchestrated run with its counters.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import { Ok, Err, EngineError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'

export const PipelineRunStatusSchema = z.enum(['running', 'success', 'failure'])
export type PipelineRunStatus = z.infer<typeof PipelineRunStatusSchema>

export interface PipelineRunMetrics {
  documentsMatched: number
  linksWritten: number
  linksResolved: number
  highlightsFound: number
}

export interface PipelineRun extends PipelineRunMetrics {
  id: string
  startedAt: string
  endedAt: string | null
  status: PipelineRunStatus
  error: string | null
}

interface RunRow {
  id: string
  started_at: string
  ended_at: string | null
  status: string
  documents_matched: number
  links_written: number
  links_resolved: number
  highlights_found: number
  error: string | null
}

const RUN_COLUMNS =
  'id, started_at, ended_at, status, documents_matched, links_written, links_resolved, highlights_found, error'

export const EMPTY_METRICS: PipelineRunMetrics = {
  documentsMatched: 0,
  linksWritten: 0,
  linksResolved: 0,
  highlightsFound: 0,
}

function rowToRun(row: RunRow): PipelineRun {
  const status = PipelineRunStatusSchema.safeParse(row.status)
  return {
    id: row.id,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    status: status.success ? status.data : 'failure',
    documentsMatched: row.documents_matched,
    linksWritten: row.links_written,
    linksResolved: row.links_resolved,
    highlightsFound: row.highlights_found,
    error: row.error,
  }
}

export class PipelineRunRepository {
  constructor(private db: Database.Database) {}

  start(startedAt: string): Result<PipelineRun, EngineError> {
    const id = uuidv4()
    try {
      this.db.prepare('INSERT INTO pipeline_runs (id, started_at, status) VALUES (?, ?, ?)').run(id, startedAt, 'running')
      return Ok({ id, startedAt, endedAt: null, status: 'running', error: null, ...EMPTY_METRICS })
    } catch (e) {
      return Err(EngineError.db(`Failed to start run: ${errorMessage(e)}`))
    }
  }

  finish(
    id: string,
    status: Exclude<PipelineRunStatus, 'running'>,
    metrics: PipelineRunMetrics,
    endedAt: string,
    error: string | null = null,
  ): Result<PipelineRun, EngineError> {
    try {
      const info = this.db
        .prepare(
          `UPDATE pipeline_runs
           SET ended_at = ?, status = ?, documents_matched = ?, links_written = ?, links_resolved = ?, highlights_found = ?, error = ?
           WHERE id = ?`,
        )
        .run(endedAt, status, metrics.documentsMatched, metrics.linksWritten, metrics.linksResolved, metrics.highlightsFound, error, id)
      if (info.changes === 0) return Err(EngineError.notFound('Pipeline run', id))
      return this.get(id)
    } catch (e) {
      return Err(EngineError.db(`Failed to finish run: ${errorMessage(e)}`))
    }
  }

  get(id: string): Result<PipelineRun, EngineError> {
    try {
      const row = this.db.prepare<[string], RunRow>(`SELECT ${RUN_COLUMNS} FROM pipeline_runs WHERE id = ?`).get(id)
      if (!row) return Err(EngineError.notFound('Pipeline run', id))
      return Ok(rowToRun(row))
    } catch (e) {
      return Err(EngineError.db(errorMessage(e)))
    }
  }

  /** Most recent runs first. */
  list(limit = 20): Result<PipelineRun[], EngineError> {
    try {
      const rows = this.db
        .prepare<[number], RunRow>(`SELECT ${RUN_COLUMNS} FROM pipeline_runs ORDER BY started_at DESC LIMIT ?`)
        .all(limit)
      return Ok(rows.map(rowToRun))
    } catch (e) {
      return Err(EngineError.db(errorMessage(e)))
    }
  }
}
