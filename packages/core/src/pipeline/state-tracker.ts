/**
 * Pipeline state tracker: frontier queries and monotonic stage advances.
 *
 * Work queues are nothing more than null-marker predicates over `documents`,
 * so re-running against an unfinished frontier re-selects the same work.
 * Frontiers page by id (keyset) so documents that keep failing inside one run
 * do not starve the ones behind them.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, EngineError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { DOCUMENT_COLUMNS, rowToDocument } from '../documents/repository.js'
import type { DocumentRow } from '../documents/repository.js'
import type { Document } from '../documents/schemas.js'
import { STAGE_COLUMN, PREREQUISITE_COLUMN } from './stages.js'
import type { PipelineStage } from './stages.js'

export interface FrontierQuery {
  limit: number
  /** Only ids strictly greater than this are returned. */
  afterId?: string
}

export interface DocumentState {
  documentId: string
  ingestedAt: string
  indexedAt: string | null
  matchedAt: string | null
  enrichedAt: string | null
  /** Furthest stage reached, or 'ingest' when none has run yet. */
  reached: PipelineStage | 'ingest'
}

const FRONTIER_PREDICATE: Record<PipelineStage, string> = {
  index: 'd.indexed_at IS NULL',
  match: 'd.indexed_at IS NOT NULL AND d.matched_at IS NULL',
  // Link-based: a document already enriched comes back whenever one of its
  // links to an active anchor is unresolved (e.g. an anchor added later).
  enrich: `d.matched_at IS NOT NULL AND (
    d.enriched_at IS NULL
    OR EXISTS (
      SELECT 1 FROM document_anchor_links l
      JOIN anchors a ON a.id = l.anchor_id
      WHERE l.document_id = d.id AND l.anchor_highlight IS NULL AND a.is_active = 1
    )
  )`,
}

function placeholders(count: number): string {
  return new Array(count).fill('?').join(', ')
}

export class PipelineStateTracker {
  constructor(private db: Database.Database) {}

  /** Documents awaiting `stage`, ordered by id. */
  frontierFor(stage: PipelineStage, query: FrontierQuery): Result<Document[], EngineError> {
    if (!Number.isInteger(query.limit) || query.limit <= 0) {
      return Err(EngineError.validation(`Frontier limit must be a positive integer, got ${query.limit}`))
    }
    try {
      const rows = this.db
        .prepare<[string, number], DocumentRow>(`
          SELECT ${DOCUMENT_COLUMNS.split(', ').map((c) => `d.${c}`).join(', ')}
          FROM documents d
          WHERE ${FRONTIER_PREDICATE[stage]} AND d.id > ?
          ORDER BY d.id
          LIMIT ?
        `)
        .all(query.afterId ?? '', query.limit)
      return Ok(rows.map(rowToDocument))
    } catch (e) {
      return Err(e instanceof EngineError ? e : EngineError.db(errorMessage(e)))
    }
  }

  frontierSize(stage: PipelineStage): Result<number, EngineError> {
    try {
      const row = this.db
        .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM documents d WHERE ${FRONTIER_PREDICATE[stage]}`)
        .get()
      return Ok(row?.count ?? 0)
    } catch (e) {
      return Err(EngineError.db(errorMessage(e)))
    }
  }

  /**
   * Stamps `stage` on documents whose marker is still null and whose previous
   * stage is set. Already-advanced documents are left alone, so repeating a
   * call is a no-op. Returns how many markers were set.
   *
   * `enrich` is the exception: `enriched_at` records the most recent
   * classifier batch touching the document, so it also moves forward on an
   * already-enriched document. It never moves backwards.
   */
  advance(documentIds: readonly string[], stage: PipelineStage, timestamp: string): Result<number, EngineError> {
    if (documentIds.length === 0) return Ok(0)
    if (Number.isNaN(Date.parse(timestamp))) {
      return Err(EngineError.validation(`Invalid timestamp: ${timestamp}`))
    }

    const column = STAGE_COLUMN[stage]
    const prerequisite = PREREQUISITE_COLUMN[stage]
    const ids = placeholders(documentIds.length)

    try {
      const unset = stage === 'enrich' ? `(${column} IS NULL OR ${column} < ?)` : `${column} IS NULL`
      const params = stage === 'enrich' ? [timestamp, ...documentIds, timestamp] : [timestamp, ...documentIds]
      const info = this.db
        .prepare(`UPDATE documents SET ${column} = ? WHERE id IN (${ids}) AND ${unset} AND ${prerequisite} IS NOT NULL`)
        .run(...params)
      return Ok(info.changes)
    } catch (e) {
      return Err(EngineError.db(errorMessage(e)))
    }
  }

  getState(documentId: string): Result<DocumentState, EngineError> {
    try {
      const row = this.db
        .prepare<[string], DocumentRow>(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = ?`)
        .get(documentId)
      if (!row) return Err(EngineError.notFound('Document', documentId))

      let reached: DocumentState['reached'] = 'ingest'
      if (row.enriched_at) reached = 'enrich'
      else if (row.matched_at) reached = 'match'
      else if (row.indexed_at) reached = 'index'

      return Ok({
        documentId: row.id,
        ingestedAt: row.ingested_at,
        indexedAt: row.indexed_at,
        matchedAt: row.matched_at,
        enrichedAt: row.enriched_at,
        reached,
      })
    } catch (e) {
      return Err(EngineError.db(errorMessage(e)))
    }
  }
}
