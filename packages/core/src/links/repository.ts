/**
 * Link repository. Links are written only by the matcher (upsert on
 * (document_id, anchor_id)) and resolved only by the classifier.
 * Every flag change recomputes the owning document's org highlight.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, EngineError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { SourceCategorySchema } from '../documents/categories.js'
import { toNullableBoolean } from '../documents/repository.js'
import { LinkCandidateSchema } from './schemas.js'
import type { Link, LinkCandidate, PendingLink, LinkResolution } from './schemas.js'

interface LinkRow {
  id: string
  document_id: string
  anchor_id: string
  similarity_score: number
  created_at: string
  anchor_highlight: number | null
  org_highlight: number | null
  threshold: number | null
  resolved_at: string | null
}

interface PendingRow {
  id: string
  document_id: string
  anchor_id: string
  similarity_score: number
  category: string
}

const LINK_COLUMNS =
  'id, document_id, anchor_id, similarity_score, created_at, anchor_highlight, org_highlight, threshold, resolved_at'

function rowToLink(row: LinkRow): Link {
  return {
    id: row.id,
    documentId: row.document_id,
    anchorId: row.anchor_id,
    similarityScore: row.similarity_score,
    createdAt: row.created_at,
    anchorHighlight: toNullableBoolean(row.anchor_highlight),
    orgHighlight: toNullableBoolean(row.org_highlight),
    threshold: row.threshold,
    resolvedAt: row.resolved_at,
  }
}

function wrap(e: unknown): EngineError {
  return e instanceof EngineError ? e : EngineError.db(errorMessage(e))
}

function placeholders(count: number): string {
  return new Array(count).fill('?').join(', ')
}

export class LinkRepository {
  constructor(private db: Database.Database) {}

  /**
   * Insert-or-update on the (document, anchor) key. A re-scored link keeps its
   * id and created_at but loses its flags, which puts it back on the
   * classifier's frontier.
   */
  upsertMany(candidates: readonly LinkCandidate[], now: string): Result<number, EngineError> {
    for (const candidate of candidates) {
      const parsed = LinkCandidateSchema.safeParse(candidate)
      if (!parsed.success) {
        return Err(EngineError.validation(`Invalid link ${candidate.documentId}/${candidate.anchorId}: ${parsed.error.message}`))
      }
    }

    try {
      let written = 0
      this.db.transaction(() => {
        const stmt = this.db.prepare(`
          INSERT INTO document_anchor_links (id, document_id, anchor_id, similarity_score, created_at)
          VALUES (?, ?, ?, ?, ?)
          ON CONFLICT(document_id, anchor_id) DO UPDATE SET
            similarity_score = excluded.similarity_score,
            anchor_highlight = NULL,
            org_highlight = NULL,
            threshold = NULL,
            resolved_at = NULL
        `)
        for (const c of candidates) {
          written += stmt.run(uuidv4(), c.documentId, c.anchorId, c.similarityScore, now).changes
        }
      })()
      return Ok(written)
    } catch (e) {
      return Err(wrap(e))
    }
  }

  getByDocument(documentId: string): Result<Link[], EngineError> {
    try {
      const rows = this.db
        .prepare<[string], LinkRow>(`SELECT ${LINK_COLUMNS} FROM document_anchor_links WHERE document_id = ? ORDER BY anchor_id`)
        .all(documentId)
      return Ok(rows.map(rowToLink))
    } catch (e) {
      return Err(wrap(e))
    }
  }

  get(documentId: string, anchorId: string): Result<Link, EngineError> {
    try {
      const row = this.db
        .prepare<[string, string], LinkRow>(
          `SELECT ${LINK_COLUMNS} FROM document_anchor_links WHERE document_id = ? AND anchor_id = ?`,
        )
        .get(documentId, anchorId)
      if (!row) return Err(EngineError.notFound('Link', `${documentId}/${anchorId}`))
      return Ok(rowToLink(row))
    } catch (e) {
      return Err(wrap(e))
    }
  }

  count(): Result<number, EngineError> {
    try {
      const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM document_anchor_links').get()
      return Ok(row?.count ?? 0)
    } catch (e) {
      return Err(wrap(e))
    }
  }

  /** Unresolved links of active anchors for the given documents. */
  pendingForDocuments(documentIds: readonly string[]): Result<PendingLink[], EngineError> {
    if (documentIds.length === 0) return Ok([])
    try {
      const rows = this.db
        .prepare<string[], PendingRow>(`
          SELECT l.id, l.document_id, l.anchor_id, l.similarity_score, d.category
          FROM document_anchor_links l
          JOIN documents d ON d.id = l.document_id
          JOIN anchors a ON a.id = l.anchor_id
          WHERE l.document_id IN (${placeholders(documentIds.length)})
            AND l.anchor_highlight IS NULL
            AND a.is_active = 1
          ORDER BY l.document_id, l.anchor_id
        `)
        .all(...documentIds)

      const pending: PendingLink[] = []
      for (const row of rows) {
        const category = SourceCategorySchema.safeParse(row.category)
        if (!category.success) {
          return Err(EngineError.validation(`Document ${row.document_id} has unknown category: ${row.category}`))
        }
        pending.push({
          linkId: row.id,
          documentId: row.document_id,
          anchorId: row.anchor_id,
          similarityScore: row.similarity_score,
          category: category.data,
        })
      }
      return Ok(pending)
    } catch (e) {
      return Err(wrap(e))
    }
  }

  /**
   * Writes classifier decisions, then recomputes the org highlight of every
   * document touched. Returns the number of links updated.
   */
  resolve(resolutions: readonly LinkResolution[], now: string): Result<number, EngineError> {
    if (resolutions.length === 0) return Ok(0)
    try {
      let updated = 0
      this.db.transaction(() => {
        const stmt = this.db.prepare(
          'UPDATE document_anchor_links SET anchor_highlight = ?, threshold = ?, resolved_at = ? WHERE id = ?',
        )
        for (const r of resolutions) {
          updated += stmt.run(r.anchorHighlight ? 1 : 0, r.threshold, now, r.linkId).changes
        }
        const documentIds = this.documentIdsOf(resolutions.map((r) => r.linkId))
        for (const documentId of documentIds) {
          this.applyOrgHighlight(documentId)
        }
      })()
      return Ok(updated)
    } catch (e) {
      return Err(wrap(e))
    }
  }

  /** Flips one link's flag and recomputes its document's aggregate. */
  setAnchorHighlight(linkId: string, anchorHighlight: boolean): Result<Link, EngineError> {
    try {
      const row = this.db.transaction(() => {
        const info = this.db
          .prepare('UPDATE document_anchor_links SET anchor_highlight = ?, resolved_at = COALESCE(resolved_at, ?) WHERE id = ?')
          .run(anchorHighlight ? 1 : 0, new Date().toISOString(), linkId)
        if (info.changes === 0) throw EngineError.notFound('Link', linkId)
        const [documentId] = this.documentIdsOf([linkId])
        this.applyOrgHighlight(documentId)
        return this.db
          .prepare<[string], LinkRow>(`SELECT ${LINK_COLUMNS} FROM document_anchor_links WHERE id = ?`)
          .get(linkId)
      })()
      if (!row) return Err(EngineError.notFound('Link', linkId))
      return Ok(rowToLink(row))
    } catch (e) {
      return Err(wrap(e))
    }
  }

  /**
   * Recomputes `org_highlight` for a document: true iff at least one of its
   * resolved links to an active anchor is an anchor highlight.
   */
  recomputeOrgHighlight(documentId: string): Result<boolean, EngineError> {
    try {
      return Ok(this.db.transaction(() => this.applyOrgHighlight(documentId))())
    } catch (e) {
      return Err(wrap(e))
    }
  }

  private applyOrgHighlight(documentId: string): boolean {
    const row = this.db
      .prepare<[string], { highlighted: number }>(`
        SELECT EXISTS (
          SELECT 1 FROM document_anchor_links l
          JOIN anchors a ON a.id = l.anchor_id
          WHERE l.document_id = ? AND l.anchor_highlight = 1 AND a.is_active = 1
        ) as highlighted
      `)
      .get(documentId)
    const highlighted = row?.highlighted === 1
    const flag = highlighted ? 1 : 0

    this.db.prepare('UPDATE documents SET org_highlight = ? WHERE id = ?').run(flag, documentId)
    this.db
      .prepare('UPDATE document_anchor_links SET org_highlight = ? WHERE document_id = ? AND anchor_highlight IS NOT NULL')
      .run(flag, documentId)
    return highlighted
  }

  private documentIdsOf(linkIds: readonly string[]): string[] {
    if (linkIds.length === 0) return []
    return this.db
      .prepare<string[], { document_id: string }>(
        `SELECT DISTINCT document_id FROM document_anchor_links WHERE id IN (${placeholders(linkIds.length)})`,
      )
      .all(...linkIds)
      .map((row) => row.document_id)
  }
}
