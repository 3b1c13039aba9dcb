/**
 * Administrative reset: clears pipeline markers (and links, when the match
 * stage goes) so the affected documents re-enter their frontier.
 *
 * Clearing a stage clears every later stage too, which keeps
 * enriched ⇒ matched ⇒ indexed intact.
 */

import type Database from 'better-sqlite3'
import { z } from 'zod'
import { Ok, Err, EngineError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { PipelineStageSchema, STAGE_COLUMN, stagesFrom } from '../pipeline/stages.js'
import type { PipelineStage } from '../pipeline/stages.js'

export const ResetScopeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('documents'), documentIds: z.array(z.string().min(1)).min(1) }),
  z.object({ kind: z.literal('anchor'), anchorId: z.string().min(1) }),
  z.object({ kind: z.literal('all') }),
])

export type ResetScope = z.infer<typeof ResetScopeSchema>

export const ResetRequestSchema = z.object({
  stage: PipelineStageSchema,
  scope: ResetScopeSchema,
})

export type ResetRequest = z.infer<typeof ResetRequestSchema>

export interface ResetResult {
  documentsReset: number
  linksDeleted: number
  linksReopened: number
}

function placeholders(count: number): string {
  return new Array(count).fill('?').join(', ')
}

/** Column assignments clearing `stage`, everything downstream, and the aggregate. */
function clearAssignments(stage: PipelineStage): string {
  const columns = stagesFrom(stage).map((s) => `${STAGE_COLUMN[s]} = NULL`)
  columns.push('org_highlight = NULL')
  return columns.join(', ')
}

export class PipelineAdmin {
  constructor(private db: Database.Database) {}

  reset(request: ResetRequest): Result<ResetResult, EngineError> {
    const parsed = ResetRequestSchema.safeParse(request)
    if (!parsed.success) {
      return Err(EngineError.validation(parsed.error.message))
    }
    const { stage, scope } = parsed.data

    if (scope.kind === 'anchor') {
      const anchor = this.db.prepare<[string], { id: string }>('SELECT id FROM anchors WHERE id = ?').get(scope.anchorId)
      if (!anchor) return Err(EngineError.notFound('Anchor', scope.anchorId))
    }

    try {
      const result = this.db.transaction((): ResetResult => {
        if (scope.kind === 'anchor' && stage === 'enrich') {
          return { documentsReset: 0, linksDeleted: 0, linksReopened: this.reopenAnchorLinks(scope.anchorId) }
        }

        const target = this.targetDocuments(scope)
        const clearsLinks = stage !== 'enrich'
        let linksDeleted = 0
        let linksReopened = 0

        if (clearsLinks && scope.kind === 'anchor') {
          linksDeleted = this.db.prepare('DELETE FROM document_anchor_links WHERE anchor_id = ?').run(scope.anchorId).changes
        } else if (clearsLinks) {
          linksDeleted = this.db
            .prepare(`DELETE FROM document_anchor_links WHERE document_id IN (${target.sql})`)
            .run(...target.params).changes
        } else {
          linksReopened = this.db
            .prepare(
              `UPDATE document_anchor_links
               SET anchor_highlight = NULL, org_highlight = NULL, threshold = NULL, resolved_at = NULL
               WHERE document_id IN (${target.sql})`,
            )
            .run(...target.params).changes
        }

        const documentsReset = this.db
          .prepare(
            `UPDATE documents SET ${clearAssignments(stage)}
             WHERE id IN (${target.sql}) AND ${STAGE_COLUMN[stage]} IS NOT NULL`,
          )
          .run(...target.params).changes

        return { documentsReset, linksDeleted, linksReopened }
      })()

      console.log(
        `[admin] reset ${stage} (${scope.kind}): ${result.documentsReset} document(s), ` +
          `${result.linksDeleted} link(s) deleted, ${result.linksReopened} reopened`,
      )
      return Ok(result)
    } catch (e) {
      return Err(EngineError.db(`Reset failed: ${errorMessage(e)}`))
    }
  }

  /** Nulls one anchor's link flags; the link frontier picks them up again. */
  private reopenAnchorLinks(anchorId: string): number {
    return this.db
      .prepare(
        `UPDATE document_anchor_links
         SET anchor_highlight = NULL, org_highlight = NULL, threshold = NULL, resolved_at = NULL
         WHERE anchor_id = ? AND anchor_highlight IS NOT NULL`,
      )
      .run(anchorId).changes
  }

  /**
   * Subquery selecting the scope's documents. An anchor scope covers every
   * matched document: any of them may score differently against the anchor
   * now, including ones the anchor never linked to.
   */
  private targetDocuments(scope: ResetScope): { sql: string; params: string[] } {
    switch (scope.kind) {
      case 'documents':
        return { sql: placeholders(scope.documentIds.length), params: scope.documentIds }
      case 'anchor':
        return { sql: 'SELECT id FROM documents WHERE matched_at IS NOT NULL', params: [] }
      case 'all':
        return { sql: 'SELECT id FROM documents', params: [] }
    }
  }
}
