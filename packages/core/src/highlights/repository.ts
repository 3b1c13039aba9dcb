/**
 * Delivery query surface: resolved links joined to document and anchor
 * identity. Digest rendering and export read through here and nothing else.
 */

import type Database from 'better-sqlite3'
import { z } from 'zod'
import { Ok, Err, EngineError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { SourceCategorySchema, tierForCategory } from '../documents/categories.js'
import type { SourceCategory, SourceTier } from '../documents/categories.js'

export const HighlightWindowSchema = z
  .object({
    since: z.string().datetime(),
    until: z.string().datetime(),
    highlightedOnly: z.boolean().default(false),
  })
  .refine((w) => w.since <= w.until, { message: 'since must not be after until' })

export type HighlightWindow = z.input<typeof HighlightWindowSchema>

export interface ResolvedLinkView {
  linkId: string
  similarityScore: number
  threshold: number | null
  anchorHighlight: boolean
  orgHighlight: boolean
  resolvedAt: string | null
  document: {
    id: string
    title: string
    url: string
    sourceName: string
    category: SourceCategory
    tier: SourceTier
    publishedAt: string | null
    ingestedAt: string
  }
  anchor: {
    id: string
    name: string
  }
}

export interface HighlightSummary {
  resolvedLinks: number
  anchorHighlights: number
  orgHighlightedDocuments: number
}

interface ViewRow {
  link_id: string
  similarity_score: number
  threshold: number | null
  anchor_highlight: number
  org_highlight: number | null
  resolved_at: string | null
  document_id: string
  title: string
  url: string
  source_name: string
  category: string
  published_at: string | null
  ingested_at: string
  anchor_id: string
  anchor_name: string
}

export class HighlightRepository {
  constructor(private db: Database.Database) {}

  /**
   * Resolved links for documents ingested inside [since, until], highest
   * score first. `highlightedOnly` keeps links that are an anchor highlight
   * or belong to an org-highlighted document.
   */
  listResolved(window: HighlightWindow): Result<ResolvedLinkView[], EngineError> {
    const parsed = HighlightWindowSchema.safeParse(window)
    if (!parsed.success) {
      return Err(EngineError.validation(parsed.error.message))
    }
    const { since, until, highlightedOnly } = parsed.data

    try {
      const rows = this.db
        .prepare<[string, string], ViewRow>(`
          SELECT
            l.id as link_id, l.similarity_score, l.threshold, l.anchor_highlight, l.org_highlight, l.resolved_at,
            d.id as document_id, d.title, d.url, d.source_name, d.category, d.published_at, d.ingested_at,
            a.id as anchor_id, a.name as anchor_name
          FROM document_anchor_links l
          JOIN documents d ON d.id = l.document_id
          JOIN anchors a ON a.id = l.anchor_id
          WHERE l.anchor_highlight IS NOT NULL
            AND d.ingested_at >= ? AND d.ingested_at <= ?
            ${highlightedOnly ? 'AND (l.anchor_highlight = 1 OR l.org_highlight = 1)' : ''}
          ORDER BY l.similarity_score DESC, l.id
        `)
        .all(since, until)

      const views: ResolvedLinkView[] = []
      for (const row of rows) {
        const category = SourceCategorySchema.safeParse(row.category)
        if (!category.success) {
          console.warn(`[highlights] skipping document ${row.document_id} with unknown category: ${row.category}`)
          continue
        }
        views.push({
          linkId: row.link_id,
          similarityScore: row.similarity_score,
          threshold: row.threshold,
          anchorHighlight: row.anchor_highlight === 1,
          orgHighlight: row.org_highlight === 1,
          resolvedAt: row.resolved_at,
          document: {
            id: row.document_id,
            title: row.title,
            url: row.url,
            sourceName: row.source_name,
            category: category.data,
            tier: tierForCategory(category.data),
            publishedAt: row.published_at,
            ingestedAt: row.ingested_at,
          },
          anchor: { id: row.anchor_id, name: row.anchor_name },
        })
      }
      return Ok(views)
    } catch (e) {
      return Err(EngineError.db(errorMessage(e)))
    }
  }

  summarize(window: HighlightWindow): Result<HighlightSummary, EngineError> {
    const views = this.listResolved({ ...window, highlightedOnly: false })
    if (!views.ok) return views

    const orgDocs = new Set<string>()
    let anchorHighlights = 0
    for (const view of views.value) {
      if (view.anchorHighlight) anchorHighlights++
      if (view.orgHighlight) orgDocs.add(view.document.id)
    }
    return Ok({
      resolvedLinks: views.value.length,
      anchorHighlights,
      orgHighlightedDocuments: orgDocs.size,
    })
  }
}
