/**
 * Zod schemas and types for document-anchor links.
 */

import { z } from 'zod'
import { UUIDSchema, TimestampSchema } from '../common/index.js'
import { SourceCategorySchema } from '../documents/categories.js'

export const SimilarityScoreSchema = z.number().min(0).max(1)

export const LinkSchema = z.object({
  id: UUIDSchema,
  documentId: UUIDSchema,
  anchorId: UUIDSchema,
  similarityScore: SimilarityScoreSchema,
  createdAt: TimestampSchema,
  anchorHighlight: z.boolean().nullable(),
  orgHighlight: z.boolean().nullable(),
  /** Threshold the classifier compared against; null until resolved. */
  threshold: z.number().nullable(),
  resolvedAt: TimestampSchema.nullable(),
})

export type Link = z.infer<typeof LinkSchema>

export const LinkCandidateSchema = z.object({
  documentId: z.string().min(1),
  anchorId: z.string().min(1),
  similarityScore: SimilarityScoreSchema,
})

export type LinkCandidate = z.infer<typeof LinkCandidateSchema>

/** An unresolved link together with what the classifier needs to judge it. */
export interface PendingLink {
  linkId: string
  documentId: string
  anchorId: string
  similarityScore: number
  category: z.infer<typeof SourceCategorySchema>
}

export interface LinkResolution {
  linkId: string
  anchorHighlight: boolean
  threshold: number
}
