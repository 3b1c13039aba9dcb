/**
 * Zod schemas and types for documents.
 */

import { z } from 'zod'
import { UUIDSchema, TimestampSchema, NonEmptyStringSchema } from '../common/index.js'
import { SourceCategorySchema } from './categories.js'

export const DocumentSchema = z.object({
  id: UUIDSchema,
  sourceName: z.string(),
  title: z.string(),
  url: z.string(),
  category: SourceCategorySchema,
  publishedAt: TimestampSchema.nullable(),
  ingestedAt: TimestampSchema,
  indexedAt: TimestampSchema.nullable(),
  matchedAt: TimestampSchema.nullable(),
  enrichedAt: TimestampSchema.nullable(),
  orgHighlight: z.boolean().nullable(),
})

export type Document = z.infer<typeof DocumentSchema>

export const CreateDocumentInputSchema = z.object({
  id: UUIDSchema.optional(),
  sourceName: NonEmptyStringSchema,
  title: z.string().default(''),
  url: z.string().default(''),
  category: SourceCategorySchema,
  publishedAt: TimestampSchema.nullable().default(null),
  ingestedAt: TimestampSchema.optional(),
})

export type CreateDocumentInput = z.input<typeof CreateDocumentInputSchema>
