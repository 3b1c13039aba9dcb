/**
 * Documents: ingested items, source taxonomy and tier assignment.
 */

export {
  SOURCE_CATEGORIES,
  SOURCE_TIERS,
  SourceCategorySchema,
  TIER_POLICY,
  tierForCategory,
  categoriesForTier,
  isSourceTier,
} from './categories.js'
export type { SourceCategory, SourceTier, TierPolicy } from './categories.js'
export { DocumentSchema, CreateDocumentInputSchema } from './schemas.js'
export type { Document, CreateDocumentInput } from './schemas.js'
export { DocumentRepository } from './repository.js'
