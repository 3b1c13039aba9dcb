/**
 * Links: scored document-anchor associations and their highlight flags.
 */

export { LinkSchema, LinkCandidateSchema, SimilarityScoreSchema } from './schemas.js'
export type { Link, LinkCandidate, PendingLink, LinkResolution } from './schemas.js'
export { LinkRepository } from './repository.js'
