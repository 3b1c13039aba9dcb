/**
 * Highlights: read-only surface for delivery and export.
 */

export { HighlightRepository, HighlightWindowSchema } from './repository.js'
export type { HighlightWindow, ResolvedLinkView, HighlightSummary } from './repository.js'
