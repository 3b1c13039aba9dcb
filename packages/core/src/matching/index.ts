/**
 * Matching: chunk aggregation, category pre-filter and the similarity matcher.
 */

export { aggregateChunkScores, scoreAgainstAnchor, passesPreFilter, scoreDocument } from './scoring.js'
export type { ScoredCandidate, DocumentScore } from './scoring.js'
export { runMatcher } from './matcher.js'
export type { MatcherDeps, MatchOptions, MatchRunSummary } from './matcher.js'
