/**
 * Document scoring: pure functions, no store access.
 *
 * A chunked document gets one cosine score per chunk against an anchor's
 * composite; the chunk aggregation policy reduces those to the single
 * document-anchor score that is stored on the link.
 */

import { cosineSimilarity, clampScore } from '../vectors/math.js'
import type { Vector } from '../vectors/math.js'
import type { ComposableAnchor } from '../anchors/compositor.js'
import type { SourceCategory } from '../documents/categories.js'
import type { ChunkAggregationConfig, PreFilterConfig } from '../config/schemas.js'

/**
 * - `max`: best chunk wins; a single on-topic section is enough.
 * - `mean`: average over all chunks; favours documents on-topic throughout.
 * - `top_k_mean`: average of the k best chunks (all chunks when fewer than k).
 */
export function aggregateChunkScores(scores: readonly number[], config: ChunkAggregationConfig): number {
  if (scores.length === 0) return 0

  switch (config.policy) {
    case 'max':
      return scores.reduce((best, s) => (s > best ? s : best), scores[0])
    case 'mean':
      return scores.reduce((sum, s) => sum + s, 0) / scores.length
    case 'top_k_mean': {
      const top = [...scores].sort((a, b) => b - a).slice(0, config.k)
      return top.reduce((sum, s) => sum + s, 0) / top.length
    }
    default: {
      const unreachable: never = config.policy
      throw new Error(`Unknown chunk aggregation policy: ${String(unreachable)}`)
    }
  }
}

/** Clamped document-anchor score for one composite. */
export function scoreAgainstAnchor(
  chunks: readonly Vector[],
  anchorVector: Vector,
  config: ChunkAggregationConfig,
): number {
  const perChunk = chunks.map((chunk) => clampScore(cosineSimilarity(chunk, anchorVector)))
  return clampScore(aggregateChunkScores(perChunk, config))
}

/**
 * Noisy (high-volume, low-precision) categories keep a candidate only when it
 * reaches the pre-filter minimum; every other category passes.
 */
export function passesPreFilter(category: SourceCategory, score: number, preFilter: PreFilterConfig): boolean {
  if (!preFilter.noisyCategories.includes(category)) return true
  return score >= preFilter.minScore
}

export interface ScoredCandidate {
  anchorId: string
  similarityScore: number
}

export interface DocumentScore {
  kept: ScoredCandidate[]
  /** Candidates dropped by the pre-filter. */
  filtered: ScoredCandidate[]
}

export function scoreDocument(
  category: SourceCategory,
  chunks: readonly Vector[],
  anchors: readonly ComposableAnchor[],
  options: { chunkAggregation: ChunkAggregationConfig; preFilter: PreFilterConfig },
): DocumentScore {
  const kept: ScoredCandidate[] = []
  const filtered: ScoredCandidate[] = []

  for (const anchor of anchors) {
    const similarityScore = scoreAgainstAnchor(chunks, anchor.vector, options.chunkAggregation)
    const candidate = { anchorId: anchor.anchorId, similarityScore }
    if (passesPreFilter(category, similarityScore, options.preFilter)) {
      kept.push(candidate)
    } else {
      filtered.push(candidate)
    }
  }

  return { kept, filtered }
}
