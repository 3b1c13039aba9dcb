/**
 * Tier threshold policy.
 *
 * Tier 1 → fixed constant
 * Tier 2 → historical mean for (anchor, tier)
 * Tier 3 → historical mean + one standard deviation for (anchor, tier)
 *
 * Tiers 2 and 3 fall back to configured constants when the snapshot has too
 * few samples for the pair.
 */

import type { SourceTier } from '../documents/categories.js'
import type { StatisticsConfig, ThresholdConfig } from '../config/schemas.js'
import type { StatisticsSnapshot } from '../statistics/compute.js'

export type ThresholdBasis = 'fixed' | 'mean' | 'mean_plus_stddev' | 'fallback'

export interface SelectedThreshold {
  threshold: number
  basis: ThresholdBasis
}

/** Absorbs rounding in mean + stddev so an exactly-equal score still counts. */
export const SCORE_EPSILON = 1e-9

export function selectThreshold(
  tier: SourceTier,
  anchorId: string,
  snapshot: StatisticsSnapshot,
  config: { thresholds: ThresholdConfig; statistics: StatisticsConfig },
): SelectedThreshold {
  switch (tier) {
    case 1:
      return { threshold: config.thresholds.fixed, basis: 'fixed' }
    case 2: {
      const stat = snapshot.lookup(anchorId, tier)
      if (!stat) return { threshold: config.statistics.fallback.dynamic, basis: 'fallback' }
      return { threshold: stat.mean, basis: 'mean' }
    }
    case 3: {
      const stat = snapshot.lookup(anchorId, tier)
      if (!stat) return { threshold: config.statistics.fallback.strict, basis: 'fallback' }
      return { threshold: stat.mean + stat.stddev, basis: 'mean_plus_stddev' }
    }
    default: {
      const unreachable: never = tier
      throw new Error(`Unknown tier: ${String(unreachable)}`)
    }
  }
}

/** Inclusive: a score equal to the threshold is a highlight. */
export function isHighlight(score: number, threshold: number): boolean {
  return score >= threshold - SCORE_EPSILON
}
