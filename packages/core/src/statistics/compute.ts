/**
 * Pure threshold statistics: mean and sample standard deviation of link
 * scores, grouped by (anchor, tier).
 */

import type { SourceTier } from '../documents/categories.js'

export interface ScoreSample {
  anchorId: string
  tier: SourceTier
  score: number
}

export interface ThresholdStatistic {
  anchorId: string
  tier: SourceTier
  mean: number
  /** Sample standard deviation (n − 1); 0 for a single sample. */
  stddev: number
  sampleCount: number
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN
  return values.reduce((sum, v) => sum + v, 0) / values.length
}

export function sampleStddev(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN
  if (values.length === 1) return 0
  const m = mean(values)
  const squared = values.reduce((sum, v) => sum + (v - m) * (v - m), 0)
  return Math.sqrt(squared / (values.length - 1))
}

function key(anchorId: string, tier: SourceTier): string {
  return `${anchorId}:${tier}`
}

/** One entry per (anchor, tier) present in `samples`, sorted by anchor then tier. */
export function computeThresholdStatistics(samples: readonly ScoreSample[]): ThresholdStatistic[] {
  const groups = new Map<string, { anchorId: string; tier: SourceTier; scores: number[] }>()
  for (const sample of samples) {
    if (!Number.isFinite(sample.score)) continue
    const k = key(sample.anchorId, sample.tier)
    const group = groups.get(k) ?? { anchorId: sample.anchorId, tier: sample.tier, scores: [] }
    group.scores.push(sample.score)
    groups.set(k, group)
  }

  return [...groups.values()]
    .map((g) => ({
      anchorId: g.anchorId,
      tier: g.tier,
      mean: mean(g.scores),
      stddev: sampleStddev(g.scores),
      sampleCount: g.scores.length,
    }))
    .sort((a, b) => (a.anchorId === b.anchorId ? a.tier - b.tier : a.anchorId < b.anchorId ? -1 : 1))
}

/**
 * Read-only view over one refresh. Entries below `minSamples` are kept for
 * inspection but `lookup` treats them as absent.
 */
export class StatisticsSnapshot {
  private readonly byKey: Map<string, ThresholdStatistic>

  constructor(
    readonly entries: readonly ThresholdStatistic[],
    readonly computedAt: string | null,
    readonly minSamples: number,
  ) {
    this.byKey = new Map(entries.map((e) => [key(e.anchorId, e.tier), e]))
  }

  static empty(minSamples: number): StatisticsSnapshot {
    return new StatisticsSnapshot([], null, minSamples)
  }

  /** The statistic when it rests on at least `minSamples` scores, else null. */
  lookup(anchorId: string, tier: SourceTier): ThresholdStatistic | null {
    const entry = this.byKey.get(key(anchorId, tier))
    if (!entry || entry.sampleCount < this.minSamples) return null
    return entry
  }

  /** Raw entry regardless of sample count. */
  get(anchorId: string, tier: SourceTier): ThresholdStatistic | null {
    return this.byKey.get(key(anchorId, tier)) ?? null
  }

  ageMs(now: Date): number {
    if (!this.computedAt) return Number.POSITIVE_INFINITY
    return now.getTime() - Date.parse(this.computedAt)
  }
}
