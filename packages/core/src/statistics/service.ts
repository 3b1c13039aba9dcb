/**
 * Threshold statistics service: rolling per-(anchor, tier) statistics over
 * the trailing window of link scores, persisted as a snapshot that the
 * classifier reads. Refreshed on its own cadence, not per document.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, EngineError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { SourceCategorySchema, tierForCategory, isSourceTier } from '../documents/categories.js'
import type { StatisticsConfig } from '../config/schemas.js'
import { computeThresholdStatistics, StatisticsSnapshot } from './compute.js'
import type { ScoreSample, ThresholdStatistic } from './compute.js'

const MS_PER_DAY = 86_400_000

interface SampleRow {
  anchor_id: string
  category: string
  similarity_score: number
}

interface StatisticRow {
  anchor_id: string
  tier: number
  mean: number
  stddev: number
  sample_count: number
}

export interface RefreshOutcome {
  snapshot: StatisticsSnapshot
  refreshed: boolean
}

export class ThresholdStatisticsService {
  constructor(
    private db: Database.Database,
    private config: StatisticsConfig,
  ) {}

  /** Recompute from links created inside the window ending at `now`. */
  refresh(now: Date = new Date()): Result<StatisticsSnapshot, EngineError> {
    const windowEnd = now.toISOString()
    const windowStart = new Date(now.getTime() - this.config.windowDays * MS_PER_DAY).toISOString()

    try {
      const rows = this.db
        .prepare<[string, string], SampleRow>(`
          SELECT l.anchor_id, d.category, l.similarity_score
          FROM document_anchor_links l
          JOIN documents d ON d.id = l.document_id
          JOIN anchors a ON a.id = l.anchor_id
          WHERE a.is_active = 1 AND l.created_at >= ? AND l.created_at <= ?
        `)
        .all(windowStart, windowEnd)

      const samples: ScoreSample[] = []
      for (const row of rows) {
        const category = SourceCategorySchema.safeParse(row.category)
        if (!category.success) {
          console.warn(`[statistics] ignoring score with unknown category: ${row.category}`)
          continue
        }
        samples.push({ anchorId: row.anchor_id, tier: tierForCategory(category.data), score: row.similarity_score })
      }

      const entries = computeThresholdStatistics(samples)

      this.db.transaction(() => {
        this.db.prepare('DELETE FROM threshold_statistics').run()
        const insert = this.db.prepare(
          'INSERT INTO threshold_statistics (anchor_id, tier, mean, stddev, sample_count, computed_at) VALUES (?, ?, ?, ?, ?, ?)',
        )
        for (const e of entries) {
          insert.run(e.anchorId, e.tier, e.mean, e.stddev, e.sampleCount, windowEnd)
        }
        this.db
          .prepare('INSERT INTO statistics_refreshes (id, computed_at, window_start, window_end, sample_count) VALUES (?, ?, ?, ?, ?)')
          .run(uuidv4(), windowEnd, windowStart, windowEnd, samples.length)
      })()

      const sparse = entries.filter((e) => e.sampleCount < this.config.minSamples).length
      console.log(
        `[statistics] refreshed ${entries.length} anchor/tier statistic(s) from ${samples.length} score(s)` +
          (sparse > 0 ? `, ${sparse} below ${this.config.minSamples} samples` : ''),
      )

      return Ok(new StatisticsSnapshot(entries, windowEnd, this.config.minSamples))
    } catch (e) {
      return Err(EngineError.db(`Statistics refresh failed: ${errorMessage(e)}`))
    }
  }

  /** Last persisted snapshot; empty when no refresh has run yet. */
  snapshot(): Result<StatisticsSnapshot, EngineError> {
    try {
      const latest = this.db
        .prepare<[], { computed_at: string }>('SELECT computed_at FROM statistics_refreshes ORDER BY computed_at DESC LIMIT 1')
        .get()
      if (!latest) return Ok(StatisticsSnapshot.empty(this.config.minSamples))

      const rows = this.db
        .prepare<[], StatisticRow>('SELECT anchor_id, tier, mean, stddev, sample_count FROM threshold_statistics ORDER BY anchor_id, tier')
        .all()

      const entries: ThresholdStatistic[] = []
      for (const row of rows) {
        if (!isSourceTier(row.tier)) continue
        entries.push({
          anchorId: row.anchor_id,
          tier: row.tier,
          mean: row.mean,
          stddev: row.stddev,
          sampleCount: row.sample_count,
        })
      }
      return Ok(new StatisticsSnapshot(entries, latest.computed_at, this.config.minSamples))
    } catch (e) {
      return Err(EngineError.db(`Failed to read statistics: ${errorMessage(e)}`))
    }
  }

  /** Refresh only when the last snapshot is older than the configured interval. */
  refreshIfStale(now: Date = new Date()): Result<RefreshOutcome, EngineError> {
    const current = this.snapshot()
    if (!current.ok) return current

    const maxAgeMs = this.config.refreshIntervalMinutes * 60_000
    if (current.value.ageMs(now) < maxAgeMs) {
      return Ok({ snapshot: current.value, refreshed: false })
    }

    const refreshed = this.refresh(now)
    if (!refreshed.ok) return refreshed
    return Ok({ snapshot: refreshed.value, refreshed: true })
  }
}
