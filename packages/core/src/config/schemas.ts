/**
 * Engine configuration schema. Every field has a default, so `{}` is a
 * complete configuration.
 */

import { z } from 'zod'
import { SourceCategorySchema } from '../documents/categories.js'

export const ChunkAggregationPolicySchema = z.enum(['max', 'mean', 'top_k_mean'])
export type ChunkAggregationPolicy = z.infer<typeof ChunkAggregationPolicySchema>

export const ChunkAggregationConfigSchema = z.object({
  policy: ChunkAggregationPolicySchema.default('top_k_mean'),
  /** Only read by `top_k_mean`. */
  k: z.number().int().positive().default(5),
})

export type ChunkAggregationConfig = z.infer<typeof ChunkAggregationConfigSchema>

const ScoreSchema = z.number().min(0).max(1)

export const PreFilterConfigSchema = z.object({
  minScore: ScoreSchema.default(0.25),
  noisyCategories: z.array(SourceCategorySchema).default(['News & Media', 'Misc. Research']),
})

export type PreFilterConfig = z.infer<typeof PreFilterConfigSchema>

export const ThresholdConfigSchema = z.object({
  /** Tier 1 cut-off. */
  fixed: ScoreSchema.default(0.2),
})

export type ThresholdConfig = z.infer<typeof ThresholdConfigSchema>

export const StatisticsConfigSchema = z.object({
  windowDays: z.number().int().positive().default(30),
  minSamples: z.number().int().positive().default(5),
  refreshIntervalMinutes: z.number().positive().default(60),
  fallback: z
    .object({
      dynamic: ScoreSchema.default(0.3),
      strict: ScoreSchema.default(0.4),
    })
    .default({}),
})

export type StatisticsConfig = z.infer<typeof StatisticsConfigSchema>

export const EngineConfigSchema = z.object({
  batchSize: z.number().int().positive().max(10_000).default(50),
  embeddingDimensions: z.number().int().positive().optional(),
  chunkAggregation: ChunkAggregationConfigSchema.default({}),
  preFilter: PreFilterConfigSchema.default({}),
  thresholds: ThresholdConfigSchema.default({}),
  statistics: StatisticsConfigSchema.default({}),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>
export type EngineConfigInput = z.input<typeof EngineConfigSchema>
