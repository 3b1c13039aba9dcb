/**
 * Configuration loading: schema validation plus `ANCHORSCOPE_*` environment overrides.
 */

import { Ok, Err, EngineError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { EngineConfigSchema } from './schemas.js'
import type { EngineConfig, EngineConfigInput } from './schemas.js'

export function loadEngineConfig(raw: unknown = {}): Result<EngineConfig, EngineError> {
  const parsed = EngineConfigSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    return Err(EngineError.config(`Invalid engine configuration: ${issues}`))
  }
  return Ok(parsed.data)
}

/** Default configuration; cannot fail. */
export function defaultEngineConfig(): EngineConfig {
  return EngineConfigSchema.parse({})
}

function numberVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  return Number.isFinite(value) ? value : Number.NaN
}

/** Raw, unvalidated values read from the environment. */
export interface EnvOverrides {
  batchSize?: number
  embeddingDimensions?: number
  preFilter?: { minScore: number }
  thresholds?: { fixed: number }
  statistics?: { windowDays?: number; minSamples?: number }
  chunkAggregation?: { policy: string }
}

/**
 * Maps environment variables onto a partial config. Unparseable numbers come
 * through as NaN and fail schema validation.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): EnvOverrides {
  const overrides: EnvOverrides = {}

  const batchSize = numberVar(env, 'ANCHORSCOPE_BATCH_SIZE')
  if (batchSize !== undefined) overrides.batchSize = batchSize

  const dims = numberVar(env, 'ANCHORSCOPE_EMBEDDING_DIMENSIONS')
  if (dims !== undefined) overrides.embeddingDimensions = dims

  const minScore = numberVar(env, 'ANCHORSCOPE_PREFILTER_MIN_SCORE')
  if (minScore !== undefined) overrides.preFilter = { minScore }

  const fixed = numberVar(env, 'ANCHORSCOPE_FIXED_THRESHOLD')
  if (fixed !== undefined) overrides.thresholds = { fixed }

  const windowDays = numberVar(env, 'ANCHORSCOPE_STATS_WINDOW_DAYS')
  const minSamples = numberVar(env, 'ANCHORSCOPE_STATS_MIN_SAMPLES')
  if (windowDays !== undefined || minSamples !== undefined) {
    overrides.statistics = {
      ...(windowDays !== undefined ? { windowDays } : {}),
      ...(minSamples !== undefined ? { minSamples } : {}),
    }
  }

  const policy = env['ANCHORSCOPE_CHUNK_POLICY']
  if (policy) overrides.chunkAggregation = { policy }

  return overrides
}

/** Validates `base` merged with the environment overrides. */
export function loadEngineConfigFromEnv(
  env: NodeJS.ProcessEnv,
  base: EngineConfigInput = {},
): Result<EngineConfig, EngineError> {
  const overrides = readEnvOverrides(env)
  return loadEngineConfig({
    ...base,
    ...overrides,
    preFilter: { ...base.preFilter, ...overrides.preFilter },
    thresholds: { ...base.thresholds, ...overrides.thresholds },
    statistics: { ...base.statistics, ...overrides.statistics },
    chunkAggregation: { ...base.chunkAggregation, ...overrides.chunkAggregation },
  })
}
