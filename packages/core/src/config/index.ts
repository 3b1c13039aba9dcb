/**
 * Engine configuration: schema, defaults, environment overrides.
 */

export {
  EngineConfigSchema,
  ChunkAggregationPolicySchema,
  ChunkAggregationConfigSchema,
  PreFilterConfigSchema,
  ThresholdConfigSchema,
  StatisticsConfigSchema,
} from './schemas.js'
export type {
  EngineConfig,
  EngineConfigInput,
  ChunkAggregationPolicy,
  ChunkAggregationConfig,
  PreFilterConfig,
  ThresholdConfig,
  StatisticsConfig,
} from './schemas.js'
export { loadEngineConfig, defaultEngineConfig, readEnvOverrides, loadEngineConfigFromEnv } from './load.js'
export type { EnvOverrides } from './load.js'
