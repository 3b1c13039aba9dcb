/**
 * @anchorscope/core
 *
 * Semantic anchor matching and tiered enrichment over a SQLite store.
 */

export * from './common/index.js'
export * from './config/index.js'
export * from './storage/index.js'
export * from './vectors/index.js'
export * from './documents/index.js'
export * from './anchors/index.js'
export * from './links/index.js'
export * from './pipeline/index.js'
export * from './matching/index.js'
export * from './statistics/index.js'
export * from './enrichment/index.js'
export * from './highlights/index.js'
export * from './admin/index.js'
export { Engine, createEngine } from './engine.js'
export type { EngineOptions, RunLimits } from './engine.js'
