/**
 * Statistics: rolling per-anchor, per-tier score statistics.
 */

export { computeThresholdStatistics, mean, sampleStddev, StatisticsSnapshot } from './compute.js'
export type { ScoreSample, ThresholdStatistic } from './compute.js'
export { ThresholdStatisticsService } from './service.js'
export type { RefreshOutcome } from './service.js'
