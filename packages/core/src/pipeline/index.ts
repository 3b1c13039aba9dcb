/**
 * Pipeline: stage markers, frontier queries, run log and orchestration.
 */

export { PipelineStageSchema, PIPELINE_STAGES, STAGE_COLUMN, stagesFrom } from './stages.js'
export type { PipelineStage } from './stages.js'
export { PipelineStateTracker } from './state-tracker.js'
export type { FrontierQuery, DocumentState } from './state-tracker.js'
export { PipelineRunRepository, PipelineRunStatusSchema, EMPTY_METRICS } from './run-repository.js'
export type { PipelineRun, PipelineRunStatus, PipelineRunMetrics } from './run-repository.js'
export { StatisticsRefresher } from './refresher.js'
export { runPipeline } from './runner.js'
export type { PipelineDeps, PipelineOptions, PipelineReport } from './runner.js'
