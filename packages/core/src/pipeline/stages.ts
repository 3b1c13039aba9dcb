/**
 * Pipeline stages and the document columns that mark them.
 * ingested → indexed → matched → enriched; indexed and matched are set once, enriched only moves forward.
 */

import { z } from 'zod'

export const PipelineStageSchema = z.enum(['index', 'match', 'enrich'])
export type PipelineStage = z.infer<typeof PipelineStageSchema>

export const PIPELINE_STAGES: readonly PipelineStage[] = ['index', 'match', 'enrich']

type TimestampColumn = 'ingested_at' | 'indexed_at' | 'matched_at' | 'enriched_at'

export const STAGE_COLUMN: Record<PipelineStage, TimestampColumn> = {
  index: 'indexed_at',
  match: 'matched_at',
  enrich: 'enriched_at',
}

/** Marker that must already be set before a stage may advance. */
export const PREREQUISITE_COLUMN: Record<PipelineStage, TimestampColumn> = {
  index: 'ingested_at',
  match: 'indexed_at',
  enrich: 'matched_at',
}

/** The stage and every stage after it. */
export function stagesFrom(stage: PipelineStage): PipelineStage[] {
  return PIPELINE_STAGES.slice(PIPELINE_STAGES.indexOf(stage))
}
