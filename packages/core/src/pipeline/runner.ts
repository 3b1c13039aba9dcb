/**
 * One pipeline pass: match → refresh statistics if stale → classify,
 * recorded in the run log.
 *
 * A vector store outage stops only the match stage; documents matched by
 * earlier runs are still classified and the run is logged as a failure.
 */

import { Ok, Err } from '../common/index.js'
import type { Result, EngineError } from '../common/index.js'
import type { EngineConfig } from '../config/schemas.js'
import { runMatcher } from '../matching/matcher.js'
import type { MatcherDeps, MatchRunSummary } from '../matching/matcher.js'
import { runClassifier } from '../enrichment/classifier.js'
import type { ClassifierDeps, ClassifyRunSummary } from '../enrichment/classifier.js'
import type { PipelineRunRepository, PipelineRun, PipelineRunMetrics } from './run-repository.js'
import { EMPTY_METRICS } from './run-repository.js'

export type PipelineDeps = MatcherDeps & ClassifierDeps & { runs: PipelineRunRepository }

export interface PipelineOptions {
  config: EngineConfig
  now?: () => Date
}

export interface PipelineReport {
  run: PipelineRun
  /** Null when the match stage aborted. */
  match: MatchRunSummary | null
  matchError: EngineError | null
  statisticsRefreshed: boolean
  classify: ClassifyRunSummary
}

export async function runPipeline(
  deps: PipelineDeps,
  options: PipelineOptions,
): Promise<Result<PipelineReport, EngineError>> {
  const now = options.now ?? (() => new Date())
  const started = deps.runs.start(now().toISOString())
  if (!started.ok) return started
  const runId = started.value.id

  const metrics: PipelineRunMetrics = { ...EMPTY_METRICS }

  const fail = (error: EngineError): Result<never, EngineError> => {
    console.error(`[pipeline] run ${runId.slice(0, 8)} failed: ${error.message}`)
    const finished = deps.runs.finish(runId, 'failure', metrics, now().toISOString(), error.message)
    if (!finished.ok) {
      console.error(`[pipeline] could not record failure of run ${runId.slice(0, 8)}: ${finished.error.message}`)
    }
    return Err(error)
  }

  console.log(`[pipeline] run ${runId.slice(0, 8)} started`)

  const match = await runMatcher(deps, options)
  let matchError: EngineError | null = null
  if (match.ok) {
    metrics.documentsMatched = match.value.documentsMatched
    metrics.linksWritten = match.value.linksWritten
  } else if (match.error.code === 'VECTOR_ERROR') {
    matchError = match.error
    console.warn(`[pipeline] run ${runId.slice(0, 8)} match stage aborted, classifying already matched documents: ${match.error.message}`)
  } else {
    return fail(match.error)
  }

  const stats = deps.statistics.refreshIfStale(now())
  if (!stats.ok) return fail(stats.error)

  const classify = await runClassifier(deps, { ...options, snapshot: stats.value.snapshot })
  if (!classify.ok) return fail(classify.error)
  metrics.linksResolved = classify.value.linksResolved
  metrics.highlightsFound = classify.value.orgHighlights

  const status = matchError ? 'failure' : 'success'
  const finished = deps.runs.finish(runId, status, metrics, now().toISOString(), matchError?.message ?? null)
  if (!finished.ok) return finished

  console.log(
    `[pipeline] run ${runId.slice(0, 8)} finished: ${metrics.documentsMatched} matched, ` +
      `${metrics.linksResolved} resolved, ${metrics.highlightsFound} highlighted`,
  )
  return Ok({
    run: finished.value,
    match: match.ok ? match.value : null,
    matchError,
    statisticsRefreshed: stats.value.refreshed,
    classify: classify.value,
  })
}
