/**
 * Tiered enrichment classifier.
 *
 * Walks the enrich frontier (documents never enriched, or owning an
 * unresolved link to an active anchor), resolves each pending link against
 * its tier threshold, recomputes the document's org highlight and stamps the
 * enrichment markers, all of a batch in one transaction.
 */

import type Database from 'better-sqlite3'
import { Ok, EngineError, attempt, unwrap, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { tierForCategory } from '../documents/categories.js'
import type { EngineConfig } from '../config/schemas.js'
import type { LinkRepository } from '../links/repository.js'
import type { LinkResolution } from '../links/schemas.js'
import type { PipelineStateTracker } from '../pipeline/state-tracker.js'
import type { StatisticsSnapshot } from '../statistics/compute.js'
import type { ThresholdStatisticsService } from '../statistics/service.js'
import { selectThreshold, isHighlight } from './thresholds.js'

export interface ClassifierDeps {
  db: Database.Database
  links: LinkRepository
  tracker: PipelineStateTracker
  statistics: ThresholdStatisticsService
}

export interface ClassifyOptions {
  config: EngineConfig
  now?: () => Date
  maxBatches?: number
  /** Use this snapshot instead of the last persisted one. */
  snapshot?: StatisticsSnapshot
}

export interface ClassifyRunSummary {
  batches: number
  documentsEnriched: number
  linksResolved: number
  anchorHighlights: number
  /** Documents in this run whose org highlight ended up true. */
  orgHighlights: number
  /** Links judged against a fallback threshold for lack of samples. */
  fallbackThresholds: number
}

export async function runClassifier(
  deps: ClassifierDeps,
  options: ClassifyOptions,
): Promise<Result<ClassifyRunSummary, EngineError>> {
  const { config } = options
  const now = options.now ?? (() => new Date())

  let snapshot = options.snapshot
  if (!snapshot) {
    const stored = deps.statistics.snapshot()
    if (!stored.ok) return stored
    snapshot = stored.value
  }

  const summary: ClassifyRunSummary = {
    batches: 0,
    documentsEnriched: 0,
    linksResolved: 0,
    anchorHighlights: 0,
    orgHighlights: 0,
    fallbackThresholds: 0,
  }

  let afterId: string | undefined
  while (options.maxBatches === undefined || summary.batches < options.maxBatches) {
    const frontier = deps.tracker.frontierFor('enrich', { limit: config.batchSize, afterId })
    if (!frontier.ok) return frontier
    const docs = frontier.value
    if (docs.length === 0) break
    afterId = docs[docs.length - 1].id

    const documentIds = docs.map((d) => d.id)
    const pending = deps.links.pendingForDocuments(documentIds)
    if (!pending.ok) return pending

    const resolutions: LinkResolution[] = []
    let highlights = 0
    let fallbacks = 0
    for (const link of pending.value) {
      const tier = tierForCategory(link.category)
      const { threshold, basis } = selectThreshold(tier, link.anchorId, snapshot, config)
      const anchorHighlight = isHighlight(link.similarityScore, threshold)
      if (basis === 'fallback') fallbacks++
      if (anchorHighlight) highlights++
      resolutions.push({ linkId: link.linkId, anchorHighlight, threshold })
    }

    const stamp = now().toISOString()
    const committed = attempt(
      () =>
        deps.db.transaction(() => {
          const resolved = unwrap(deps.links.resolve(resolutions, stamp))
          // Covers documents with no links at all: absence of a match is a valid end state.
          let orgHighlighted = 0
          for (const id of documentIds) {
            if (unwrap(deps.links.recomputeOrgHighlight(id))) orgHighlighted++
          }
          unwrap(deps.tracker.advance(documentIds, 'enrich', stamp))
          return { resolved, orgHighlighted }
        })(),
      (e) => (e instanceof EngineError ? e : EngineError.db(errorMessage(e))),
    )
    if (!committed.ok) {
      console.error(`[classifier] batch commit failed, nothing written: ${committed.error.message}`)
      return committed
    }

    summary.batches++
    summary.documentsEnriched += documentIds.length
    summary.linksResolved += committed.value.resolved
    summary.anchorHighlights += highlights
    summary.orgHighlights += committed.value.orgHighlighted
    summary.fallbackThresholds += fallbacks
  }

  if (summary.fallbackThresholds > 0) {
    console.warn(`[classifier] ${summary.fallbackThresholds} link(s) used a fallback threshold (insufficient history)`)
  }
  console.log(
    `[classifier] enriched ${summary.documentsEnriched} document(s), resolved ${summary.linksResolved} link(s), ` +
      `${summary.anchorHighlights} anchor highlight(s), ${summary.orgHighlights} org highlight(s)`,
  )
  return Ok(summary)
}
