/**
 * Similarity matcher: scores the match frontier against every active,
 * composable anchor and persists surviving links.
 *
 * Per batch: read frontier → vector lookups (parallel) → pure scoring →
 * one transaction writing links and `matched_at`. Nothing is written before
 * the transaction, so an aborted batch can be retried from scratch.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, EngineError, attempt, unwrap, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { composeActiveAnchors } from '../anchors/compositor.js'
import type { ComposableAnchor } from '../anchors/compositor.js'
import type { AnchorRepository } from '../anchors/repository.js'
import type { EngineConfig } from '../config/schemas.js'
import type { Document } from '../documents/schemas.js'
import type { LinkRepository } from '../links/repository.js'
import type { LinkCandidate } from '../links/schemas.js'
import type { PipelineStateTracker } from '../pipeline/state-tracker.js'
import type { EmbeddingResolver } from '../vectors/resolver.js'
import { VectorStoreUnavailableError } from '../vectors/store.js'
import type { Vector } from '../vectors/math.js'
import { scoreDocument } from './scoring.js'
import type { DocumentScore } from './scoring.js'

export interface MatcherDeps {
  db: Database.Database
  anchors: AnchorRepository
  links: LinkRepository
  tracker: PipelineStateTracker
  resolver: EmbeddingResolver
}

export interface MatchOptions {
  config: EngineConfig
  now?: () => Date
  /** Stop after this many batches; the rest of the frontier waits for the next run. */
  maxBatches?: number
}

export interface MatchRunSummary {
  anchorsUsed: number
  batches: number
  documentsMatched: number
  linksWritten: number
  linksFiltered: number
  /** Documents left unmatched this run (no vectors, or their own lookup failed). */
  skippedDocumentIds: string[]
}

type Lookup =
  | { kind: 'vectors'; doc: Document; chunks: Vector[] }
  | { kind: 'missing'; doc: Document; reason: string }
  | { kind: 'failed'; doc: Document; reason: string }
  | { kind: 'unavailable'; doc: Document; reason: string }

async function lookupChunks(
  docs: readonly Document[],
  resolver: EmbeddingResolver,
  dims: ReadonlySet<number>,
): Promise<Lookup[]> {
  const settled = await Promise.allSettled(docs.map((doc) => resolver.vectorsOf(doc.id)))

  return settled.map((outcome, idx): Lookup => {
    const doc = docs[idx]
    if (outcome.status === 'rejected') {
      const kind = outcome.reason instanceof VectorStoreUnavailableError ? 'unavailable' : 'failed'
      return { kind, doc, reason: errorMessage(outcome.reason) }
    }
    const chunks = outcome.value.filter((chunk) => dims.has(chunk.length))
    if (chunks.length < outcome.value.length) {
      console.warn(`[matcher] document ${doc.id}: dropped ${outcome.value.length - chunks.length} chunk(s) with wrong dimensions`)
    }
    if (chunks.length === 0) {
      return { kind: 'missing', doc, reason: outcome.value.length === 0 ? 'no chunk vectors' : 'no chunk with matching dimensions' }
    }
    return { kind: 'vectors', doc, chunks }
  })
}

/**
 * Scores a document against the anchors of each dimension its chunks come in.
 * Anchors of a dimension the document has no chunks for get no link.
 */
function scoreByDimension(
  doc: Document,
  chunks: readonly Vector[],
  anchorsByDims: ReadonlyMap<number, ComposableAnchor[]>,
  config: EngineConfig,
): DocumentScore {
  const score: DocumentScore = { kept: [], filtered: [] }
  for (const [dims, group] of anchorsByDims) {
    const sized = chunks.filter((chunk) => chunk.length === dims)
    if (sized.length === 0) continue
    const scored = scoreDocument(doc.category, sized, group, config)
    score.kept.push(...scored.kept)
    score.filtered.push(...scored.filtered)
  }
  return score
}

export async function runMatcher(
  deps: MatcherDeps,
  options: MatchOptions,
): Promise<Result<MatchRunSummary, EngineError>> {
  const { config } = options
  const now = options.now ?? (() => new Date())

  const summary: MatchRunSummary = {
    anchorsUsed: 0,
    batches: 0,
    documentsMatched: 0,
    linksWritten: 0,
    linksFiltered: 0,
    skippedDocumentIds: [],
  }

  // Recomputed on every invocation; anchors may have changed since the last run.
  const composed = await composeActiveAnchors(deps.anchors, deps.resolver, { dimensions: config.embeddingDimensions })
  if (!composed.ok) return composed
  const anchors = composed.value
  summary.anchorsUsed = anchors.length

  if (anchors.length === 0) {
    // Leave the frontier untouched so documents are scored once anchors exist.
    console.warn('[matcher] no active anchors with a composite vector, nothing to match')
    return Ok(summary)
  }
  // Mixed dimensions mean some anchors were embedded by a different model.
  const anchorsByDims = new Map<number, ComposableAnchor[]>()
  for (const anchor of anchors) {
    const group = anchorsByDims.get(anchor.vector.length)
    if (group) group.push(anchor)
    else anchorsByDims.set(anchor.vector.length, [anchor])
  }
  if (anchorsByDims.size > 1) {
    console.warn(`[matcher] active anchors span ${anchorsByDims.size} embedding dimensions: ${[...anchorsByDims.keys()].join(', ')}`)
  }
  const dims = new Set(anchorsByDims.keys())

  let afterId: string | undefined
  while (options.maxBatches === undefined || summary.batches < options.maxBatches) {
    const frontier = deps.tracker.frontierFor('match', { limit: config.batchSize, afterId })
    if (!frontier.ok) return frontier
    const docs = frontier.value
    if (docs.length === 0) break
    afterId = docs[docs.length - 1].id

    const lookups = await lookupChunks(docs, deps.resolver, dims)
    const outage = lookups.find((l) => l.kind === 'unavailable')
    if (outage) {
      console.error(`[matcher] vector store unavailable, aborting batch of ${docs.length}: ${outage.reason}`)
      return Err(EngineError.vector(`Vector store unavailable: ${outage.reason}`))
    }

    const candidates: LinkCandidate[] = []
    const matchedIds: string[] = []
    let filtered = 0

    for (const lookup of lookups) {
      if (lookup.kind !== 'vectors') {
        console.warn(`[matcher] document ${lookup.doc.id} left unmatched: ${lookup.reason}`)
        summary.skippedDocumentIds.push(lookup.doc.id)
        continue
      }
      const scored = scoreByDimension(lookup.doc, lookup.chunks, anchorsByDims, config)
      for (const c of scored.kept) {
        candidates.push({ documentId: lookup.doc.id, anchorId: c.anchorId, similarityScore: c.similarityScore })
      }
      filtered += scored.filtered.length
      matchedIds.push(lookup.doc.id)
    }

    const stamp = now().toISOString()
    const committed = attempt(
      () =>
        deps.db.transaction(() => {
          const written = unwrap(deps.links.upsertMany(candidates, stamp))
          unwrap(deps.tracker.advance(matchedIds, 'match', stamp))
          return written
        })(),
      (e) => (e instanceof EngineError ? e : EngineError.db(errorMessage(e))),
    )
    if (!committed.ok) {
      console.error(`[matcher] batch commit failed, nothing written: ${committed.error.message}`)
      return committed
    }

    summary.batches++
    summary.documentsMatched += matchedIds.length
    summary.linksWritten += committed.value
    summary.linksFiltered += filtered

    if (filtered > 0) {
      console.log(`[matcher] pre-filter dropped ${filtered} candidate link(s) below ${config.preFilter.minScore}`)
    }
  }

  console.log(
    `[matcher] matched ${summary.documentsMatched} document(s) against ${summary.anchorsUsed} anchor(s), ` +
      `${summary.linksWritten} link(s) written, ${summary.skippedDocumentIds.length} skipped`,
  )
  return Ok(summary)
}
