/**
 * Engine wiring: one database, one vector store, one config, and every
 * repository and runner bound to them.
 */

import type Database from 'better-sqlite3'
import type { Result, EngineError } from './common/index.js'
import { defaultEngineConfig } from './config/load.js'
import type { EngineConfig } from './config/schemas.js'
import { DocumentRepository } from './documents/repository.js'
import { AnchorRepository } from './anchors/repository.js'
import { LinkRepository } from './links/repository.js'
import { HighlightRepository } from './highlights/repository.js'
import { PipelineAdmin } from './admin/reset.js'
import { ThresholdStatisticsService } from './statistics/service.js'
import type { StatisticsSnapshot } from './statistics/compute.js'
import { PipelineStateTracker } from './pipeline/state-tracker.js'
import { PipelineRunRepository } from './pipeline/run-repository.js'
import { StatisticsRefresher } from './pipeline/refresher.js'
import { runPipeline } from './pipeline/runner.js'
import type { PipelineReport } from './pipeline/runner.js'
import { runMatcher } from './matching/matcher.js'
import type { MatchRunSummary } from './matching/matcher.js'
import { runClassifier } from './enrichment/classifier.js'
import type { ClassifyRunSummary } from './enrichment/classifier.js'
import { EmbeddingResolver } from './vectors/resolver.js'
import { SqliteVectorStore } from './vectors/sqlite-store.js'
import type { VectorStore } from './vectors/store.js'

export interface EngineOptions {
  db: Database.Database
  /** Defaults to a `SqliteVectorStore` on `db`. */
  vectorStore?: VectorStore
  config?: EngineConfig
  now?: () => Date
}

export interface RunLimits {
  maxBatches?: number
}

export class Engine {
  readonly config: EngineConfig
  readonly documents: DocumentRepository
  readonly anchors: AnchorRepository
  readonly links: LinkRepository
  readonly highlights: HighlightRepository
  readonly admin: PipelineAdmin
  readonly statistics: ThresholdStatisticsService
  readonly tracker: PipelineStateTracker
  readonly runs: PipelineRunRepository
  readonly resolver: EmbeddingResolver

  private readonly db: Database.Database
  private readonly now: () => Date

  constructor(options: EngineOptions) {
    this.db = options.db
    this.config = options.config ?? defaultEngineConfig()
    this.now = options.now ?? (() => new Date())
    this.documents = new DocumentRepository(this.db)
    this.anchors = new AnchorRepository(this.db)
    this.links = new LinkRepository(this.db)
    this.highlights = new HighlightRepository(this.db)
    this.admin = new PipelineAdmin(this.db)
    this.statistics = new ThresholdStatisticsService(this.db, this.config.statistics)
    this.tracker = new PipelineStateTracker(this.db)
    this.runs = new PipelineRunRepository(this.db)
    this.resolver = new EmbeddingResolver(options.vectorStore ?? new SqliteVectorStore(this.db))
  }

  /** Called by the indexer once a document's chunk vectors are stored. */
  markIndexed(documentIds: readonly string[]): Result<number, EngineError> {
    return this.tracker.advance(documentIds, 'index', this.now().toISOString())
  }

  match(limits: RunLimits = {}): Promise<Result<MatchRunSummary, EngineError>> {
    return runMatcher(this.deps(), { config: this.config, now: this.now, ...limits })
  }

  classify(limits: RunLimits & { snapshot?: StatisticsSnapshot } = {}): Promise<Result<ClassifyRunSummary, EngineError>> {
    return runClassifier(this.deps(), { config: this.config, now: this.now, ...limits })
  }

  refreshStatistics(): Result<StatisticsSnapshot, EngineError> {
    return this.statistics.refresh(this.now())
  }

  run(): Promise<Result<PipelineReport, EngineError>> {
    return runPipeline(this.deps(), { config: this.config, now: this.now })
  }

  refresher(tickMs?: number): StatisticsRefresher {
    return new StatisticsRefresher(this.statistics, tickMs, this.now)
  }

  private deps() {
    return {
      db: this.db,
      anchors: this.anchors,
      links: this.links,
      tracker: this.tracker,
      resolver: this.resolver,
      statistics: this.statistics,
      runs: this.runs,
    }
  }
}

export function createEngine(options: EngineOptions): Engine {
  return new Engine(options)
}
