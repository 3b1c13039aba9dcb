import type Database from 'better-sqlite3'
import { unwrap } from '../src/common/index.js'
import { DocumentRepository } from '../src/documents/index.js'
import type { Document, SourceCategory } from '../src/documents/index.js'
import { PipelineStateTracker } from '../src/pipeline/index.js'
import type { PipelineStage } from '../src/pipeline/index.js'
import { VectorStoreUnavailableError } from '../src/vectors/index.js'
import type { ComponentType, Vector, VectorStore } from '../src/vectors/index.js'

/** Fixed, sortable document id: docId(1) < docId(2) < … */
export function docId(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`
}

/**
 * In-process vector store. Lookups for documents in `failing` reject on their
 * own; `goOffline` makes every lookup reject as an unavailable store.
 */
export class FakeVectorStore implements VectorStore {
  readonly failing = new Set<string>()
  private components = new Map<string, Vector>()
  private chunks = new Map<string, Vector[]>()
  private unavailable = false

  setComponent(type: ComponentType, componentId: string, vector: Vector): void {
    this.components.set(`${type}:${componentId}`, vector)
  }

  setChunks(documentId: string, chunks: Vector[]): void {
    this.chunks.set(documentId, chunks)
  }

  goOffline(): void {
    this.unavailable = true
  }

  async resolve(type: ComponentType, componentId: string): Promise<Vector | null> {
    return this.components.get(`${type}:${componentId}`) ?? null
  }

  async vectorsOf(documentId: string): Promise<Vector[]> {
    if (this.unavailable) throw new VectorStoreUnavailableError('connection refused')
    if (this.failing.has(documentId)) throw new Error(`chunk read failed for ${documentId}`)
    return this.chunks.get(documentId) ?? []
  }
}

export interface SeedOptions {
  n: number
  category?: SourceCategory
  ingestedAt?: string
  /** Advance through this stage and every one before it. */
  through?: PipelineStage
  at?: string
}

/** Creates a document and advances it through the requested stages. */
export function seedDocument(db: Database.Database, options: SeedOptions): Document {
  const documents = new DocumentRepository(db)
  const tracker = new PipelineStateTracker(db)
  const at = options.at ?? '2026-03-01T00:00:00.000Z'

  const doc = unwrap(
    documents.create({
      id: docId(options.n),
      sourceName: `source-${options.n}`,
      title: `Document ${options.n}`,
      category: options.category ?? 'Think Tank',
      ingestedAt: options.ingestedAt ?? '2026-03-01T00:00:00.000Z',
    }),
  )

  const stages: PipelineStage[] = ['index', 'match', 'enrich']
  if (options.through) {
    for (const stage of stages.slice(0, stages.indexOf(options.through) + 1)) {
      unwrap(tracker.advance([doc.id], stage, at))
    }
  }
  return unwrap(documents.getById(doc.id))
}
