import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, EngineError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { SourceCategorySchema } from './categories.js'
import { CreateDocumentInputSchema } from './schemas.js'
import type { Document, CreateDocumentInput } from './schemas.js'

export interface DocumentRow {
  id: string
  source_name: string
  title: string
  url: string
  category: string
  published_at: string | null
  ingested_at: string
  indexed_at: string | null
  matched_at: string | null
  enriched_at: string | null
  org_highlight: number | null
}

export const DOCUMENT_COLUMNS =
  'id, source_name, title, url, category, published_at, ingested_at, indexed_at, matched_at, enriched_at, org_highlight'

export function toNullableBoolean(value: number | null): boolean | null {
  return value === null ? null : value === 1
}

export function rowToDocument(row: DocumentRow): Document {
  // Category column is only ever written through the validated create path;
  // a row outside the taxonomy means the table was edited by hand.
  const category = SourceCategorySchema.safeParse(row.category)
  if (!category.success) {
    throw EngineError.validation(`Document ${row.id} has unknown category: ${row.category}`)
  }

  return {
    id: row.id,
    sourceName: row.source_name,
    title: row.title,
    url: row.url,
    category: category.data,
    publishedAt: row.published_at,
    ingestedAt: row.ingested_at,
    indexedAt: row.indexed_at,
    matchedAt: row.matched_at,
    enrichedAt: row.enriched_at,
    orgHighlight: toNullableBoolean(row.org_highlight),
  }
}

/**
 * Documents are created by the ingestion collaborator; the engine only moves
 * their pipeline timestamps and highlight aggregate.
 */
export class DocumentRepository {
  constructor(private db: Database.Database) {}

  create(input: CreateDocumentInput): Result<Document, EngineError> {
    const parsed = CreateDocumentInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(EngineError.validation(parsed.error.message))
    }

    const id = parsed.data.id ?? uuidv4()
    const ingestedAt = parsed.data.ingestedAt ?? new Date().toISOString()

    try {
      this.db
        .prepare(
          'INSERT INTO documents (id, source_name, title, url, category, published_at, ingested_at) VALUES (?, ?, ?, ?, ?, ?, ?)',
        )
        .run(
          id,
          parsed.data.sourceName,
          parsed.data.title,
          parsed.data.url,
          parsed.data.category,
          parsed.data.publishedAt,
          ingestedAt,
        )
    } catch (e) {
      return Err(EngineError.db(errorMessage(e)))
    }

    return Ok({
      id,
      sourceName: parsed.data.sourceName,
      title: parsed.data.title,
      url: parsed.data.url,
      category: parsed.data.category,
      publishedAt: parsed.data.publishedAt,
      ingestedAt,
      indexedAt: null,
      matchedAt: null,
      enrichedAt: null,
      orgHighlight: null,
    })
  }

  getById(id: string): Result<Document, EngineError> {
    try {
      const row = this.db
        .prepare<[string], DocumentRow>(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = ?`)
        .get(id)
      if (!row) return Err(EngineError.notFound('Document', id))
      return Ok(rowToDocument(row))
    } catch (e) {
      return Err(e instanceof EngineError ? e : EngineError.db(errorMessage(e)))
    }
  }

  /** Fetches documents by id; unknown ids are omitted. Order follows `ids`. */
  getMany(ids: readonly string[]): Result<Document[], EngineError> {
    if (ids.length === 0) return Ok([])
    try {
      const placeholders = ids.map(() => '?').join(', ')
      const rows = this.db
        .prepare<string[], DocumentRow>(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id IN (${placeholders})`)
        .all(...ids)
      const byId = new Map(rows.map((row) => [row.id, rowToDocument(row)]))
      const ordered: Document[] = []
      for (const id of ids) {
        const doc = byId.get(id)
        if (doc) ordered.push(doc)
      }
      return Ok(ordered)
    } catch (e) {
      return Err(e instanceof EngineError ? e : EngineError.db(errorMessage(e)))
    }
  }

  count(): Result<number, EngineError> {
    try {
      const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM documents').get()
      return Ok(row?.count ?? 0)
    } catch (e) {
      return Err(EngineError.db(errorMessage(e)))
    }
  }
}
