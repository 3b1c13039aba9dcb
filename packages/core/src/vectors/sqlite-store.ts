/**
 * SQLite-backed vector store.
 *
 * Holds component vectors (one table per component kind) and per-document
 * chunk vectors as Float32 BLOBs. Owns its schema so it can live in the
 * engine database or a separate file.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, EngineError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { packFloat32, unpackFloat32, isFiniteVector } from './math.js'
import type { Vector } from './math.js'
import { VectorStoreUnavailableError } from './store.js'
import type { ComponentType, VectorStore } from './store.js'

interface EmbeddingRow {
  dimensions: number
  embedding: Buffer
}

const COMPONENT_TABLES: Record<ComponentType, { table: string; key: string }> = {
  tag: { table: 'tag_embeddings', key: 'tag_name' },
  kb_item: { table: 'kb_item_embeddings', key: 'kb_item_id' },
  hypothetical_document: { table: 'hypothetical_document_embeddings', key: 'hypothetical_document_id' },
}

export function ensureVectorSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tag_embeddings (
      tag_name TEXT PRIMARY KEY,
      dimensions INTEGER NOT NULL,
      embedding BLOB NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS kb_item_embeddings (
      kb_item_id TEXT PRIMARY KEY,
      dimensions INTEGER NOT NULL,
      embedding BLOB NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS hypothetical_document_embeddings (
      hypothetical_document_id TEXT PRIMARY KEY,
      content TEXT NOT NULL DEFAULT '',
      dimensions INTEGER NOT NULL,
      embedding BLOB NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS document_chunk_embeddings (
      document_id TEXT NOT NULL,
      chunk_index INTEGER NOT NULL,
      dimensions INTEGER NOT NULL,
      embedding BLOB NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (document_id, chunk_index)
    );
  `)
}

export class SqliteVectorStore implements VectorStore {
  constructor(private db: Database.Database) {
    ensureVectorSchema(db)
  }

  async resolve(type: ComponentType, componentId: string): Promise<Vector | null> {
    const { table, key } = COMPONENT_TABLES[type]
    const row = this.db
      .prepare<[string], EmbeddingRow>(`SELECT dimensions, embedding FROM ${table} WHERE ${key} = ?`)
      .get(componentId)
    if (!row) return null
    return unpackFloat32(row.embedding, row.dimensions)
  }

  async vectorsOf(documentId: string): Promise<Vector[]> {
    let rows: EmbeddingRow[]
    try {
      rows = this.db
        .prepare<[string], EmbeddingRow>(
          'SELECT dimensions, embedding FROM document_chunk_embeddings WHERE document_id = ? ORDER BY chunk_index',
        )
        .all(documentId)
    } catch (e) {
      throw new VectorStoreUnavailableError(errorMessage(e))
    }

    const vectors: Vector[] = []
    for (const row of rows) {
      const vec = unpackFloat32(row.embedding, row.dimensions)
      if (vec) vectors.push(vec) // Skip corrupt chunks
    }
    return vectors
  }

  /** Upsert a component vector. `content` is kept only for hypothetical documents. */
  putComponentVector(type: ComponentType, componentId: string, vector: Vector, content = ''): Result<void, EngineError> {
    if (vector.length === 0 || !isFiniteVector(vector)) {
      return Err(EngineError.vector(`Invalid vector for ${type}:${componentId}`))
    }
    const now = new Date().toISOString()
    const blob = packFloat32(vector)

    try {
      switch (type) {
        case 'tag':
        case 'kb_item': {
          const { table, key } = COMPONENT_TABLES[type]
          this.db
            .prepare(
              `INSERT INTO ${table} (${key}, dimensions, embedding, updated_at) VALUES (?, ?, ?, ?)
               ON CONFLICT(${key}) DO UPDATE SET dimensions = excluded.dimensions, embedding = excluded.embedding, updated_at = excluded.updated_at`,
            )
            .run(componentId, vector.length, blob, now)
          break
        }
        case 'hypothetical_document':
          this.db
            .prepare(
              `INSERT INTO hypothetical_document_embeddings (hypothetical_document_id, content, dimensions, embedding, updated_at) VALUES (?, ?, ?, ?, ?)
               ON CONFLICT(hypothetical_document_id) DO UPDATE SET content = excluded.content, dimensions = excluded.dimensions, embedding = excluded.embedding, updated_at = excluded.updated_at`,
            )
            .run(componentId, content, vector.length, blob, now)
          break
        default: {
          const unreachable: never = type
          return Err(EngineError.validation(`Unknown component type: ${String(unreachable)}`))
        }
      }
      return Ok(undefined)
    } catch (e) {
      return Err(EngineError.db(`Failed to store ${type} vector: ${errorMessage(e)}`))
    }
  }

  /** Replace all chunk vectors of a document in one transaction. */
  putDocumentChunks(documentId: string, chunks: readonly Vector[]): Result<number, EngineError> {
    for (const [index, chunk] of chunks.entries()) {
      if (chunk.length === 0 || !isFiniteVector(chunk)) {
        return Err(EngineError.vector(`Invalid chunk ${index} for document ${documentId}`))
      }
    }

    try {
      const now = new Date().toISOString()
      this.db.transaction(() => {
        this.db.prepare('DELETE FROM document_chunk_embeddings WHERE document_id = ?').run(documentId)
        const insert = this.db.prepare(
          'INSERT INTO document_chunk_embeddings (document_id, chunk_index, dimensions, embedding, updated_at) VALUES (?, ?, ?, ?, ?)',
        )
        chunks.forEach((chunk, index) => {
          insert.run(documentId, index, chunk.length, packFloat32(chunk), now)
        })
      })()
      return Ok(chunks.length)
    } catch (e) {
      return Err(EngineError.db(`Failed to store chunks for ${documentId}: ${errorMessage(e)}`))
    }
  }
}
