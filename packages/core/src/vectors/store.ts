/**
 * Vector store contract. The store is owned by the ingestion/indexing side;
 * the engine only reads from it.
 */

import { z } from 'zod'
import type { Vector } from './math.js'

export const COMPONENT_TYPES = ['tag', 'kb_item', 'hypothetical_document'] as const

export const ComponentTypeSchema = z.enum(COMPONENT_TYPES)
export type ComponentType = z.infer<typeof ComponentTypeSchema>

export interface VectorStore {
  /** Vector for an anchor component, or null when the store has none. */
  resolve(type: ComponentType, componentId: string): Promise<Vector | null>
  /** Chunk vectors for a document; empty when the document was never indexed. */
  vectorsOf(documentId: string): Promise<Vector[]>
}

/**
 * Thrown by a store that cannot serve any lookup (connection lost, database
 * closed). Any other rejection from `vectorsOf` is a failure of that one
 * document.
 */
export class VectorStoreUnavailableError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'VectorStoreUnavailableError'
  }
}
