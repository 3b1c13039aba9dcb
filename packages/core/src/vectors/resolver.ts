/**
 * Embedding resolver: maps an anchor component to its vector.
 * A pure lookup over the vector store; failures become null so one bad
 * component never takes down its anchor.
 */

import { errorMessage } from '../common/index.js'
import { isFiniteVector } from './math.js'
import type { Vector } from './math.js'
import type { ComponentType, VectorStore } from './store.js'

export interface ComponentRef {
  type: ComponentType
  componentId: string
}

export class EmbeddingResolver {
  constructor(private store: VectorStore) {}

  async resolve(ref: ComponentRef): Promise<Vector | null> {
    let vec: Vector | null
    try {
      vec = await this.store.resolve(ref.type, ref.componentId)
    } catch (err) {
      console.warn(`[resolver] ${ref.type}:${ref.componentId} lookup failed: ${errorMessage(err)}`)
      return null
    }
    if (!vec || vec.length === 0) return null
    if (!isFiniteVector(vec)) {
      console.warn(`[resolver] ${ref.type}:${ref.componentId} has non-finite values`)
      return null
    }
    return vec
  }

  /** Chunk vectors for a document. Rejects with `VectorStoreUnavailableError` when the store is unreachable. */
  vectorsOf(documentId: string): Promise<Vector[]> {
    return this.store.vectorsOf(documentId)
  }
}
