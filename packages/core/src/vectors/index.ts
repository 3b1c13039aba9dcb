/**
 * Vectors: math helpers, the vector store contract and the embedding resolver.
 */

export {
  packFloat32,
  unpackFloat32,
  norm,
  cosineSimilarity,
  clampScore,
  centroid,
  isFiniteVector,
} from './math.js'
export type { Vector } from './math.js'
export { COMPONENT_TYPES, ComponentTypeSchema, VectorStoreUnavailableError } from './store.js'
export type { ComponentType, VectorStore } from './store.js'
export { EmbeddingResolver } from './resolver.js'
export type { ComponentRef } from './resolver.js'
export { SqliteVectorStore, ensureVectorSchema } from './sqlite-store.js'
