/**
 * Vector math: cosine similarity, centroids, Float32 BLOB helpers.
 */

export type Vector = readonly number[]

/** Pack a number array into a little-endian Float32 Buffer. */
export function packFloat32(vec: Vector): Buffer {
  const buf = Buffer.alloc(vec.length * 4)
  for (let i = 0; i < vec.length; i++) {
    buf.writeFloatLE(vec[i], i * 4)
  }
  return buf
}

/** Unpack a little-endian Float32 Buffer. Returns null on corrupt data. */
export function unpackFloat32(blob: Buffer, dims: number): number[] | null {
  if (blob.byteLength !== dims * 4) {
    console.warn(`[vectors] corrupt embedding blob: expected ${dims * 4} bytes, got ${blob.byteLength}`)
    return null
  }
  const arr = new Array<number>(dims)
  for (let i = 0; i < dims; i++) {
    arr[i] = blob.readFloatLE(i * 4)
  }
  return arr
}

export function norm(vec: Vector): number {
  let sum = 0
  for (let i = 0; i < vec.length; i++) {
    sum += vec[i] * vec[i]
  }
  return Math.sqrt(sum)
}

/**
 * Cosine similarity for arbitrary (not necessarily normalized) vectors.
 * Returns 0 for mismatched dimensions, empty vectors, or a zero-norm side.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  if (a.length !== b.length || a.length === 0) return 0
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }
  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

/** Clamp into [0, 1]. NaN becomes 0. */
export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0
  return Math.min(1, Math.max(0, score))
}

/**
 * Arithmetic mean of equal-length vectors, summed in input order.
 * Returns null for an empty list or mixed dimensions.
 */
export function centroid(vectors: readonly Vector[]): number[] | null {
  if (vectors.length === 0) return null
  const dims = vectors[0].length
  if (dims === 0) return null
  const sum = new Array<number>(dims).fill(0)
  for (const vec of vectors) {
    if (vec.length !== dims) return null
    for (let i = 0; i < dims; i++) {
      sum[i] += vec[i]
    }
  }
  return sum.map((v) => v / vectors.length)
}

export function isFiniteVector(vec: Vector): boolean {
  return vec.every((v) => Number.isFinite(v))
}
