import { describe, it, expect } from 'vitest'
import {
  aggregateChunkScores,
  scoreAgainstAnchor,
  passesPreFilter,
  scoreDocument,
} from '../../src/matching/index.js'
import type { ComposableAnchor } from '../../src/anchors/index.js'
import { defaultEngineConfig } from '../../src/config/index.js'

const config = defaultEngineConfig()

function composite(anchorId: string, vector: number[]): ComposableAnchor {
  return { kind: 'composite', anchorId, anchorName: anchorId, vector, resolvedCount: 1, skipped: [] }
}

describe('aggregateChunkScores', () => {
  const scores = [0.2, 0.9, 0.5]

  it('max takes the best chunk', () => {
    expect(aggregateChunkScores(scores, { policy: 'max', k: 5 })).toBe(0.9)
  })

  it('max handles a very large chunk set', () => {
    const many = Array.from({ length: 500_000 }, (_, i) => (i % 1000) / 1000)
    expect(aggregateChunkScores(many, { policy: 'max', k: 5 })).toBe(0.999)
  })

  it('mean averages all chunks', () => {
    expect(aggregateChunkScores(scores, { policy: 'mean', k: 5 })).toBeCloseTo(1.6 / 3, 10)
  })

  it('top_k_mean averages the k best chunks', () => {
    expect(aggregateChunkScores(scores, { policy: 'top_k_mean', k: 2 })).toBeCloseTo(0.7, 10)
  })

  it('top_k_mean uses every chunk when there are fewer than k', () => {
    expect(aggregateChunkScores(scores, { policy: 'top_k_mean', k: 5 })).toBeCloseTo(1.6 / 3, 10)
  })

  it('scores no chunks as 0', () => {
    expect(aggregateChunkScores([], { policy: 'max', k: 5 })).toBe(0)
  })
})

describe('scoreAgainstAnchor', () => {
  const chunks = [[1, 0], [0, 1]]

  it('applies the configured policy across chunks', () => {
    expect(scoreAgainstAnchor(chunks, [1, 0], { policy: 'max', k: 5 })).toBe(1)
    expect(scoreAgainstAnchor(chunks, [1, 0], { policy: 'mean', k: 5 })).toBe(0.5)
  })

  it('clamps negative similarity to 0', () => {
    expect(scoreAgainstAnchor([[-1, 0]], [1, 0], { policy: 'max', k: 5 })).toBe(0)
  })
})

describe('passesPreFilter', () => {
  it('drops noisy-category scores below the minimum', () => {
    expect(passesPreFilter('News & Media', 0.24, config.preFilter)).toBe(false)
    expect(passesPreFilter('Misc. Research', 0.1, config.preFilter)).toBe(false)
  })

  it('keeps a noisy-category score equal to the minimum', () => {
    expect(passesPreFilter('News & Media', 0.25, config.preFilter)).toBe(true)
  })

  it('never filters other categories', () => {
    expect(passesPreFilter('Think Tank', 0.01, config.preFilter)).toBe(true)
    expect(passesPreFilter('Government', 0, config.preFilter)).toBe(true)
  })
})

describe('scoreDocument', () => {
  const anchors = [composite('on-topic', [1, 0]), composite('off-topic', [0, 1])]

  it('separates kept and filtered candidates for a noisy category', () => {
    const result = scoreDocument('News & Media', [[1, 0]], anchors, config)
    expect(result.kept).toEqual([{ anchorId: 'on-topic', similarityScore: 1 }])
    expect(result.filtered).toEqual([{ anchorId: 'off-topic', similarityScore: 0 }])
  })

  it('keeps every candidate for a curated category', () => {
    const result = scoreDocument('Think Tank', [[1, 0]], anchors, config)
    expect(result.kept.map((c) => c.anchorId)).toEqual(['on-topic', 'off-topic'])
    expect(result.filtered).toEqual([])
  })
})
