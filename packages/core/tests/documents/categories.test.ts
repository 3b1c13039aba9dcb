import { describe, it, expect } from 'vitest'
import {
  SOURCE_CATEGORIES,
  TIER_POLICY,
  tierForCategory,
  categoriesForTier,
  isSourceTier,
} from '../../src/documents/index.js'

describe('tierForCategory', () => {
  it('puts curated sources in tier 1', () => {
    expect(tierForCategory('Think Tank')).toBe(1)
    expect(tierForCategory('AI Research')).toBe(1)
    expect(tierForCategory('Business Council')).toBe(1)
  })

  it('puts government in tier 2 and noisy sources in tier 3', () => {
    expect(tierForCategory('Government')).toBe(2)
    expect(tierForCategory('News & Media')).toBe(3)
    expect(tierForCategory('Misc. Research')).toBe(3)
  })

  it('assigns every category a tier', () => {
    for (const category of SOURCE_CATEGORIES) {
      expect([1, 2, 3]).toContain(tierForCategory(category))
    }
  })
})

describe('categoriesForTier', () => {
  it('lists categories in taxonomy order', () => {
    expect(categoriesForTier(2)).toEqual(['Government'])
    expect(categoriesForTier(3)).toEqual(['News & Media', 'Misc. Research'])
    expect(categoriesForTier(1)).toHaveLength(8)
  })
})

describe('TIER_POLICY', () => {
  it('maps tiers to threshold policies', () => {
    expect(TIER_POLICY).toEqual({ 1: 'fixed', 2: 'dynamic', 3: 'strict' })
  })

  it('recognises only known tiers', () => {
    expect(isSourceTier(3)).toBe(true)
    expect(isSourceTier(0)).toBe(false)
    expect(isSourceTier(4)).toBe(false)
  })
})
