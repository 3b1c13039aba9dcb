/**
 * Source category taxonomy and the static category → tier map.
 *
 * Tier 1 sources are curated and low-volume, so a fixed cut-off is enough.
 * Tier 2 (government) is judged against the anchor's historical mean.
 * Tier 3 (high-volume, low-precision) must clear mean + one standard deviation.
 */

import { z } from 'zod'

export const SOURCE_CATEGORIES = [
  'Think Tank',
  'AI Research',
  'Research Institute',
  'Non-Profit',
  'Academic',
  'Advocacy',
  'Publication',
  'Business Council',
  'Government',
  'News & Media',
  'Misc. Research',
] as const

export const SourceCategorySchema = z.enum(SOURCE_CATEGORIES)
export type SourceCategory = z.infer<typeof SourceCategorySchema>

export type SourceTier = 1 | 2 | 3

export const SOURCE_TIERS: readonly SourceTier[] = [1, 2, 3]

export type TierPolicy = 'fixed' | 'dynamic' | 'strict'

export const TIER_POLICY: Record<SourceTier, TierPolicy> = {
  1: 'fixed',
  2: 'dynamic',
  3: 'strict',
}

const CATEGORY_TIERS: Record<SourceCategory, SourceTier> = {
  'Think Tank': 1,
  'AI Research': 1,
  'Research Institute': 1,
  'Non-Profit': 1,
  'Academic': 1,
  'Advocacy': 1,
  'Publication': 1,
  'Business Council': 1,
  'Government': 2,
  'News & Media': 3,
  'Misc. Research': 3,
}

export function tierForCategory(category: SourceCategory): SourceTier {
  return CATEGORY_TIERS[category]
}

/** Categories assigned to a tier, in taxonomy order. */
export function categoriesForTier(tier: SourceTier): SourceCategory[] {
  return SOURCE_CATEGORIES.filter((c) => CATEGORY_TIERS[c] === tier)
}

export function isSourceTier(value: number): value is SourceTier {
  return value === 1 || value === 2 || value === 3
}
