/**
 * Anchor compositor: one effective vector per anchor, the centroid of its
 * resolvable components.
 *
 * Composites are recomputed on every call. Anchors are edited while the
 * pipeline runs, so callers must not hold a composite across invocations.
 */

import { centroid } from '../vectors/math.js'
import type { Vector } from '../vectors/math.js'
import type { EmbeddingResolver } from '../vectors/resolver.js'
import type { Anchor, AnchorComponent } from './schemas.js'
import type { AnchorRepository } from './repository.js'
import type { Result } from '../common/index.js'
import { Ok } from '../common/index.js'
import type { EngineError } from '../common/index.js'

export interface SkippedComponent {
  component: AnchorComponent
  reason: 'unresolved' | 'dimension_mismatch'
}

export type AnchorComposite =
  | {
      kind: 'composite'
      anchorId: string
      anchorName: string
      vector: number[]
      resolvedCount: number
      skipped: SkippedComponent[]
    }
  | {
      kind: 'not_composable'
      anchorId: string
      anchorName: string
      reason: string
      skipped: SkippedComponent[]
    }

export type ComposableAnchor = Extract<AnchorComposite, { kind: 'composite' }>

export interface ComposeOptions {
  /** Expected embedding dimension. Defaults to the first resolved vector's. */
  dimensions?: number
}

export async function composeAnchor(
  anchor: Anchor,
  resolver: EmbeddingResolver,
  options: ComposeOptions = {},
): Promise<AnchorComposite> {
  // Lookups run in parallel; aggregation below follows component order.
  const resolved = await Promise.all(anchor.components.map((component) => resolver.resolve(component)))

  const vectors: Vector[] = []
  const skipped: SkippedComponent[] = []
  let dims = options.dimensions

  anchor.components.forEach((component, idx) => {
    const vec = resolved[idx]
    if (!vec) {
      console.warn(`[compositor] anchor "${anchor.name}": ${component.type} "${component.componentId}" has no vector, skipping`)
      skipped.push({ component, reason: 'unresolved' })
      return
    }
    if (dims === undefined) dims = vec.length
    if (vec.length !== dims) {
      console.warn(
        `[compositor] anchor "${anchor.name}": ${component.type} "${component.componentId}" has ${vec.length} dims, expected ${dims}, skipping`,
      )
      skipped.push({ component, reason: 'dimension_mismatch' })
      return
    }
    vectors.push(vec)
  })

  const vector = centroid(vectors)
  if (!vector) {
    const reason = anchor.components.length === 0 ? 'anchor has no components' : 'no component resolved to a vector'
    return { kind: 'not_composable', anchorId: anchor.id, anchorName: anchor.name, reason, skipped }
  }

  return {
    kind: 'composite',
    anchorId: anchor.id,
    anchorName: anchor.name,
    vector,
    resolvedCount: vectors.length,
    skipped,
  }
}

/**
 * Composes every active anchor. Non-composable anchors are logged and left
 * out; they never block the others.
 */
export async function composeActiveAnchors(
  anchors: AnchorRepository,
  resolver: EmbeddingResolver,
  options: ComposeOptions = {},
): Promise<Result<ComposableAnchor[], EngineError>> {
  const active = anchors.listActive()
  if (!active.ok) return active

  const composites = await Promise.all(active.value.map((anchor) => composeAnchor(anchor, resolver, options)))

  const usable: ComposableAnchor[] = []
  for (const composite of composites) {
    if (composite.kind === 'composite') {
      usable.push(composite)
    } else {
      console.warn(`[compositor] anchor "${composite.anchorName}" is not composable (${composite.reason}), skipping`)
    }
  }
  return Ok(usable)
}
