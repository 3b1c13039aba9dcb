/**
 * Anchors: user-defined topics, their components and composite vectors.
 */

export {
  AnchorSchema,
  AnchorComponentSchema,
  ComponentInputSchema,
  CreateAnchorInputSchema,
} from './schemas.js'
export type { Anchor, AnchorComponent, ComponentInput, CreateAnchorInput } from './schemas.js'
export { AnchorRepository } from './repository.js'
export { composeAnchor, composeActiveAnchors } from './compositor.js'
export type { AnchorComposite, ComposableAnchor, ComposeOptions, SkippedComponent } from './compositor.js'
