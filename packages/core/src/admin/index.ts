/**
 * Admin: bulk reprocessing resets.
 */

export { PipelineAdmin, ResetRequestSchema, ResetScopeSchema } from './reset.js'
export type { ResetRequest, ResetScope, ResetResult } from './reset.js'
