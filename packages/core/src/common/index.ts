/**
 * Common utilities: shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr, attempt } from './result.js'
export type { Result } from './result.js'

export { EngineError, errorMessage } from './errors.js'
export type { ErrorCode } from './errors.js'

export { UUIDSchema, TimestampSchema, NonEmptyStringSchema } from './schemas.js'
