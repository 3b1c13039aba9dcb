/**
 * Typed error class for engine operations.
 */

export type ErrorCode =
  | 'DB_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'VECTOR_ERROR'
  | 'CONFIG_ERROR'

export class EngineError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'EngineError'
    this.code = code
  }

  static notFound(entity: string, id: string): EngineError {
    return new EngineError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static validation(message: string): EngineError {
    return new EngineError('VALIDATION_ERROR', message)
  }

  static db(message: string): EngineError {
    return new EngineError('DB_ERROR', message)
  }

  static vector(message: string): EngineError {
    return new EngineError('VECTOR_ERROR', message)
  }

  static config(message: string): EngineError {
    return new EngineError('CONFIG_ERROR', message)
  }
}

/** Normalizes an unknown thrown value into a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
