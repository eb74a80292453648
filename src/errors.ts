/**
 * Tipos de error de negocio que expone el engine.
 * El transporte HTTP mapea cada uno a un status code (ver api/errors.ts),
 * nunca comparando mensajes.
 */
export type ReviewErrorKind =
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'AUTHOR_INACTIVE'
  | 'PR_MERGED'
  | 'NOT_ASSIGNED'
  | 'NO_CANDIDATE'
  | 'STORAGE_FAILURE'

export type EntityName = 'team' | 'user' | 'author' | 'pr'

export interface ReviewErrorDetails {
  entity?: EntityName
  prId?: number
  userId?: number
  teamId?: number
}

export class ReviewError extends Error {
  readonly kind: ReviewErrorKind
  readonly details: ReviewErrorDetails

  constructor(kind: ReviewErrorKind, message: string, details: ReviewErrorDetails = {}, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ReviewError'
    this.kind = kind
    this.details = details
  }
}

/**
 * Falla del storage (DB caída, constraint violada, etc.).
 * Se propaga tal cual hasta el caller; el engine no la reinterpreta.
 */
export class StorageError extends ReviewError {
  readonly operation: string

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super('STORAGE_FAILURE', `${operation}: ${reason}`, {}, { cause })
    this.name = 'StorageError'
    this.operation = operation
  }
}

export function badRequest(message: string, details: ReviewErrorDetails = {}): ReviewError {
  return new ReviewError('BAD_REQUEST', message, details)
}

export function notFound(entity: EntityName, id: number): ReviewError {
  const details: ReviewErrorDetails = { entity }
  switch (entity) {
    case 'team':
      details.teamId = id
      break
    case 'pr':
      details.prId = id
      break
    case 'user':
    case 'author':
      details.userId = id
      break
  }
  return new ReviewError('NOT_FOUND', `${entity} not found`, details)
}

export function isReviewError(error: unknown): error is ReviewError {
  return error instanceof ReviewError
}
