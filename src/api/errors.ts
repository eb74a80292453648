import type { FastifyReply, FastifyRequest } from 'fastify'
import { ZodError } from 'zod'
import { isReviewError, type ReviewErrorKind } from '../errors.js'
import { logger } from '../utils/logger.js'

export interface ErrorResponse {
  error: {
    code: string
    message: string
  }
}

const HTTP_STATUS: Record<ReviewErrorKind, number> = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  AUTHOR_INACTIVE: 409,
  PR_MERGED: 409,
  NOT_ASSIGNED: 409,
  NO_CANDIDATE: 409,
  STORAGE_FAILURE: 500,
}

export function errorBody(code: string, message: string): ErrorResponse {
  return { error: { code, message } }
}

/**
 * Traduce cualquier error de un handler a la respuesta HTTP correspondiente.
 */
export function sendError(reply: FastifyReply, error: unknown, request: FastifyRequest) {
  if (error instanceof ZodError) {
    const message = error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
    return reply.code(400).send(errorBody('BAD_REQUEST', message))
  }

  if (isReviewError(error)) {
    if (error.kind === 'STORAGE_FAILURE') {
      // El mensaje del driver no sale al cliente
      logger.error({ error, route: request.url }, 'Storage failure')
      return reply.code(HTTP_STATUS[error.kind]).send(errorBody('INTERNAL_ERROR', 'internal server error'))
    }

    logger.warn({ kind: error.kind, details: error.details, route: request.url }, error.message)
    return reply.code(HTTP_STATUS[error.kind]).send(errorBody(error.kind, error.message))
  }

  logger.error({ error, route: request.url }, 'Unexpected error')
  return reply.code(500).send(errorBody('INTERNAL_ERROR', 'internal server error'))
}
