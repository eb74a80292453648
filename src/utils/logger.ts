import { pino } from 'pino'

/**
 * Logger compartido por todo el servicio.
 * Fastify usa su propia instancia de pino para los logs de request, con el mismo nivel.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'reviewer-assigner' },
})
