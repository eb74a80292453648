import Fastify from 'fastify'
import { createAssignmentEngine } from './assignment/index.js'
import type { RandomSource } from './assignment/random.js'
import { errorBody } from './api/errors.js'
import { registerRoutes } from './api/routes.js'
import { loadGlobalConfig, type GlobalConfig } from './config/global.js'
import { InMemoryReviewStore } from './storage/memory.js'
import type { ReviewStore } from './storage/repository.js'
import { logger } from './utils/logger.js'

export interface ServerOptions {
  config?: GlobalConfig
  /** Store ya construido (tests); si no se pasa se elige según la config */
  store?: ReviewStore
  random?: RandomSource
}

async function createStore(config: GlobalConfig): Promise<ReviewStore> {
  if (config.database.enabled && config.database.url) {
    const { initDatabase } = await import('./db/client.js')
    const { runMigrations } = await import('./db/migrate.js')
    const { PostgresReviewStore } = await import('./storage/postgres.js')

    initDatabase(config.database.url, config.database.pool_max)
    await runMigrations()
    logger.info('Database enabled and initialized')
    return new PostgresReviewStore()
  }

  logger.warn('Database disabled or not configured, running in stateless mode (in-memory store)')
  return new InMemoryReviewStore()
}

export async function createServer(options: ServerOptions = {}) {
  const config = options.config ?? loadGlobalConfig()

  const server = Fastify({
    logger: {
      level: config.logging.level,
    },
  })

  const store = options.store ?? await createStore(config)
  const engine = createAssignmentEngine({
    store,
    random: options.random,
    seed: config.assignment.random_seed,
  })

  // Health check
  server.get('/health', async () => {
    let dbHealthy: boolean | null = null

    if (config.database.enabled) {
      try {
        const { healthCheck } = await import('./db/client.js')
        dbHealthy = await healthCheck()
      } catch (error) {
        logger.error({ error }, 'Database health check failed')
        dbHealthy = false
      }
    }

    return {
      status: 'ok',
      database: config.database.enabled
        ? dbHealthy
          ? 'connected'
          : 'disconnected'
        : 'disabled',
    }
  })

  // JSON inválido, body vacío, etc.: errores que Fastify lanza antes de llegar al handler
  server.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500
    if (statusCode < 500) {
      logger.warn({ code: error.code, route: request.url }, error.message)
      return reply.code(400).send(errorBody('BAD_REQUEST', error.message))
    }

    logger.error({ error, route: request.url }, 'Unhandled server error')
    return reply.code(500).send(errorBody('INTERNAL_ERROR', 'internal server error'))
  })

  registerRoutes(server, engine)

  server.addHook('onClose', async () => {
    if (config.database.enabled && !options.store) {
      const { closeDatabase } = await import('./db/client.js')
      await closeDatabase()
    }
  })

  return server
}
