import { z } from 'zod'
import { logger } from '../utils/logger.js'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const GlobalConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS).default('info'),
  }),
  database: z.object({
    url: z.string().optional(), // PostgreSQL connection string
    enabled: z.boolean().default(false), // Sin DB se usa el store en memoria
    pool_max: z.coerce.number().int().positive().default(10),
  }),
  assignment: z.object({
    // Semilla fija para reproducir selecciones; sin semilla se usa reloj + pid
    random_seed: z.coerce.number().int().optional(),
  }),
})

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>

let globalConfig: GlobalConfig | null = null

// Las env vars vacías cuentan como no definidas
function env(name: string): string | undefined {
  const value = process.env[name]
  return value === undefined || value === '' ? undefined : value
}

export function loadGlobalConfig(): GlobalConfig {
  if (globalConfig) {
    return globalConfig
  }

  try {
    const rawConfig = {
      server: {
        port: env('PORT'),
        host: env('HOST'),
      },
      logging: {
        level: env('LOG_LEVEL'),
      },
      database: {
        url: env('DATABASE_URL'),
        enabled: !!env('DATABASE_URL'), // Solo habilitar si hay connection string
        pool_max: env('DB_POOL_MAX'),
      },
      assignment: {
        random_seed: env('RANDOM_SEED'),
      },
    }

    globalConfig = GlobalConfigSchema.parse(rawConfig)
    logger.info({
      port: globalConfig.server.port,
      database: globalConfig.database.enabled,
      seeded: globalConfig.assignment.random_seed !== undefined,
    }, 'Global config loaded')

    return globalConfig
  } catch (error) {
    logger.error({ error }, 'Failed to load global config')
    throw error
  }
}
