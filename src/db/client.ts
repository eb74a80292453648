import { logger } from '../utils/logger.js'
import * as schema from './schema.js'

import postgres from 'postgres'
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js'

export type Database = PostgresJsDatabase<typeof schema>

let db: Database | null = null
let client: postgres.Sql | null = null

/**
 * Inicializa la conexión a la base de datos
 */
export function initDatabase(connectionString: string, poolSize = 10): void {
  if (db) {
    logger.warn('Database already initialized')
    return
  }

  try {
    // postgres-js maneja el pooling automáticamente
    client = postgres(connectionString, {
      max: poolSize,
      onnotice: () => {}, // silenciar NOTICE de CREATE ... IF NOT EXISTS
    })

    db = drizzle(client, { schema })

    logger.info({ poolSize }, 'Database connection initialized')
  } catch (error) {
    logger.error({ error }, 'Failed to initialize database connection')
    throw error
  }
}

/**
 * Obtiene el cliente de la base de datos
 * @throws Error si la DB no está inicializada
 */
export function getDatabase(): Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.')
  }
  return db
}

export async function closeDatabase(): Promise<void> {
  if (client) {
    await client.end()
    client = null
    db = null
    logger.info('Database connection closed')
  }
}

/**
 * Verifica que la conexión a la DB funcione
 */
export async function healthCheck(): Promise<boolean> {
  if (!client) {
    return false
  }

  try {
    const result = await client`SELECT 1`
    return result.length > 0
  } catch (error) {
    logger.error({ error }, 'Database health check failed')
    return false
  }
}
