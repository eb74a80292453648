import 'dotenv/config'
import { createServer } from './server.js'
import { loadGlobalConfig } from './config/global.js'
import { logger } from './utils/logger.js'

async function main() {
  try {
    const config = loadGlobalConfig()
    const server = await createServer({ config })

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        logger.info({ signal }, 'Shutting down')
        server.close().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error({ error }, 'Error during shutdown')
            process.exit(1)
          }
        )
      })
    }

    await server.listen({ port: config.server.port, host: config.server.host })

    logger.info({ port: config.server.port }, 'Server started')
  } catch (error) {
    logger.error({ error }, 'Failed to start server')
    process.exit(1)
  }
}

void main()
