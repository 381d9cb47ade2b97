import { serve } from '@hono/node-server'
import { readEnvOverrides } from '@lunchbox/config'
import { env } from './lib/env'
import { createLogger } from './lib/logger'
import { CsvTailSource } from './sources/csv-tail'
import { createApp } from './app'

const logger = createLogger()

const { app, host } = createApp({
  dataDir: env.DATA_DIR,
  datalogPrefix: env.DATALOG_PREFIX,
  openSource: () => new CsvTailSource({ dir: env.DATA_DIR, prefix: env.DATALOG_PREFIX }),
  logger,
  sessionDefaults: readEnvOverrides(),
  corsOrigins: env.CORS_ORIGINS,
  production: env.NODE_ENV === 'production',
})

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logger.info('server_started', { port: info.port, env: env.NODE_ENV, dataDir: env.DATA_DIR })
})

function shutdown(signal: string) {
  logger.info('shutdown', { signal })

  void host
    .stop()
    .catch((err: unknown) => {
      logger.error('session_stop_failed', { error: err instanceof Error ? err.message : String(err) })
    })
    .finally(() => server.close(() => process.exit(0)))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
