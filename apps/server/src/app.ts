import { Hono } from 'hono'
import { cors } from 'hono/cors'
import type { Co2Source, SessionLogger } from '@lunchbox/gas-exchange'
import type { SessionConfigInput } from '@lunchbox/config'
import { requestLogger } from './lib/request-logger'
import { securityHeaders } from './lib/security-headers'
import { toErrorReply } from './lib/errors'
import { SessionHost } from './lib/session-host'
import type { LineSink } from './lib/logger'
import { batchRoutes } from './routes/batch'
import { liveRoutes } from './routes/live'

export interface AppOptions {
  dataDir: string
  datalogPrefix: string
  openSource: () => Co2Source
  logger: SessionLogger
  /** Defaults beneath request bodies, e.g. from the environment */
  sessionDefaults?: SessionConfigInput
  corsOrigins?: string[]
  production?: boolean
  /** Destination of per-request log lines */
  requestSink?: LineSink
  now?: () => number
}

export function createApp(options: AppOptions) {
  const app = new Hono()
  const host = new SessionHost({ openSource: options.openSource, logger: options.logger, now: options.now })

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    const reply = toErrorReply(err)
    if (reply.status >= 500) {
      options.logger.error('request_failed', {
        method: c.req.method,
        path: c.req.path,
        error: err.message,
        stack: options.production ? undefined : err.stack,
      })
    }
    return c.json(reply.body, reply.status)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware stack (order matters)
  // ---------------------------------------------------------------------------

  app.use('*', requestLogger(options.requestSink))
  app.use(
    '*',
    cors({
      origin: options.corsOrigins ?? '*',
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )
  app.use('*', securityHeaders({ production: options.production ?? false }))

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.get('/health', (c) => c.json({ status: 'ok', session: host.summary() }))

  app.route(
    '/batch',
    batchRoutes({
      dataDir: options.dataDir,
      datalogPrefix: options.datalogPrefix,
      defaults: options.sessionDefaults,
    }),
  )
  app.route('/live', liveRoutes(host, options.sessionDefaults))

  app.get('/', (c) => c.json({ name: 'Lunchbox A_net API', version: '0.1.0' }))

  return { app, host }
}
