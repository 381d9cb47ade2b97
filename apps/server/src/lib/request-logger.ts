/**
 * One JSON line per request: timestamp, method, path, status, duration.
 */

import type { Context, Next } from 'hono'
import type { LineSink } from './logger'

export function requestLogger(sink: LineSink = process.stdout) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    const ms = (performance.now() - start).toFixed(1)

    const entry = {
      ts: new Date().toISOString(),
      level: 'info',
      event: 'request',
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Number(ms),
    }

    sink.write(JSON.stringify(entry) + '\n')
  }
}
