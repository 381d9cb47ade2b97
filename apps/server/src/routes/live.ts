import { Hono } from 'hono'
import { z } from 'zod'
import { sessionConfigSchema, type SessionConfigInput } from '@lunchbox/config'
import type { SessionHost } from '../lib/session-host'
import { isResponse, parseBody } from '../lib/validate'

const NO_SESSION = { error: 'No live session.' }

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Body fields win over `defaults`, which win over schema defaults. */
export function liveRoutes(host: SessionHost, defaults: SessionConfigInput = {}) {
  const live = new Hono()
  const startSchema = z.preprocess(
    (input) => (isPlainObject(input) ? { ...defaults, ...input } : input),
    sessionConfigSchema,
  )

  live.post('/start', async (c) => {
    const config = await parseBody(c, startSchema)
    if (isResponse(config)) return config

    if (!(await host.start(config))) {
      return c.json({ error: 'A live session is already running.' }, 409)
    }
    return c.json({ config }, 201)
  })

  live.get('/frame', (c) => {
    const frame = host.frame()
    if (frame === null) return c.json(NO_SESSION, 404)
    return c.json(frame)
  })

  live.post('/reset', (c) => {
    if (!host.reset()) return c.json(NO_SESSION, 404)
    return c.json({ reset: true })
  })

  live.post('/stop', async (c) => {
    if (!(await host.stop())) return c.json(NO_SESSION, 404)
    return c.json({ stopped: true })
  })

  return live
}
