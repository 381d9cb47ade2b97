/**
 * Standard security headers on every response. HSTS only in production.
 */

import type { Context, Next } from 'hono'

export interface SecurityHeaderOptions {
  production: boolean
}

export function securityHeaders(options: SecurityHeaderOptions) {
  return async (c: Context, next: Next): Promise<void> => {
    await next()
    c.header('X-Content-Type-Options', 'nosniff')
    c.header('X-Frame-Options', 'DENY')
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin')
    if (options.production) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains')
    }
  }
}
