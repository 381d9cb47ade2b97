import type { Context } from 'hono'
import type { z } from 'zod'

/**
 * Parse and validate a JSON request body. An empty body counts as `{}` so
 * schemas with defaults can be posted bare. Returns a 400 response on failure.
 */
export async function parseBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): Promise<z.infer<T> | Response> {
  let body: unknown
  try {
    const text = await c.req.text()
    body = text.trim() === '' ? {} : JSON.parse(text)
  } catch {
    return c.json({ error: 'Invalid JSON body.' }, 400)
  }

  const result = schema.safeParse(body)
  if (!result.success) {
    const error: z.ZodError = result.error
    return c.json({ error: 'Validation failed.', fields: error.flatten().fieldErrors }, 400)
  }

  return result.data
}

/** Check if a parseBody result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
