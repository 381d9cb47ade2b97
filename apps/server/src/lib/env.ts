/**
 * Environment variables, read once at startup.
 */

function optional(key: string, fallback: string): string {
  const val = process.env[key]
  return val === undefined || val === '' ? fallback : val
}

function port(key: string, fallback: string): number {
  const raw = optional(key, fallback)
  const n = Number(raw)
  if (!Number.isInteger(n) || n <= 0 || n > 65535) {
    throw new Error(`Invalid environment variable ${key}: "${raw}" is not a TCP port.`)
  }
  return n
}

export const env = {
  PORT: port('PORT', '4000'),
  NODE_ENV: optional('NODE_ENV', 'development'),
  /** Directory searched for datalog CSV files */
  DATA_DIR: optional('DATA_DIR', process.cwd()),
  DATALOG_PREFIX: optional('DATALOG_PREFIX', 'PAS_CO2_datalog_'),
  CORS_ORIGINS: optional('CORS_ORIGINS', 'http://localhost:3000').split(','),
} as const
