import type { RegressionMethod } from '@lunchbox/gas-exchange'
import type { SessionConfigInput } from './session'

/** Environment variables that override session defaults. */
export const ENV_KEYS = {
  temperatureK: 'LUNCHBOX_TEMPERATURE_K',
  windowMinutes: 'LUNCHBOX_WINDOW_MINUTES',
  acquisitionIntervalS: 'LUNCHBOX_INTERVAL_S',
  areaBasis: 'LUNCHBOX_AREA_BASIS',
  leafAreaCm2: 'LUNCHBOX_LEAF_AREA_CM2',
  soilRespCorrection: 'LUNCHBOX_SOIL_RESP_CORRECTION',
  smoothing: 'LUNCHBOX_SMOOTHING',
  regression: 'LUNCHBOX_REGRESSION',
} as const

type Env = Record<string, string | undefined>

function readEnvFlag(env: Env, key: string): boolean | undefined {
  const val = env[key]
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return undefined
}

function readEnvNumber(env: Env, key: string): number | undefined {
  const val = env[key]
  if (val === undefined || val.trim() === '') return undefined
  const n = Number(val)
  if (!Number.isFinite(n)) {
    throw new Error(`Environment variable ${key} must be a number, got "${val}".`)
  }
  return n
}

function readEnvRegression(env: Env, key: string): RegressionMethod | undefined {
  const val = env[key]
  if (val === undefined || val.trim() === '') return undefined
  if (val === 'ols' || val === 'huber') return val
  throw new Error(`Environment variable ${key} must be "ols" or "huber", got "${val}".`)
}

/**
 * Session overrides taken from the environment. Unset variables are omitted
 * so schema defaults still apply.
 */
export function readEnvOverrides(env: Env = process.env): SessionConfigInput {
  const overrides: SessionConfigInput = {}

  const temperatureK = readEnvNumber(env, ENV_KEYS.temperatureK)
  if (temperatureK !== undefined) overrides.temperatureK = temperatureK
  const windowMinutes = readEnvNumber(env, ENV_KEYS.windowMinutes)
  if (windowMinutes !== undefined) overrides.windowMinutes = windowMinutes
  const interval = readEnvNumber(env, ENV_KEYS.acquisitionIntervalS)
  if (interval !== undefined) overrides.acquisitionIntervalS = interval
  const leafArea = readEnvNumber(env, ENV_KEYS.leafAreaCm2)
  if (leafArea !== undefined) overrides.leafAreaCm2 = leafArea
  const correction = readEnvNumber(env, ENV_KEYS.soilRespCorrection)
  if (correction !== undefined) overrides.soilRespCorrection = correction

  const areaBasis = readEnvFlag(env, ENV_KEYS.areaBasis)
  if (areaBasis !== undefined) overrides.areaBasis = areaBasis
  const smoothing = readEnvFlag(env, ENV_KEYS.smoothing)
  if (smoothing !== undefined) overrides.smoothing = smoothing
  const regression = readEnvRegression(env, ENV_KEYS.regression)
  if (regression !== undefined) overrides.regression = regression

  return overrides
}
