import { z } from 'zod'
import {
  headspaceVolumeLitres,
  type AnetReportOptions,
  type EnclosureGeometry,
} from '@lunchbox/gas-exchange'

const positive = z.number().finite().positive()

export const geometrySchema = z.object({
  shape: z.enum(['rectangular', 'frustum']),
  /** rectangular: width, height, length. frustum: top width, base width, height */
  dimensionsCm: z.tuple([positive, positive, positive]),
})

/** Reference pot: 5.0 cm top, 3.4 cm base, 5.3 cm tall */
export const REFERENCE_POT: EnclosureGeometry = { shape: 'frustum', dimensionsCm: [5.0, 3.4, 5.3] }

export const batchConfigSchema = z.object({
  /** 17.5 × 5 × 12 cm lunchbox */
  enclosure: geometrySchema.default({ shape: 'rectangular', dimensionsCm: [17.5, 5, 12] }),
  pot: geometrySchema.optional(),
  temperatureK: positive.default(295.15),
  pressurePa: positive.default(101325),
  areaBasis: z.boolean().default(false),
  leafAreaCm2: positive.default(25),
  /** µmol m⁻² s⁻¹ (or per box), added to negative A_net */
  soilRespCorrection: z.number().finite().default(0),
})

export const sessionConfigSchema = batchConfigSchema.extend({
  windowMinutes: positive.default(10),
  acquisitionIntervalS: positive.default(1),
  displaySpanMinutes: positive.optional(),
  regressionWindow: z.number().int().min(3).default(41),
  smoothing: z.boolean().default(true),
  /** 'huber' down-weights outlying readings in the window fit */
  regression: z.enum(['ols', 'huber']).default('ols'),
})

export type BatchConfig = z.infer<typeof batchConfigSchema>
export type BatchConfigInput = z.input<typeof batchConfigSchema>
export type SessionConfig = z.infer<typeof sessionConfigSchema>
export type SessionConfigInput = z.input<typeof sessionConfigSchema>

export type ConfigParseResult<T> =
  | { ok: true; config: T }
  | { ok: false; fields: Record<string, string[] | undefined> }

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): ConfigParseResult<T> {
  const result = schema.safeParse(input ?? {})
  if (!result.success) {
    const error: z.ZodError = result.error
    return { ok: false, fields: error.flatten().fieldErrors }
  }
  return { ok: true, config: result.data }
}

export function parseSessionConfig(input: unknown): ConfigParseResult<SessionConfig> {
  return parseWith(sessionConfigSchema, input)
}

export function parseBatchConfig(input: unknown): ConfigParseResult<BatchConfig> {
  return parseWith(batchConfigSchema, input)
}

/**
 * Headspace volume for a configuration.
 * Throws InvalidDimension / NegativeVolume from the geometry layer.
 */
export function configVolumeLitres(config: BatchConfig): number {
  return headspaceVolumeLitres(config.enclosure, config.pot)
}

export function configReportOptions(config: BatchConfig): AnetReportOptions {
  return {
    areaBasis: config.areaBasis,
    leafAreaCm2: config.leafAreaCm2,
    soilRespCorrection: config.soilRespCorrection,
  }
}
