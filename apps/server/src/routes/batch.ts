import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { Hono } from 'hono'
import { z } from 'zod'
import {
  countValidFlux,
  differenceSeries,
  estimateSoilRespirationCorrection,
  parseDatalogCsv,
  squareTopAreaM2,
  type FluxSeries,
} from '@lunchbox/gas-exchange'
import {
  batchConfigSchema,
  configReportOptions,
  configVolumeLitres,
  parseBatchConfig,
  type BatchConfig,
  type BatchConfigInput,
} from '@lunchbox/config'
import { findLatestFile } from '../sources/latest-file'
import { isResponse, parseBody } from '../lib/validate'

const batchRequestSchema = z.object({
  csv: z.string(),
  config: batchConfigSchema.default({}),
})

const soilCorrectionSchema = z.object({
  /** Reported A_net from a bare-pot run, µmol s⁻¹ */
  values: z.array(z.number().finite()).min(1),
  /** Elapsed minutes per value; enables skipping the settling time */
  elapsedMin: z.array(z.number().finite()).optional(),
  ignoreInitialMin: z.number().finite().nonnegative().optional(),
  potWidthCm: z.number().finite().positive(),
  potLengthCm: z.number().finite().positive(),
})

export interface BatchResult {
  series: FluxSeries
  /** Rows that carry a flux value */
  validFlux: number
  /** Data rows dropped while parsing */
  dropped: number
}

/** Parse a datalog and difference it. Configuration errors throw. */
export function processDatalog(csv: string, config: BatchConfig): BatchResult {
  const { samples, dropped } = parseDatalogCsv(csv)
  const series = differenceSeries(samples, {
    volumeLitres: configVolumeLitres(config),
    temperatureK: config.temperatureK,
    pressurePa: config.pressurePa,
    report: configReportOptions(config),
  })
  return { series, validFlux: countValidFlux(series), dropped }
}

export interface BatchRouteOptions {
  dataDir: string
  datalogPrefix: string
  /** Configuration for GET /latest */
  defaults?: BatchConfigInput
}

export function batchRoutes(options: BatchRouteOptions) {
  const batch = new Hono()

  batch.post('/', async (c) => {
    const body = await parseBody(c, batchRequestSchema)
    if (isResponse(body)) return body
    return c.json(processDatalog(body.csv, body.config))
  })

  batch.post('/soil-correction', async (c) => {
    const body = await parseBody(c, soilCorrectionSchema)
    if (isResponse(body)) return body
    const topAreaM2 = squareTopAreaM2(body.potWidthCm, body.potLengthCm)
    const estimate = estimateSoilRespirationCorrection(body.values, topAreaM2, {
      elapsedMin: body.elapsedMin,
      ignoreInitialMin: body.ignoreInitialMin,
    })
    return c.json({ topAreaM2, estimate })
  })

  batch.get('/latest', async (c) => {
    const path = await findLatestFile(options.dataDir, options.datalogPrefix)
    if (path === null) {
      return c.json(
        { error: `No ${options.datalogPrefix}*.csv datalog found.`, kind: 'SourceUnavailable' },
        404,
      )
    }

    const parsed = parseBatchConfig(options.defaults ?? {})
    if (!parsed.ok) {
      return c.json({ error: 'Invalid default configuration.', fields: parsed.fields }, 500)
    }

    const csv = await readFile(path, 'utf8')
    return c.json({ file: basename(path), ...processDatalog(csv, parsed.config) })
  })

  return batch
}
