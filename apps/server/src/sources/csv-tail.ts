import { readFile } from 'node:fs/promises'
import { GasExchangeError, lastDatalogSample, type Co2Source } from '@lunchbox/gas-exchange'
import { findLatestFile } from './latest-file'

export interface CsvTailOptions {
  dir: string
  prefix: string
}

/**
 * Reads the newest row of the newest datalog on every call, so a logger
 * appending to the file drives the live session.
 */
export class CsvTailSource implements Co2Source {
  private readonly options: CsvTailOptions

  constructor(options: CsvTailOptions) {
    this.options = options
  }

  async readCo2(): Promise<number> {
    const path = await findLatestFile(this.options.dir, this.options.prefix)
    if (path === null) {
      throw new GasExchangeError(
        'SourceUnavailable',
        `No ${this.options.prefix}*.csv datalog found in ${this.options.dir}`,
      )
    }

    const sample = lastDatalogSample(await readFile(path, 'utf8'))
    if (sample === null) {
      throw new GasExchangeError('AcquisitionFailure', `${path} has no data rows yet`)
    }
    return sample.concentrationPpm
  }
}
