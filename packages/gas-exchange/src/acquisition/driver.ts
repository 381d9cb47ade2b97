// ---------------------------------------------------------------------------
// Acquisition drivers
// ---------------------------------------------------------------------------
// A driver turns one sensor reading per tick into a TickRecord. The
// regression driver keeps the last `windowSize` readings, optionally smooths
// them, fits a line (least squares or Huber) and converts slope ± 1.96·stderr
// through the gas law.

import { GasExchangeError, isGasExchangeError } from '../errors.js';
import { netAssimilation, reportAnetBand, STANDARD_PRESSURE_PA } from '../flux/ideal-gas.js';
import { smoothConcentrations } from '../filters/smoothing.js';
import { fitSlope, fitSlopeHuber, Z_95 } from '../regression/slope.js';
import { LiveBuffer } from '../streaming/live-buffer.js';
import type { AnetReportOptions, GasLawConditions, RegressionMethod, TickRecord } from '../types.js';

/** Per-tick producer consumed by a live session. Null means no data this tick. */
export interface AcquisitionDriver {
  read(): Promise<TickRecord | null>;
  close?(): Promise<void> | void;
}

/** One CO2 concentration reading (ppm) per call. */
export interface Co2Source {
  readCo2(): Promise<number>;
  close?(): Promise<void> | void;
}

export interface RegressionDriverOptions extends GasLawConditions {
  report: AnetReportOptions;
  /** Readings per regression window (default 41) */
  windowSize?: number;
  /** Seconds between readings, used as the smoothing sample rate */
  intervalSeconds?: number;
  smoothing?: boolean;
  /** Slope estimator (default 'ols') */
  regression?: RegressionMethod;
  /** Readings closer than this to the previous one count as unchanged (ppm) */
  stickyThreshold?: number;
  /** Milliseconds since epoch */
  now?: () => number;
  onReadError?: (err: unknown) => void;
}

interface Reading {
  timestamp: number;
  co2: number;
}

export const DEFAULT_REGRESSION_WINDOW = 41;

export class RegressionDriver implements AcquisitionDriver {
  private readonly source: Co2Source;
  private readonly options: RegressionDriverOptions;
  private readonly window: LiveBuffer<Reading>;
  private readonly now: () => number;
  private readonly startedAt: number;
  private lastCo2: number | null;

  constructor(source: Co2Source, options: RegressionDriverOptions) {
    this.source = source;
    this.options = options;
    this.window = new LiveBuffer<Reading>({ capacity: options.windowSize ?? DEFAULT_REGRESSION_WINDOW });
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.lastCo2 = null;

    // Fail at construction on a bad volume or temperature, not on the first full window
    netAssimilation(0, options.volumeLitres, options.temperatureK, options.pressurePa ?? STANDARD_PRESSURE_PA);
  }

  private async nextCo2(): Promise<number> {
    let co2: number;
    try {
      co2 = await this.source.readCo2();
      if (!Number.isFinite(co2)) {
        throw new GasExchangeError('InvalidMeasurement', `sensor returned ${co2}`);
      }
    } catch (err) {
      if (isGasExchangeError(err, 'SourceUnavailable')) throw err;
      this.options.onReadError?.(err);
      if (this.lastCo2 === null) {
        throw new GasExchangeError('AcquisitionFailure', 'CO2 read failed with no previous reading', { cause: err });
      }
      return this.lastCo2;
    }

    const threshold = this.options.stickyThreshold ?? 0.01;
    if (this.lastCo2 !== null && Math.abs(co2 - this.lastCo2) < threshold) {
      return this.lastCo2;
    }
    this.lastCo2 = co2;
    return co2;
  }

  async read(): Promise<TickRecord | null> {
    const co2 = await this.nextCo2();
    const nowMs = this.now();
    this.window.append({ timestamp: nowMs / 1000, co2 });

    if (this.window.length < this.window.capacity) return null;

    const readings = this.window.snapshot();
    const times = readings.map((r) => r.timestamp);
    let values: Float64Array = Float64Array.from(readings, (r) => r.co2);
    if (this.options.smoothing ?? true) {
      values = smoothConcentrations(values, this.options.intervalSeconds ?? 1);
    }

    const fit = this.options.regression === 'huber' ? fitSlopeHuber : fitSlope;
    const { slope, stderr } = fit(times, values);
    if (!Number.isFinite(slope)) return null;
    const se = Number.isFinite(stderr) ? stderr : 0;

    const pressure = this.options.pressurePa ?? STANDARD_PRESSURE_PA;
    const toFlux = (rate: number) =>
      netAssimilation(rate, this.options.volumeLitres, this.options.temperatureK, pressure);

    const band = reportAnetBand(
      toFlux(slope),
      toFlux(slope - Z_95 * se),
      toFlux(slope + Z_95 * se),
      this.options.report,
    );

    return {
      elapsedMin: (nowMs - this.startedAt) / 60000,
      co2,
      ...band,
    };
  }

  async close(): Promise<void> {
    this.window.clear();
    await this.source.close?.();
  }
}
