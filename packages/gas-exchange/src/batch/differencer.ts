// ---------------------------------------------------------------------------
// Batch Differencer
// ---------------------------------------------------------------------------
// First differences over a logged concentration series:
//   Δt_i = t_i - t_{i-1}, ΔC_i = C_i - C_{i-1}, rate_i = ΔC_i / Δt_i
// Sample 0 has no predecessor and carries no flux.
// A bad interval nulls that sample only; the rest of the series survives.

import { GasExchangeError, isGasExchangeError } from '../errors.js';
import { netAssimilation, reportAnet, STANDARD_PRESSURE_PA } from '../flux/ideal-gas.js';
import type {
  AnetReportOptions,
  BatchFluxSample,
  FluxSeries,
  GasLawConditions,
  GasSample,
  SampleIssue,
} from '../types.js';

export interface DifferenceOptions extends GasLawConditions {
  report?: AnetReportOptions;
}

function parseTime(sample: GasSample): number | null {
  if (sample.time === undefined) return null;
  const parsed = Date.parse(sample.time.replace(' ', 'T'));
  return Number.isFinite(parsed) ? parsed / 1000 : null;
}

/** Human timestamps when every one parses, raw timestamps for all otherwise. */
function sortKeys(samples: readonly GasSample[]): number[] {
  const parsed: number[] = [];
  for (const sample of samples) {
    const key = parseTime(sample);
    if (key === null) return samples.map((s) => s.timestamp);
    parsed.push(key);
  }
  return parsed;
}

/**
 * Stable sort by time. The human timestamp orders the series only when it
 * parses on every row, so one clock orders the whole series.
 * Ties keep their input order.
 */
export function sortByTime(samples: readonly GasSample[]): GasSample[] {
  const keys = sortKeys(samples);
  return samples
    .map((sample, index) => ({ sample, index, key: keys[index] ?? sample.timestamp }))
    .sort((a, b) => a.key - b.key || a.index - b.index)
    .map(({ sample }) => sample);
}

function emptyRow(sample: GasSample, issue: SampleIssue | null): BatchFluxSample {
  return {
    ...sample,
    deltaSeconds: null,
    deltaPpm: null,
    ratePpmPerSecond: null,
    flux: null,
    anet: null,
    issue,
  };
}

function differenceOne(
  prev: GasSample,
  curr: GasSample,
  options: DifferenceOptions,
): BatchFluxSample {
  const deltaSeconds = curr.timestamp - prev.timestamp;
  const deltaPpm = curr.concentrationPpm - prev.concentrationPpm;

  try {
    if (!Number.isFinite(deltaSeconds) || !Number.isFinite(deltaPpm)) {
      throw new GasExchangeError('InvalidMeasurement', 'non-finite timestamp or concentration');
    }
    if (deltaSeconds <= 0) {
      throw new GasExchangeError('DegenerateInterval', `interval of ${deltaSeconds} s`);
    }

    const rate = deltaPpm / deltaSeconds;
    const flux = netAssimilation(
      rate,
      options.volumeLitres,
      options.temperatureK,
      options.pressurePa ?? STANDARD_PRESSURE_PA,
    );
    const anet = options.report ? reportAnet(flux, options.report) : -flux;

    return { ...curr, deltaSeconds, deltaPpm, ratePpmPerSecond: rate, flux, anet, issue: null };
  } catch (err) {
    if (isGasExchangeError(err, 'DegenerateInterval') || isGasExchangeError(err, 'InvalidMeasurement')) {
      return {
        ...emptyRow(curr, err.kind),
        deltaSeconds: Number.isFinite(deltaSeconds) ? deltaSeconds : null,
        deltaPpm: Number.isFinite(deltaPpm) ? deltaPpm : null,
      };
    }
    throw err;
  }
}

/**
 * Difference a concentration series into a flux series.
 * Output has the same length as the input, in time order.
 * Configuration errors (bad volume, temperature or leaf area) still throw.
 */
export function differenceSeries(samples: readonly GasSample[], options: DifferenceOptions): FluxSeries {
  const sorted = sortByTime(samples);
  const out: BatchFluxSample[] = [];

  for (let i = 0; i < sorted.length; i++) {
    const curr = sorted[i]!;
    if (i === 0) {
      out.push(emptyRow(curr, null));
      continue;
    }
    out.push(differenceOne(sorted[i - 1]!, curr, options));
  }

  return out;
}

/** Count of samples that carry a flux value. */
export function countValidFlux(series: FluxSeries): number {
  let n = 0;
  for (const row of series) if (row.flux !== null) n++;
  return n;
}
