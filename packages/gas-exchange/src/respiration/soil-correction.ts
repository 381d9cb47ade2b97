// ---------------------------------------------------------------------------
// Soil respiration correction
// ---------------------------------------------------------------------------
// Run with a bare pot (no plant): every negative reported value is soil
// respiration. Skip the first half minute while the lid seal settles, drop
// the low 3σ tail, average the rest and normalise by the exposed soil area to
// get a µmol m⁻² s⁻¹ offset for later runs.

import { GasExchangeError } from '../errors.js';

export interface SoilRespirationEstimate {
  /** µmol m⁻² s⁻¹ (negative) */
  correction: number;
  /** Negative values considered */
  used: number;
  /** Negative values dropped as outliers */
  rejected: number;
}

/** Minutes at the start of a run that never count */
export const IGNORE_INITIAL_MIN = 0.5;

export interface SoilRespirationOptions {
  /** Elapsed minutes for each value. Without them no value is skipped. */
  elapsedMin?: readonly number[];
  /** Values at or before this many minutes are skipped (default 0.5) */
  ignoreInitialMin?: number;
}

/**
 * Estimate the correction from reported (uptake-positive) values in µmol s⁻¹.
 * Returns null when no value is negative.
 */
export function estimateSoilRespirationCorrection(
  valuesUmolPerS: readonly number[],
  topAreaM2: number,
  options: SoilRespirationOptions = {},
): SoilRespirationEstimate | null {
  if (!(topAreaM2 > 0)) {
    throw new GasExchangeError('InvalidDimension', `topAreaM2 must be positive, got ${topAreaM2}`);
  }
  const { elapsedMin, ignoreInitialMin = IGNORE_INITIAL_MIN } = options;
  if (elapsedMin !== undefined && elapsedMin.length !== valuesUmolPerS.length) {
    throw new GasExchangeError(
      'InvalidDimension',
      `elapsedMin has ${elapsedMin.length} entries for ${valuesUmolPerS.length} values`,
    );
  }

  const settled =
    elapsedMin === undefined
      ? valuesUmolPerS
      : valuesUmolPerS.filter((_, i) => (elapsedMin[i] ?? 0) > ignoreInitialMin);
  const negative = settled.filter((v) => Number.isFinite(v) && v < 0);
  if (negative.length === 0) return null;

  const mean = negative.reduce((a, b) => a + b, 0) / negative.length;
  const variance = negative.reduce((a, v) => a + (v - mean) ** 2, 0) / negative.length;
  const cutoff = mean - 3 * Math.sqrt(variance);

  const kept = negative.filter((v) => v >= cutoff);
  const keptMean = kept.reduce((a, b) => a + b, 0) / kept.length;

  return {
    correction: keptMean / topAreaM2,
    used: kept.length,
    rejected: negative.length - kept.length,
  };
}
