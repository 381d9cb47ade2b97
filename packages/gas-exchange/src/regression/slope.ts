// ---------------------------------------------------------------------------
// Windowed linear regression
// ---------------------------------------------------------------------------
// Ordinary least squares of concentration on centred elapsed time:
//   slope  = Σ x·(y - ȳ) / Σ x²          (x centred, so Σx = 0)
//   stderr = √( (SSR/(n-2)) / (n · s²ₓ) ) with s²ₓ the sample variance
// The 95% band is slope ± 1.96·stderr.
//
// fitSlopeHuber swaps OLS for a Huber M-estimate by iteratively reweighted
// least squares, with the residual scale re-estimated from the MAD on every
// pass. Its stderr is the Huber H1 sandwich estimate.

import type { SlopeFit } from '../types.js';

export const Z_95 = 1.96;

/**
 * Elapsed seconds from the first timestamp, rounded to 10 ms and centred
 * on their mean.
 */
export function centredElapsed(timesSeconds: ArrayLike<number>): Float64Array {
  const n = timesSeconds.length;
  const out = new Float64Array(n);
  if (n === 0) return out;

  const t0 = timesSeconds[0]!;
  let mean = 0;
  for (let i = 0; i < n; i++) {
    out[i] = Math.round((timesSeconds[i]! - t0) * 100) / 100;
    mean += out[i]!;
  }
  mean /= n;
  for (let i = 0; i < n; i++) out[i] = out[i]! - mean;
  return out;
}

/**
 * Least-squares slope (value units per second) and its standard error.
 * Fewer than two distinct times give a NaN slope.
 */
export function fitSlope(timesSeconds: ArrayLike<number>, values: ArrayLike<number>): SlopeFit {
  const n = Math.min(timesSeconds.length, values.length);
  const x = centredElapsed(timesSeconds);

  let yMean = 0;
  for (let i = 0; i < n; i++) yMean += values[i]!;
  yMean /= n;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    sxx += x[i]! * x[i]!;
    sxy += x[i]! * (values[i]! - yMean);
  }
  if (n < 2 || sxx === 0) return { slope: NaN, stderr: NaN };

  const slope = sxy / sxx;
  if (n <= 2) return { slope, stderr: 0 };

  let ssr = 0;
  for (let i = 0; i < n; i++) {
    const fitted = yMean + slope * x[i]!;
    const r = values[i]! - fitted;
    ssr += r * r;
  }

  const residualVar = ssr / (n - 2);
  const xVar = sxx / (n - 1);
  return { slope, stderr: Math.sqrt(residualVar / (n * xVar)) };
}

// ---------------------------------------------------------------------------
// Huber M-estimate
// ---------------------------------------------------------------------------

/** Huber tuning constant: 95% efficiency under normal errors */
export const HUBER_T = 1.345;

const MAD_NORMAL = 0.6745;

export interface HuberOptions {
  /** Tuning constant (default 1.345) */
  t?: number;
  /** Iteration cap (default 50) */
  maxIterations?: number;
  /** Convergence tolerance on the objective (default 1e-8) */
  tolerance?: number;
}

function median(values: Float64Array): number {
  const sorted = Float64Array.from(values).sort();
  const mid = sorted.length >> 1;
  return sorted.length % 2 === 1 ? sorted[mid]! : (sorted[mid - 1]! + sorted[mid]!) / 2;
}

/** Normalised median absolute deviation about the median. */
function madScale(residuals: Float64Array): number {
  const centre = median(residuals);
  return median(residuals.map((r) => Math.abs(r - centre))) / MAD_NORMAL;
}

/** Weighted straight-line fit; weights default to 1. */
function weightedLine(
  x: Float64Array,
  y: ArrayLike<number>,
  weights: Float64Array | null,
): { intercept: number; slope: number; residuals: Float64Array } {
  const n = x.length;
  let sw = 0;
  let swx = 0;
  let swy = 0;
  let swxx = 0;
  let swxy = 0;
  for (let i = 0; i < n; i++) {
    const w = weights === null ? 1 : weights[i]!;
    sw += w;
    swx += w * x[i]!;
    swy += w * y[i]!;
    swxx += w * x[i]! * x[i]!;
    swxy += w * x[i]! * y[i]!;
  }
  const slope = (sw * swxy - swx * swy) / (sw * swxx - swx * swx);
  const intercept = (swy - slope * swx) / sw;
  const residuals = new Float64Array(n);
  for (let i = 0; i < n; i++) residuals[i] = y[i]! - intercept - slope * x[i]!;
  return { intercept, slope, residuals };
}

function huberObjective(residuals: Float64Array, scale: number, t: number): number {
  let total = 0;
  for (const r of residuals) {
    const z = Math.abs(r / scale);
    total += z <= t ? (z * z) / 2 : t * z - (t * t) / 2;
  }
  return total;
}

/**
 * Outlier-resistant slope: Huber M-estimate on centred elapsed time.
 * Falls back to the least-squares fit when the residual scale is zero.
 */
export function fitSlopeHuber(
  timesSeconds: ArrayLike<number>,
  values: ArrayLike<number>,
  options: HuberOptions = {},
): SlopeFit {
  const t = options.t ?? HUBER_T;
  const maxIterations = options.maxIterations ?? 50;
  const tolerance = options.tolerance ?? 1e-8;

  const ols = fitSlope(timesSeconds, values);
  const n = Math.min(timesSeconds.length, values.length);
  if (!Number.isFinite(ols.slope) || n <= 2) return ols;

  const x = centredElapsed(timesSeconds).subarray(0, n);
  let fit = weightedLine(x, values, null);
  let scale = madScale(fit.residuals);
  if (!(scale > 0)) return ols;

  let objective = huberObjective(fit.residuals, scale, t);
  const weights = new Float64Array(n);
  for (let iteration = 0; iteration < maxIterations; iteration++) {
    for (let i = 0; i < n; i++) {
      const z = Math.abs(fit.residuals[i]! / scale);
      weights[i] = z <= t ? 1 : t / z;
    }
    fit = weightedLine(x, values, weights);
    const nextScale = madScale(fit.residuals);
    if (!(nextScale > 0)) break;
    scale = nextScale;

    const next = huberObjective(fit.residuals, scale, t);
    const settled = Math.abs(next - objective) <= tolerance;
    objective = next;
    if (settled) break;
  }

  // H1: k² · Σψ²/(n-2) · scale² / mean(ψ')² · (XᵀX)⁻¹
  let psiSq = 0;
  let inlier = 0;
  let sxx = 0;
  for (let i = 0; i < n; i++) {
    const z = fit.residuals[i]! / scale;
    const psi = Math.max(-t, Math.min(t, z));
    psiSq += psi * psi;
    if (Math.abs(z) <= t) inlier++;
    sxx += x[i]! * x[i]!;
  }
  const m = inlier / n;
  if (m === 0) return { slope: fit.slope, stderr: NaN };
  const psiPrimeVar = m * (1 - m);
  const k = 1 + (2 / n) * (psiPrimeVar / (m * m));
  const variance = ((k * k * (psiSq / (n - 2)) * scale * scale) / (m * m)) / sxx;
  return { slope: fit.slope, stderr: Math.sqrt(variance) };
}
