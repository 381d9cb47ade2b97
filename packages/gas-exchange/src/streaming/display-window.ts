// ---------------------------------------------------------------------------
// Display Windowing
// ---------------------------------------------------------------------------
// x: the last W minutes, anchored at 0 until W minutes have elapsed.
// y: band extremes with 10% headroom; spans under 1 get a fixed ±1 band
//    around the midpoint so a flat trace does not jitter. Lower bound is
//    floored at -10, upper bound is never clamped.

import type { DisplayWindow, FluxSample } from '../types.js';

export const DEFAULT_SPAN_MINUTES = 10;
export const Y_FLOOR = -10;
const MIN_Y_SPAN = 1;
const Y_PADDING = 0.1;

export function xRangeFor(latestElapsed: number, spanMinutes: number): [number, number] {
  const start = Math.max(0, latestElapsed - spanMinutes);
  return [start, start + spanMinutes];
}

export function yRangeFor(samples: readonly FluxSample[]): [number, number] | null {
  let lo = Infinity;
  let hi = -Infinity;

  for (const s of samples) {
    const lower = s.fluxLower ?? s.flux;
    const upper = s.fluxUpper ?? s.flux;
    if (lower !== null && Number.isFinite(lower)) lo = Math.min(lo, lower);
    if (upper !== null && Number.isFinite(upper)) hi = Math.max(hi, upper);
  }
  if (!Number.isFinite(lo) || !Number.isFinite(hi)) return null;

  const span = hi - lo;
  if (span < MIN_Y_SPAN) {
    const mid = (hi + lo) / 2;
    return [Math.max(Y_FLOOR, mid - 1), mid + 1];
  }

  const margin = span * Y_PADDING;
  return [Math.max(Y_FLOOR, lo - margin), hi + margin];
}

/**
 * Axis ranges and visible samples for a buffer snapshot.
 * Returns null when there is nothing to draw.
 */
export function computeDisplayWindow(
  snapshot: readonly FluxSample[],
  spanMinutes: number = DEFAULT_SPAN_MINUTES,
): DisplayWindow | null {
  if (snapshot.length === 0) return null;

  let latest = -Infinity;
  for (const s of snapshot) latest = Math.max(latest, s.elapsed);

  const xRange = xRangeFor(latest, spanMinutes);
  const samples = snapshot.filter((s) => s.elapsed >= xRange[0]);
  const yRange = yRangeFor(samples);
  if (yRange === null) return null;

  return { xRange, yRange, samples };
}
