// ---------------------------------------------------------------------------
// Concentration smoothing chain
// ---------------------------------------------------------------------------
// median(5) → Savitzky-Golay(19, 2) → zero-phase Butterworth low-pass
// (order 5, 0.1 Hz). Spikes go first, then broadband noise, then whatever
// high-frequency ripple the polynomial fit leaves behind.

import { medianFilter } from './median.js';
import { savitzkyGolayFilter } from './savitzky-golay.js';
import { designButterworth, sosfiltfilt } from './butterworth.js';

export interface SmoothingConfig {
  medianKernel: number;
  sgWindow: number;
  sgOrder: number;
  lowpassOrder: number;
  /** Hz */
  lowpassCutoff: number;
}

export const DEFAULT_SMOOTHING: SmoothingConfig = {
  medianKernel: 5,
  sgWindow: 19,
  sgOrder: 2,
  lowpassOrder: 5,
  lowpassCutoff: 0.1,
};

/**
 * Smooth a window of concentration readings taken every `intervalSeconds`.
 * The low-pass stage is skipped when the cutoff is at or above Nyquist.
 */
export function smoothConcentrations(
  values: Float64Array,
  intervalSeconds: number,
  config: SmoothingConfig = DEFAULT_SMOOTHING,
): Float64Array {
  const despiked = medianFilter(values, config.medianKernel);
  const smooth = savitzkyGolayFilter(despiked, {
    windowLength: config.sgWindow,
    polyOrder: config.sgOrder,
  });

  const fs = 1 / intervalSeconds;
  if (config.lowpassCutoff >= fs / 2) return smooth;

  const sections = designButterworth({
    order: config.lowpassOrder,
    cutoff: config.lowpassCutoff,
    fs,
  });
  return sosfiltfilt(sections, smooth);
}
