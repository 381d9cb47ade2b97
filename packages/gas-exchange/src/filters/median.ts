// ---------------------------------------------------------------------------
// Median Filter
// ---------------------------------------------------------------------------
// Removes single-reading spikes from NDIR concentration traces without
// smearing genuine steps. Samples past either end repeat the end sample, so
// a straight ramp passes through unchanged.

/**
 * Running median over an odd kernel.
 */
export function medianFilter(signal: Float64Array, kernelSize: number = 5): Float64Array {
  if (!Number.isInteger(kernelSize) || kernelSize < 1 || kernelSize % 2 === 0) {
    throw new Error(`kernelSize must be a positive odd integer, got ${kernelSize}`);
  }

  const n = signal.length;
  const out = new Float64Array(n);
  if (n === 0) return out;

  const half = (kernelSize - 1) / 2;
  const last = n - 1;
  const scratch = new Float64Array(kernelSize);

  for (let i = 0; i < n; i++) {
    for (let k = -half; k <= half; k++) {
      scratch[k + half] = signal[Math.min(last, Math.max(0, i + k))]!;
    }
    scratch.sort();
    out[i] = scratch[half]!;
  }
  return out;
}
