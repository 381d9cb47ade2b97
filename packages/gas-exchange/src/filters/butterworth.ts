// ---------------------------------------------------------------------------
// Butterworth Low-Pass
// ---------------------------------------------------------------------------
// Maximally flat passband, monotonic rolloff.
// IIR design via bilinear transform: s → 2·(z-1)/((z+1)·T)
// Second-order sections (SOS) in direct form II.
//
// Concentration traces sit near 400 ppm, so a filter started from rest rings
// for many samples. Zero-phase filtering here pads both ends by odd
// reflection and starts every section in steady state for the first input.

export interface ButterworthConfig {
  order: number;
  /** Cutoff frequency (Hz) */
  cutoff: number;
  /** Sampling frequency (Hz) */
  fs: number;
}

/** Second-order section: [b0, b1, b2, a0, a1, a2] */
export type SOSSection = [number, number, number, number, number, number];

/**
 * Pre-warp analog cutoff frequency for bilinear transform.
 * Ωₐ = 2·fs·tan(π·fc/fs)
 */
function prewarp(fc: number, fs: number): number {
  return 2 * fs * Math.tan((Math.PI * fc) / fs);
}

/**
 * Butterworth analog prototype poles on the unit circle:
 * θ_k = π(2k+N+1)/(2N) for k = 0,...,N-1
 */
function butterworthPoles(order: number): Array<{ re: number; im: number }> {
  const poles: Array<{ re: number; im: number }> = [];
  for (let k = 0; k < order; k++) {
    const theta = (Math.PI * (2 * k + order + 1)) / (2 * order);
    poles.push({ re: Math.cos(theta), im: Math.sin(theta) });
  }
  return poles;
}

/**
 * Map one conjugate pole pair to a unity-DC-gain low-pass biquad.
 */
function bilinearTransformSOS(poleRe: number, poleIm: number, prewarpedCutoff: number, fs: number): SOSSection {
  const sRe = poleRe * prewarpedCutoff;
  const sIm = poleIm * prewarpedCutoff;

  // z-pole = (2fs + s) / (2fs - s)
  const numRe = 2 * fs + sRe;
  const numIm = sIm;
  const denRe = 2 * fs - sRe;
  const denIm = -sIm;
  const denMag2 = denRe * denRe + denIm * denIm;
  const zRe = (numRe * denRe + numIm * denIm) / denMag2;
  const zIm = (numIm * denRe - numRe * denIm) / denMag2;

  const a1 = -2 * zRe;
  const a2 = zRe * zRe + zIm * zIm;

  // Zeros at z = -1: (1 + z⁻¹)², normalised to unit gain at DC
  const gain = (1 + a1 + a2) / 4;
  return [gain, 2 * gain, gain, 1, a1, a2];
}

/**
 * Design a Butterworth low-pass filter as a cascade of second-order sections.
 */
export function designButterworth(config: ButterworthConfig): SOSSection[] {
  const { order, cutoff, fs } = config;
  if (!(cutoff > 0 && cutoff < fs / 2)) {
    throw new Error(`cutoff must lie in (0, ${fs / 2}) Hz, got ${cutoff}`);
  }

  const sections: SOSSection[] = [];
  const poles = butterworthPoles(order);
  const omega = prewarp(cutoff, fs);

  for (let i = 0; i < Math.ceil(order / 2); i++) {
    const pole = poles[i]!;
    if (i < Math.floor(order / 2)) {
      sections.push(bilinearTransformSOS(pole.re, pole.im, omega, fs));
    } else {
      // Real pole (odd order)
      const sReal = pole.re * omega;
      const zReal = (2 * fs + sReal) / (2 * fs - sReal);
      const a1 = -zReal;
      const gainDC = (1 + a1) / 2;
      sections.push([gainDC, gainDC, 0, 1, a1, 0]);
    }
  }

  return sections;
}

/**
 * Apply SOS filter (direct form II), forward pass only.
 * With `initial`, the cascade starts in the steady state it would reach if
 * that value had been its input forever.
 */
export function sosfilt(sections: SOSSection[], signal: Float64Array, initial?: number): Float64Array {
  let output = new Float64Array(signal);
  let steadyInput = initial;

  for (const [b0, b1, b2, , a1, a2] of sections) {
    const x = output;
    const y = new Float64Array(x.length);
    let w1 = 0;
    let w2 = 0;
    if (steadyInput !== undefined) {
      w1 = steadyInput / (1 + a1 + a2);
      w2 = w1;
      steadyInput = (b0 + b1 + b2) * w1;
    }

    for (let n = 0; n < x.length; n++) {
      const w0 = x[n]! - a1 * w1 - a2 * w2;
      y[n] = b0 * w0 + b1 * w1 + b2 * w2;
      w2 = w1;
      w1 = w0;
    }
    output = y;
  }

  return output;
}

/** Pad length used for zero-phase filtering, as 3 × number of taps. */
export function filtfiltPadLength(sections: SOSSection[]): number {
  let taps = 2 * sections.length + 1;
  const firstOrder = sections.filter((s) => s[2] === 0 && s[5] === 0).length;
  taps -= firstOrder;
  return 3 * taps;
}

function oddExtend(signal: Float64Array, padLen: number): Float64Array {
  const N = signal.length;
  const out = new Float64Array(N + 2 * padLen);
  const first = signal[0]!;
  const last = signal[N - 1]!;
  for (let i = 0; i < padLen; i++) {
    out[i] = 2 * first - signal[padLen - i]!;
    out[padLen + N + i] = 2 * last - signal[N - 2 - i]!;
  }
  out.set(signal, padLen);
  return out;
}

function reverse(signal: Float64Array): Float64Array {
  const out = new Float64Array(signal.length);
  for (let i = 0; i < signal.length; i++) out[i] = signal[signal.length - 1 - i]!;
  return out;
}

/**
 * Zero-phase SOS filter: forward pass + backward pass.
 * Signals not longer than the pad length are returned unchanged.
 */
export function sosfiltfilt(sections: SOSSection[], signal: Float64Array): Float64Array {
  const padLen = filtfiltPadLength(sections);
  if (signal.length <= padLen) return new Float64Array(signal);

  const ext = oddExtend(signal, padLen);
  const forward = sosfilt(sections, ext, ext[0]!);
  const backwardIn = reverse(forward);
  const backward = reverse(sosfilt(sections, backwardIn, backwardIn[0]!));

  return backward.slice(padLen, padLen + signal.length);
}
