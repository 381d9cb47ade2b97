// ---------------------------------------------------------------------------
// Savitzky-Golay Filter
// ---------------------------------------------------------------------------
// Least-squares polynomial of order p over a window of 2m+1 samples.
// Interior points take the fit evaluated at the window centre. The first and
// last m points take the fit of the first (last) full window evaluated at
// their own position, so any trend of order ≤ p passes through unchanged,
// edges included.
//
// Weights for evaluating the fit at x = s:
//   M z = [1, s, s², …, sᵖ]ᵀ,   M_ij = Σₓ x^(i+j)   (x = -m..m)
//   w_x = Σ_j z_j · x^j

export interface SavitzkyGolayConfig {
  windowLength: number;
  polyOrder: number;
}

/** Solve a small dense system in place by elimination with partial pivoting. */
function solve(matrix: number[][], rhs: number[]): number[] {
  const n = rhs.length;
  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(matrix[r]![col]!) > Math.abs(matrix[pivot]![col]!)) pivot = r;
    }
    [matrix[col], matrix[pivot]] = [matrix[pivot]!, matrix[col]!];
    [rhs[col], rhs[pivot]] = [rhs[pivot]!, rhs[col]!];

    const row = matrix[col]!;
    for (let r = col + 1; r < n; r++) {
      const target = matrix[r]!;
      const f = target[col]! / row[col]!;
      for (let c = col; c < n; c++) target[c] = target[c]! - f * row[c]!;
      rhs[r] = rhs[r]! - f * rhs[col]!;
    }
  }

  const z = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    const row = matrix[r]!;
    let acc = rhs[r]!;
    for (let c = r + 1; c < n; c++) acc -= row[c]! * z[c]!;
    z[r] = acc / row[r]!;
  }
  return z;
}

/**
 * Convolution weights that evaluate the least-squares polynomial at `offset`
 * samples from the window centre.
 */
export function sgCoefficients(windowLength: number, polyOrder: number, offset: number = 0): Float64Array {
  if (windowLength % 2 === 0) throw new Error('windowLength must be odd');
  if (polyOrder >= windowLength) throw new Error('polyOrder must be less than windowLength');

  const m = (windowLength - 1) / 2;
  const terms = polyOrder + 1;

  const moments = new Array<number>(2 * polyOrder + 1).fill(0);
  for (let x = -m; x <= m; x++) {
    for (let k = 0; k < moments.length; k++) moments[k] = moments[k]! + x ** k;
  }
  const matrix = Array.from({ length: terms }, (_, i) =>
    Array.from({ length: terms }, (_, j) => moments[i + j]!),
  );
  const target = Array.from({ length: terms }, (_, j) => offset ** j);
  const z = solve(matrix, target);

  const weights = new Float64Array(windowLength);
  for (let x = -m; x <= m; x++) {
    let w = 0;
    for (let j = 0; j < terms; j++) w += z[j]! * x ** j;
    weights[x + m] = w;
  }
  return weights;
}

function applyAt(weights: Float64Array, signal: Float64Array, start: number): number {
  let acc = 0;
  for (let k = 0; k < weights.length; k++) acc += weights[k]! * signal[start + k]!;
  return acc;
}

/**
 * Smooth a signal. Signals shorter than the window are returned unchanged.
 */
export function savitzkyGolayFilter(signal: Float64Array, config: SavitzkyGolayConfig): Float64Array {
  const { windowLength, polyOrder } = config;
  const n = signal.length;
  if (n < windowLength) return new Float64Array(signal);

  const m = (windowLength - 1) / 2;
  const out = new Float64Array(n);

  const centre = sgCoefficients(windowLength, polyOrder);
  for (let i = m; i < n - m; i++) out[i] = applyAt(centre, signal, i - m);

  const tailStart = n - windowLength;
  for (let d = 1; d <= m; d++) {
    // head sample m-d sits d left of the first window's centre; tail mirrors it
    out[m - d] = applyAt(sgCoefficients(windowLength, polyOrder, -d), signal, 0);
    out[n - 1 - m + d] = applyAt(sgCoefficients(windowLength, polyOrder, d), signal, tailStart);
  }
  return out;
}
