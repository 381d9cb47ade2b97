// ---------------------------------------------------------------------------
// @lunchbox/gas-exchange: Shared Types
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

export type EnclosureShape = 'rectangular' | 'frustum';

/**
 * Physical enclosure or pot dimensions.
 * rectangular: [width, height, length]; frustum: [topWidth, baseWidth, height].
 */
export interface EnclosureGeometry {
  shape: EnclosureShape;
  dimensionsCm: readonly [number, number, number];
}

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

/** One raw concentration reading. */
export interface GasSample {
  /** Raw timestamp in seconds (used for deltas) */
  readonly timestamp: number;
  readonly concentrationPpm: number;
  /** Human timestamp as logged, e.g. `2025-07-19 18:36:01` */
  readonly time?: string;
}

/** Per-sample failure recorded instead of a flux value. */
export type SampleIssue = 'InvalidMeasurement' | 'DegenerateInterval';

/** One point of a live flux trace. */
export interface FluxSample {
  /** Elapsed time (minutes in live mode) */
  readonly elapsed: number;
  readonly concentrationPpm?: number;
  readonly flux: number | null;
  readonly fluxLower?: number;
  readonly fluxUpper?: number;
}

/** One row of a differenced batch series. */
export interface BatchFluxSample extends GasSample {
  readonly deltaSeconds: number | null;
  readonly deltaPpm: number | null;
  readonly ratePpmPerSecond: number | null;
  /** Headspace flux (µmol s⁻¹, positive when CO2 rises) */
  readonly flux: number | null;
  /** Reported A_net (uptake positive) */
  readonly anet: number | null;
  readonly issue: SampleIssue | null;
}

export type FluxSeries = readonly BatchFluxSample[];

// ---------------------------------------------------------------------------
// Flux reporting
// ---------------------------------------------------------------------------

export interface GasLawConditions {
  volumeLitres: number;
  temperatureK: number;
  /** Default 101325 Pa */
  pressurePa?: number;
}

export interface AnetReportOptions {
  /** Divide by leaf area to report µmol m⁻² s⁻¹ */
  areaBasis: boolean;
  leafAreaCm2: number;
  /** Added to reported A_net when it is negative */
  soilRespCorrection: number;
}

// ---------------------------------------------------------------------------
// Live display
// ---------------------------------------------------------------------------

export interface LiveBufferConfig {
  /** Explicit capacity; takes precedence over the window/interval pair */
  capacity?: number;
  windowMinutes?: number;
  intervalSeconds?: number;
}

export interface DisplayWindow {
  xRange: [number, number];
  yRange: [number, number];
  /** Samples whose elapsed time falls inside xRange */
  samples: readonly FluxSample[];
}

// ---------------------------------------------------------------------------
// Acquisition
// ---------------------------------------------------------------------------

/** Output of one acquisition tick. */
export interface TickRecord {
  elapsedMin: number;
  co2: number;
  anet: number;
  anetLower: number;
  anetUpper: number;
}

/** Least squares, or the outlier-resistant Huber fit */
export type RegressionMethod = 'ols' | 'huber';

export interface SlopeFit {
  /** ppm s⁻¹ */
  slope: number;
  stderr: number;
}
