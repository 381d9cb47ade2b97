// ---------------------------------------------------------------------------
// @lunchbox/gas-exchange: Barrel Export
// ---------------------------------------------------------------------------
// CO2 concentration → net assimilation flux, batch and live.

export type {
  EnclosureShape,
  EnclosureGeometry,
  GasSample,
  SampleIssue,
  FluxSample,
  BatchFluxSample,
  FluxSeries,
  GasLawConditions,
  AnetReportOptions,
  LiveBufferConfig,
  DisplayWindow,
  TickRecord,
  SlopeFit,
  RegressionMethod,
} from './types.js';

export {
  GasExchangeError,
  isGasExchangeError,
  type GasExchangeErrorKind,
} from './errors.js';

// Geometry
export {
  rectangularVolumeLitres,
  frustumVolumeLitres,
  enclosureVolumeLitres,
  netVolumeLitres,
  headspaceVolumeLitres,
  squareTopAreaM2,
} from './geometry/volume.js';

// Flux
export {
  netAssimilation,
  reportAnet,
  reportAnetBand,
  NO_AREA_BASIS,
  STANDARD_PRESSURE_PA,
  GAS_CONSTANT,
} from './flux/ideal-gas.js';

// Batch
export {
  differenceSeries,
  sortByTime,
  countValidFlux,
  type DifferenceOptions,
} from './batch/differencer.js';
export {
  parseDatalogCsv,
  lastDatalogSample,
  type DatalogParseResult,
} from './batch/datalog-csv.js';

// Streaming
export { LiveBuffer, windowCapacity } from './streaming/live-buffer.js';
export {
  computeDisplayWindow,
  xRangeFor,
  yRangeFor,
  DEFAULT_SPAN_MINUTES,
  Y_FLOOR,
} from './streaming/display-window.js';

// Smoothing & regression
export * from './filters/index.js';
export {
  fitSlope,
  fitSlopeHuber,
  centredElapsed,
  Z_95,
  HUBER_T,
  type HuberOptions,
} from './regression/slope.js';

// Acquisition & session
export {
  RegressionDriver,
  DEFAULT_REGRESSION_WINDOW,
  type AcquisitionDriver,
  type Co2Source,
  type RegressionDriverOptions,
} from './acquisition/driver.js';
export {
  LiveSession,
  type LiveSessionOptions,
  type SessionState,
  type LiveFrame,
  type SessionLogger,
} from './session/live-session.js';

// Soil respiration
export {
  estimateSoilRespirationCorrection,
  IGNORE_INITIAL_MIN,
  type SoilRespirationEstimate,
  type SoilRespirationOptions,
} from './respiration/soil-correction.js';

// Readouts
export { formatCo2, formatAnet, anetUnits, AREA_UNITS, BOX_UNITS } from './readout.js';
