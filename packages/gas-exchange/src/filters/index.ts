export {
  designButterworth,
  sosfilt,
  sosfiltfilt,
  filtfiltPadLength,
  type ButterworthConfig,
  type SOSSection,
} from './butterworth.js';

export {
  sgCoefficients,
  savitzkyGolayFilter,
  type SavitzkyGolayConfig,
} from './savitzky-golay.js';

export { medianFilter } from './median.js';

export {
  smoothConcentrations,
  DEFAULT_SMOOTHING,
  type SmoothingConfig,
} from './smoothing.js';
