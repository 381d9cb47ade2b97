// ---------------------------------------------------------------------------
// Concentration Rate → Molar Flux
// ---------------------------------------------------------------------------
// Ideal gas law n = pV/RT applied to the rate of change:
//
//            dC/dt · p · V
//   flux = ---------------
//                R · T
//
//   dC/dt  ppm s⁻¹ (µmol mol⁻¹ s⁻¹)
//   p      Pa
//   V      m³
//   R      J mol⁻¹ K⁻¹
//   T      K
//
// Result is µmol s⁻¹ of CO2 entering the headspace (positive when rising).
// Reported A_net is uptake-positive: see reportAnet.

import { GasExchangeError } from '../errors.js';
import type { AnetReportOptions } from '../types.js';

export const STANDARD_PRESSURE_PA = 101325.0;
export const GAS_CONSTANT = 8.314;

/**
 * Headspace CO2 flux for a concentration rate of change.
 */
export function netAssimilation(
  deltaPpmPerS: number,
  volumeLitres: number,
  temperatureK: number,
  pressurePa: number = STANDARD_PRESSURE_PA,
  gasConstant: number = GAS_CONSTANT,
): number {
  for (const value of [deltaPpmPerS, volumeLitres, temperatureK, pressurePa, gasConstant]) {
    if (!Number.isFinite(value)) {
      throw new GasExchangeError('InvalidMeasurement', `non-finite gas-law input: ${value}`);
    }
  }
  if (volumeLitres <= 0) {
    throw new GasExchangeError('InvalidDimension', `volume must be positive, got ${volumeLitres}`);
  }
  if (temperatureK <= 0) {
    throw new GasExchangeError('InvalidDimension', `temperature must be positive, got ${temperatureK}`);
  }

  const volumeM3 = volumeLitres / 1000;
  return (deltaPpmPerS * pressurePa * volumeM3) / (gasConstant * temperatureK);
}

/**
 * Convert headspace flux into reported A_net.
 *
 * Falling CO2 is uptake, so the sign flips. Per-area values divide by the
 * leaf area in m². The soil respiration correction applies only to
 * negative (net-release) values.
 */
export function reportAnet(flux: number, options: AnetReportOptions): number {
  let anet = -flux;
  if (options.areaBasis) {
    if (!(options.leafAreaCm2 > 0)) {
      throw new GasExchangeError('InvalidDimension', `leaf area must be positive, got ${options.leafAreaCm2}`);
    }
    anet /= options.leafAreaCm2 / 10000;
  }
  if (anet < 0) anet += options.soilRespCorrection;
  return anet;
}

/**
 * Report a flux and its confidence bounds together.
 * The correction decision follows the central value so the band shifts with it.
 */
export function reportAnetBand(
  flux: number,
  fluxA: number,
  fluxB: number,
  options: AnetReportOptions,
): { anet: number; anetLower: number; anetUpper: number } {
  const plain = { ...options, soilRespCorrection: 0 };
  const anet = reportAnet(flux, plain);
  let a = reportAnet(fluxA, plain);
  let b = reportAnet(fluxB, plain);

  const shift = anet < 0 ? options.soilRespCorrection : 0;
  a += shift;
  b += shift;

  return {
    anet: anet + shift,
    anetLower: Math.min(a, b),
    anetUpper: Math.max(a, b),
  };
}

export const NO_AREA_BASIS: AnetReportOptions = {
  areaBasis: false,
  leafAreaCm2: 1,
  soilRespCorrection: 0,
};
