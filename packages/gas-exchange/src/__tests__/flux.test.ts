// ---------------------------------------------------------------------------
// Ideal-gas Flux Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { netAssimilation, reportAnet, reportAnetBand, NO_AREA_BASIS } from '../flux/ideal-gas.js';
import { GasExchangeError } from '../errors.js';

function errorKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof GasExchangeError ? err.kind : 'other';
  }
  return undefined;
}

describe('netAssimilation', () => {
  it('applies n = pV/RT to the concentration rate', () => {
    // 0.5 · 101325 · 0.001 / (8.314 · 295.15)
    expect(netAssimilation(0.5, 1.0, 295.15)).toBeCloseTo(0.0206459, 7);
  });

  it('is zero when the concentration does not change', () => {
    fc.assert(fc.property(
      fc.double({ min: 0.01, max: 100, noNaN: true }),
      fc.double({ min: 200, max: 350, noNaN: true }),
      (volume, temperature) => netAssimilation(0, volume, temperature) === 0,
    ));
  });

  it('is linear in the rate', () => {
    const one = netAssimilation(1, 2.5, 300);
    expect(netAssimilation(-3, 2.5, 300)).toBeCloseTo(-3 * one, 12);
  });

  it('honours explicit pressure and gas constant', () => {
    expect(netAssimilation(1, 1000, 1, 1, 1)).toBe(1);
  });

  it('rejects non-finite input as an invalid measurement', () => {
    expect(errorKind(() => netAssimilation(NaN, 1, 295))).toBe('InvalidMeasurement');
    expect(errorKind(() => netAssimilation(Infinity, 1, 295))).toBe('InvalidMeasurement');
  });

  it('rejects non-positive volume or temperature', () => {
    expect(errorKind(() => netAssimilation(1, 0, 295))).toBe('InvalidDimension');
    expect(errorKind(() => netAssimilation(1, 1, -5))).toBe('InvalidDimension');
  });
});

describe('reportAnet', () => {
  it('reports falling CO2 as positive uptake', () => {
    expect(reportAnet(-0.02, NO_AREA_BASIS)).toBeCloseTo(0.02, 12);
    expect(reportAnet(0.02, NO_AREA_BASIS)).toBeCloseTo(-0.02, 12);
  });

  it('divides by leaf area in m² on an area basis', () => {
    // 25 cm² = 0.0025 m²
    expect(reportAnet(-0.05, { areaBasis: true, leafAreaCm2: 25, soilRespCorrection: 0 })).toBeCloseTo(20, 9);
  });

  it('adds the soil respiration correction to negative values only', () => {
    const options = { areaBasis: false, leafAreaCm2: 1, soilRespCorrection: 0.5 };
    expect(reportAnet(0.02, options)).toBeCloseTo(0.48, 12);
    expect(reportAnet(-0.02, options)).toBeCloseTo(0.02, 12);
  });

  it('rejects a zero leaf area on an area basis', () => {
    expect(errorKind(() => reportAnet(1, { areaBasis: true, leafAreaCm2: 0, soilRespCorrection: 0 }))).toBe('InvalidDimension');
  });
});

describe('reportAnetBand', () => {
  it('orders the band after the sign flip', () => {
    const band = reportAnetBand(-0.02, -0.03, -0.01, NO_AREA_BASIS);
    expect(band.anet).toBeCloseTo(0.02, 12);
    expect(band.anetLower).toBeCloseTo(0.01, 12);
    expect(band.anetUpper).toBeCloseTo(0.03, 12);
  });

  it('shifts the whole band when the central value is corrected', () => {
    const band = reportAnetBand(0.2, 0.1, 0.3, { areaBasis: false, leafAreaCm2: 1, soilRespCorrection: 1 });
    expect(band.anet).toBeCloseTo(0.8, 12);
    expect(band.anetLower).toBeCloseTo(0.7, 12);
    expect(band.anetUpper).toBeCloseTo(0.9, 12);
  });
});
