// ---------------------------------------------------------------------------
// Soil Respiration & Readout Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import { estimateSoilRespirationCorrection } from '../respiration/soil-correction.js';
import { formatAnet, formatCo2 } from '../readout.js';

describe('estimateSoilRespirationCorrection', () => {
  it('averages negative values per m² of soil', () => {
    const estimate = estimateSoilRespirationCorrection([-0.002, 0.01, -0.004, 0.003], 0.0025);
    expect(estimate!.used).toBe(2);
    expect(estimate!.rejected).toBe(0);
    // mean -0.003 / 0.0025
    expect(estimate!.correction).toBeCloseTo(-1.2, 12);
  });

  it('drops a low 3σ outlier', () => {
    const values = [...Array.from({ length: 19 }, () => -1), -100];
    const estimate = estimateSoilRespirationCorrection(values, 1);
    expect(estimate).toEqual({ correction: -1, used: 19, rejected: 1 });
  });

  it('keeps identical values', () => {
    expect(estimateSoilRespirationCorrection([-2, -2, -2], 2)).toEqual({ correction: -1, used: 3, rejected: 0 });
  });

  it('returns null without negative values', () => {
    expect(estimateSoilRespirationCorrection([0.1, 0.2], 1)).toBeNull();
  });

  it('skips values from the first half minute', () => {
    const estimate = estimateSoilRespirationCorrection([-9, -9, -1, -1], 1, {
      elapsedMin: [0.1, 0.5, 0.6, 0.7],
    });
    expect(estimate).toEqual({ correction: -1, used: 2, rejected: 0 });
  });

  it('takes a custom settling time', () => {
    const estimate = estimateSoilRespirationCorrection([-9, -1], 1, {
      elapsedMin: [0.1, 0.6],
      ignoreInitialMin: 0,
    });
    expect(estimate).toEqual({ correction: -5, used: 2, rejected: 0 });
  });

  it('returns null when every negative value falls in the settling time', () => {
    expect(estimateSoilRespirationCorrection([-1, 0.2], 1, { elapsedMin: [0.2, 1] })).toBeNull();
  });

  it('rejects elapsed times that do not match the values', () => {
    expect(() => estimateSoilRespirationCorrection([-1, -2], 1, { elapsedMin: [1] })).toThrow(
      'elapsedMin has 1 entries for 2 values',
    );
  });

  it('rejects a non-positive area', () => {
    expect(() => estimateSoilRespirationCorrection([-1], 0)).toThrow(/topAreaM2/);
  });
});

describe('readouts', () => {
  it('formats CO2 to the nearest ppm', () => {
    expect(formatCo2(null)).toBe('Waiting for CO2 data...');
    expect(formatCo2(411.6)).toBe('CO₂ = 412 ppm');
  });

  it('formats A_net with an explicit sign and units', () => {
    expect(formatAnet(1.234, true)).toBe('A_net = +1.23 μmol m⁻² s⁻¹');
    expect(formatAnet(-0.456, false)).toBe('A_net = -0.46 μmol box⁻¹ s⁻¹');
    expect(formatAnet(null, true)).toBe('');
  });
});
