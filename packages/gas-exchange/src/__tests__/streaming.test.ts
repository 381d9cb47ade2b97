// ---------------------------------------------------------------------------
// Live Buffer & Display Window Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { LiveBuffer, windowCapacity } from '../streaming/live-buffer.js';
import { computeDisplayWindow, xRangeFor, yRangeFor } from '../streaming/display-window.js';
import type { FluxSample } from '../types.js';

function sample(elapsed: number, flux: number, band?: [number, number]): FluxSample {
  return band ? { elapsed, flux, fluxLower: band[0], fluxUpper: band[1] } : { elapsed, flux };
}

describe('LiveBuffer', () => {
  it('derives capacity from window and interval', () => {
    expect(windowCapacity(10, 1)).toBe(600);
    expect(windowCapacity(10, 7)).toBe(85);
    expect(windowCapacity(0.001, 60)).toBe(1);
    expect(new LiveBuffer({ windowMinutes: 10, intervalSeconds: 10 }).capacity).toBe(60);
    expect(new LiveBuffer({ capacity: 3.9 }).capacity).toBe(3);
  });

  it('keeps the last capacity samples in order', () => {
    fc.assert(fc.property(
      fc.integer({ min: 1, max: 50 }),
      fc.integer({ min: 1, max: 50 }),
      (capacity, extra) => {
        const buffer = new LiveBuffer({ capacity });
        const total = capacity + extra;
        for (let i = 0; i < total; i++) buffer.append(sample(i, i));
        const elapsed = buffer.snapshot().map((s) => s.elapsed);
        const expected = Array.from({ length: capacity }, (_, i) => extra + i);
        return buffer.length === capacity && elapsed.join(',') === expected.join(',');
      },
    ));
  });

  it('does not evict below capacity', () => {
    const buffer = new LiveBuffer({ capacity: 5 });
    buffer.append(sample(0, 1));
    buffer.append(sample(1, 2));
    expect(buffer.snapshot().map((s) => s.flux)).toEqual([1, 2]);
    expect(buffer.latest()?.flux).toBe(2);
  });

  it('hands out frozen snapshots unaffected by later appends', () => {
    const buffer = new LiveBuffer({ capacity: 2 });
    buffer.append(sample(0, 1));
    const before = buffer.snapshot();
    buffer.append(sample(1, 2));
    buffer.append(sample(2, 3));

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.map((s) => s.flux)).toEqual([1]);
    expect(buffer.snapshot().map((s) => s.flux)).toEqual([2, 3]);
  });

  it('clears', () => {
    const buffer = new LiveBuffer({ capacity: 2 });
    buffer.append(sample(0, 1));
    buffer.clear();
    expect(buffer.length).toBe(0);
    expect(buffer.latest()).toBeUndefined();
    expect(buffer.snapshot()).toEqual([]);
  });
});

describe('Display windowing', () => {
  it('anchors the x range at zero until the span has elapsed', () => {
    expect(xRangeFor(3, 10)).toEqual([0, 10]);
    expect(xRangeFor(25, 10)).toEqual([15, 25]);
  });

  it('uses a ±1 band for a flat signal', () => {
    expect(yRangeFor([sample(0, 5), sample(1, 5), sample(2, 5)])).toEqual([4, 6]);
  });

  it('pads a wide band by 10%', () => {
    const range = yRangeFor([sample(0, 10, [0, 12]), sample(1, 15, [8, 20])]);
    expect(range![0]).toBeCloseTo(-2, 12);
    expect(range![1]).toBeCloseTo(22, 12);
  });

  it('floors the lower bound at -10 and leaves the upper bound free', () => {
    const range = yRangeFor([sample(0, -50), sample(1, 0)]);
    expect(range).toEqual([-10, 5]);
    expect(yRangeFor([sample(0, -9.8)])).toEqual([-10, -8.8]);
  });

  it('ignores null flux values', () => {
    expect(yRangeFor([{ elapsed: 0, flux: null }, sample(1, 5)])).toEqual([4, 6]);
    expect(yRangeFor([{ elapsed: 0, flux: null }])).toBeNull();
  });

  it('renders nothing for an empty buffer', () => {
    expect(computeDisplayWindow([], 10)).toBeNull();
  });

  it('keeps only samples inside the x range', () => {
    const snapshot = [sample(2, 100), sample(14, 1), sample(20, 3), sample(25, 2)];
    const window = computeDisplayWindow(snapshot, 10);
    expect(window!.xRange).toEqual([15, 25]);
    expect(window!.samples.map((s) => s.elapsed)).toEqual([20, 25]);
    // span of exactly 1 is padded, not banded
    expect(window!.yRange[0]).toBeCloseTo(1.9, 12);
    expect(window!.yRange[1]).toBeCloseTo(3.1, 12);
  });
});
