// ---------------------------------------------------------------------------
// Enclosure Geometry
// ---------------------------------------------------------------------------
// Box volume: V = w·h·l
// Pot volume (conical frustum, width as effective diameter proxy):
//   V = (h/3)·(a² + a·b + b²)
// 1 L = 1000 cm³

import { GasExchangeError } from '../errors.js';
import type { EnclosureGeometry } from '../types.js';

function assertPositive(values: Record<string, number>): void {
  for (const [name, value] of Object.entries(values)) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new GasExchangeError('InvalidDimension', `${name} must be a positive number, got ${value}`);
    }
  }
}

/**
 * Volume of a rectangular box in litres.
 */
export function rectangularVolumeLitres(widthCm: number, heightCm: number, lengthCm: number): number {
  assertPositive({ widthCm, heightCm, lengthCm });
  return (widthCm * heightCm * lengthCm) / 1000;
}

/**
 * Volume of a pot with sloping sides in litres.
 */
export function frustumVolumeLitres(topWidthCm: number, baseWidthCm: number, heightCm: number): number {
  assertPositive({ topWidthCm, baseWidthCm, heightCm });
  const a = topWidthCm;
  const b = baseWidthCm;
  return ((heightCm / 3) * (a * a + a * b + b * b)) / 1000;
}

export function enclosureVolumeLitres(geometry: EnclosureGeometry): number {
  const [d0, d1, d2] = geometry.dimensionsCm;
  switch (geometry.shape) {
    case 'rectangular':
      return rectangularVolumeLitres(d0, d1, d2);
    case 'frustum':
      return frustumVolumeLitres(d0, d1, d2);
  }
}

/**
 * Headspace left once a pot occupies part of the enclosure.
 * A pot at least as large as the enclosure is a configuration error.
 */
export function netVolumeLitres(enclosureLitres: number, potLitres: number): number {
  const net = enclosureLitres - potLitres;
  if (!(net > 0)) {
    throw new GasExchangeError(
      'NegativeVolume',
      `pot volume (${potLitres} L) leaves no headspace in a ${enclosureLitres} L enclosure`,
    );
  }
  return net;
}

/** Headspace volume for an enclosure with an optional pot inside it. */
export function headspaceVolumeLitres(enclosure: EnclosureGeometry, pot?: EnclosureGeometry): number {
  const enclosureLitres = enclosureVolumeLitres(enclosure);
  return pot ? netVolumeLitres(enclosureLitres, enclosureVolumeLitres(pot)) : enclosureLitres;
}

/** Exposed soil area of a square-topped pot, m². */
export function squareTopAreaM2(widthCm: number, lengthCm: number): number {
  assertPositive({ widthCm, lengthCm });
  return (widthCm / 100) * (lengthCm / 100);
}
