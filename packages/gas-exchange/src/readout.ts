// Textual readouts shown beside the live plot.

export const AREA_UNITS = 'μmol m⁻² s⁻¹';
export const BOX_UNITS = 'μmol box⁻¹ s⁻¹';

export function formatCo2(co2: number | null): string {
  if (co2 === null || !Number.isFinite(co2)) return 'Waiting for CO2 data...';
  return `CO₂ = ${Math.round(co2)} ppm`;
}

/** Signed to two decimals, e.g. `A_net = +1.23 μmol m⁻² s⁻¹`. */
export function formatAnet(anet: number | null, areaBasis: boolean): string {
  if (anet === null || !Number.isFinite(anet)) return '';
  const sign = anet < 0 ? '-' : '+';
  return `A_net = ${sign}${Math.abs(anet).toFixed(2)} ${anetUnits(areaBasis)}`;
}

export function anetUnits(areaBasis: boolean): string {
  return areaBasis ? AREA_UNITS : BOX_UNITS;
}
