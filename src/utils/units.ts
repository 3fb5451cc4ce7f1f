export const KMH_PER_KNOT = 1.852;

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function kmhToKnots(kmh: number): number {
  return roundTo(kmh / KMH_PER_KNOT, 1);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
