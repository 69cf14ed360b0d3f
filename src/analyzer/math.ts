/** Round to 4 decimal places; every derived real in a report goes through this */
export function round4(value: number): number {
  return Number(value.toFixed(4));
}

/** Clamp into [0, 1]; non-finite values map to 0 */
export function toUnitInterval(value: number): number {
  return Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0;
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/** Mean of the values, 0 for an empty list */
export function average(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

/** Division that yields 0 instead of NaN/Infinity for an empty denominator */
export function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}
