// Readings only count when they're actual numbers; numeric strings are not coerced.
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
