/**
 * Converts common numeric-like inputs into a number.
 *
 * - number => itself
 * - string => Number(trimmed, thousands separators removed) (blank or NaN => null)
 * - null/undefined/other => null
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim().replace(/,/g, '');
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Reads a case quantity. Blank means one unit; anything that is not a whole
 * number of at least one comes back as `valid: false` with the default.
 */
export function parseQuantity(value: unknown): { quantity: number; valid: boolean } {
  if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
    return { quantity: 1, valid: true };
  }
  const parsed = toNumber(value);
  if (parsed === null || !Number.isInteger(parsed) || parsed < 1) {
    return { quantity: 1, valid: false };
  }
  return { quantity: parsed, valid: true };
}

export function roundTo(value: number, digits = 1): number {
  return parseFloat(value.toFixed(digits));
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** Sample standard deviation (n - 1); null below two values. */
export function sampleStdDev(values: number[]): number | null {
  const avg = mean(values);
  if (avg === null || values.length < 2) return null;
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}
