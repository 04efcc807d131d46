/**
 * UTC timestamp with second precision, e.g. '2026-02-22T00:00:00Z'
 */
export function utcNowIso(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Round the exact binary value to a fixed number of decimal places.
 * Exact halfway cases (e.g. 0.0078125 to 6 places) go to the even neighbour.
 */
export function roundTo(value: number, decimals: number): number {
  const rounded = value.toFixed(decimals);
  if (!isExactTie(value, decimals) || Number(rounded.slice(-1)) % 2 === 0) {
    return Number(rounded);
  }
  // toFixed resolved the tie away from zero; step back to the even neighbour
  const step = 10 ** -decimals * Math.sign(value);
  return Number((Number(rounded) - step).toFixed(decimals));
}

/**
 * A double sits exactly halfway between two `decimals`-place numbers iff
 * value * 2^(decimals + 1) is an odd integer.
 */
function isExactTie(value: number, decimals: number): boolean {
  const scaled = value * 2 ** (decimals + 1);
  return Number.isInteger(scaled) && scaled % 2 !== 0;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null) {
    return JSON.stringify(error);
  }
  return String(error);
}
