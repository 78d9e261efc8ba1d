/**
 * Numeric helpers shared by the scoring, normalisation and valuation code.
 */

/**
 * Rounds a number to a given number of decimal places.
 *
 * @example
 * round(3.14159, 2) // returns 3.14
 * round(2.5, 0) // returns 3
 */
export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Rounds a number to 2 decimal places.
 *
 * @example
 * round2(2.567) // returns 2.57
 */
export function round2(value: number): number {
  return round(value, 2);
}

/**
 * Reads a provider value as a finite number.
 * Numbers and numeric strings pass; null, undefined, NaN, Infinity, blank
 * strings and everything else come back as null.
 *
 * @example
 * toFiniteNumber("12.5") // 12.5
 * toFiniteNumber(null) // null
 * toFiniteNumber(0) // 0
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Percent change from `from` to `to`; null when `from` is not positive. */
export function percentChange(from: number, to: number): number | null {
  if (from <= 0) return null;
  return ((to - from) / from) * 100;
}
