/**
 * Deterministic rounding for freight figures
 *
 * Freight sums are accumulated as floats; every figure leaving the
 * reporting layer goes through these helpers so equal inputs print equal.
 */

const RUPEES_PER_LAKH = 100_000;

/**
 * Half-up rounding to a fixed number of decimals (2 by default)
 *
 * @example
 * ```typescript
 * round(294.305)     // 294.31
 * round(-2.555)      // -2.56
 * round(1234.5, 0)   // 1235
 * ```
 */
export function round(value: number, decimals = 2): number {
  if (!isFinite(value)) {
    return value;
  }

  const factor = 10 ** decimals;
  const magnitude = Math.round((Math.abs(value) + Number.EPSILON) * factor) / factor;

  // avoid -0 in reports
  if (magnitude === 0) {
    return 0;
  }
  return value < 0 ? -magnitude : magnitude;
}

/**
 * Rupees to lakhs, rounded to 2 decimals
 *
 * @example
 * ```typescript
 * toLakhs(2500000)  // 25
 * toLakhs(123456)   // 1.23
 * ```
 */
export function toLakhs(value: number): number {
  return round(value / RUPEES_PER_LAKH);
}

/**
 * Sum a list of figures and round once at the end
 */
export function sumRounded(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return round(total);
}
