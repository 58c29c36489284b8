import { QUANTIZATION_TOLERANCE } from "./constants";

/**
 * Numeric helpers for currency quantization and reporting.
 */

/**
 * Rounds a value to a fixed number of decimal places.
 *
 * @example
 * ```ts
 * roundTo(87.549, 1) // returns 87.5
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Converts an amount to integer currency units (e.g. cents for 2 decimals).
 * Returns null when the amount is not a whole number of units.
 *
 * @example
 * ```ts
 * toCurrencyUnits(19.99, 2) // returns 1999
 * toCurrencyUnits(19.999, 2) // returns null
 * ```
 */
export function toCurrencyUnits(amount: number, decimals: number): number | null {
  const scaled = amount * Math.pow(10, decimals);
  const units = Math.round(scaled);
  if (Math.abs(units - scaled) > QUANTIZATION_TOLERANCE) {
    return null;
  }
  return units;
}

/**
 * Number of whole currency units that fit within an amount (budget side, rounds down).
 */
export function floorCurrencyUnits(amount: number, decimals: number): number {
  return Math.floor(amount * Math.pow(10, decimals) + QUANTIZATION_TOLERANCE);
}

/**
 * Greatest common divisor of two non-negative integers; gcd(0, n) is n.
 *
 * @example
 * ```ts
 * greatestCommonDivisor(600000, 500000) // returns 100000
 * ```
 */
export function greatestCommonDivisor(a: number, b: number): number {
  let x = a;
  let y = b;
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Converts integer currency units back to an amount.
 */
export function fromCurrencyUnits(units: number, decimals: number): number {
  return units / Math.pow(10, decimals);
}

/**
 * Share of `part` in `whole` as a percentage with one decimal; 0 when whole is 0.
 *
 * @example
 * ```ts
 * percentageOf(350, 400) // returns 87.5
 * ```
 */
export function percentageOf(part: number, whole: number): number {
  if (whole <= 0) {
    return 0;
  }
  return roundTo((part / whole) * 100, 1);
}
