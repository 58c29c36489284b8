/**
 * Shared constants for purchase planning.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** Prices and budgets are quantized to this many decimal places for the exact selector (2 = cents). */
export const DEFAULT_CURRENCY_DECIMALS = 2;

/** Upper bound on decimal places accepted for quantization. */
export const MAX_CURRENCY_DECIMALS = 6;

/** Knapsack tables larger than this many cells fall back to the greedy selector. */
export const DEFAULT_MAX_DP_CELLS = 5_000_000;

/** Score differences at or below this are treated as ties. */
export const SCORE_EPSILON = 1e-9;

/** Scores are rounded to this many decimal places before ranking. */
export const RANKING_DECIMALS = 9;

/** A price is quantizable when price × 10^decimals is within this of an integer. */
export const QUANTIZATION_TOLERANCE = 1e-6;

export const DEFAULT_PORT = 3000;
