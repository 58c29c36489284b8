import { InvalidWeightError } from "./errors";

/**
 * Buyer preference weights. Each weight is non-negative; they need not sum to 1.
 */
export interface PreferenceWeights {
  wCondition: number;
  wPopularity: number;
  wPriceEfficiency: number;
}

export type WeightName = keyof PreferenceWeights;

const WEIGHT_NAMES: WeightName[] = ["wCondition", "wPopularity", "wPriceEfficiency"];

/**
 * Throws InvalidWeightError for the first negative or non-finite weight
 */
export function assertValidWeights(weights: PreferenceWeights): void {
  for (const name of WEIGHT_NAMES) {
    const value = weights[name];
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidWeightError(name, value);
    }
  }
}

/**
 * Scale weights so they sum to 1.
 * All-zero weights fall back to equal weighting across the three factors.
 */
export function normalizeWeights(weights: PreferenceWeights): PreferenceWeights {
  assertValidWeights(weights);

  const total = weights.wCondition + weights.wPopularity + weights.wPriceEfficiency;
  if (total === 0) {
    return { wCondition: 1 / 3, wPopularity: 1 / 3, wPriceEfficiency: 1 / 3 };
  }

  return {
    wCondition: weights.wCondition / total,
    wPopularity: weights.wPopularity / total,
    wPriceEfficiency: weights.wPriceEfficiency / total,
  };
}
