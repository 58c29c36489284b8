import { BicycleRecord, compareBicycleIds } from "../models/BicycleRecord";
import { PreferenceWeights, normalizeWeights } from "../models/PreferenceWeights";
import { RecommendationScore, ScoreFactors } from "../models/RecommendationScore";
import { EmptyCatalogError, InvalidOptionError, InvalidRecordError } from "../models/errors";
import { RANKING_DECIMALS } from "../utils/constants";
import { roundTo } from "../utils/math";

/**
 * Combines the factor values of one bicycle into a single score.
 * Receives weights already normalized to sum to 1.
 */
export type ScoreCombiner = (factors: ScoreFactors, weights: PreferenceWeights) => number;

export interface ScoringOptions {
  combine?: ScoreCombiner;
}

/**
 * Default combination: weighted sum of the three factors.
 */
export const weightedSum: ScoreCombiner = (factors, weights) =>
  weights.wCondition * factors.conditionScore +
  weights.wPopularity * factors.popularityScore +
  weights.wPriceEfficiency * factors.priceEfficiency;

/**
 * Price range of a set of records.
 */
export function getPriceRange(records: readonly BicycleRecord[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const record of records) {
    min = Math.min(min, record.price);
    max = Math.max(max, record.price);
  }
  return { min, max };
}

/**
 * Price efficiency: 1 for the cheapest bicycle, 0 for the most expensive,
 * linear in between. A zero-width range gives 1 for every bicycle.
 */
export function calculatePriceEfficiency(price: number, range: { min: number; max: number }): number {
  const width = range.max - range.min;
  if (width <= 0) {
    return 1;
  }
  return 1 - (price - range.min) / width;
}

function assertValidRecord(record: BicycleRecord, seen: Set<string>): void {
  if (seen.has(record.id)) {
    throw new InvalidRecordError(record.id, "duplicate identifier");
  }
  seen.add(record.id);

  if (!Number.isFinite(record.price) || record.price < 0) {
    throw new InvalidRecordError(record.id, `price must be non-negative, got ${record.price}`);
  }
  for (const field of ["conditionScore", "popularityScore"] as const) {
    const value = record[field];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new InvalidRecordError(record.id, `${field} must be within [0, 1], got ${value}`);
    }
  }
}

/**
 * Scores eligible bicycles and ranks them.
 *
 * Ranking order: rawScore descending, then lower price, then lower identifier.
 * Scores equal to RANKING_DECIMALS places count as tied.
 * The returned list is in rank order.
 */
export function scoreBicycles(
  records: readonly BicycleRecord[],
  weights: PreferenceWeights,
  options: ScoringOptions = {}
): RecommendationScore[] {
  if (records.length === 0) {
    throw new EmptyCatalogError("Cannot score an empty list of bicycles");
  }

  const normalized = normalizeWeights(weights);
  const combine = options.combine ?? weightedSum;

  const seen = new Set<string>();
  for (const record of records) {
    assertValidRecord(record, seen);
  }

  const range = getPriceRange(records);

  const scored = records.map((record) => {
    const factors: ScoreFactors = {
      conditionScore: record.conditionScore,
      popularityScore: record.popularityScore,
      priceEfficiency: calculatePriceEfficiency(record.price, range),
    };
    const rawScore = combine(factors, normalized);
    if (!Number.isFinite(rawScore)) {
      throw new InvalidOptionError("combine", `returned a non-finite score for bicycle ${record.id}`);
    }
    return { record, factors, rawScore, rankKey: roundTo(rawScore, RANKING_DECIMALS) };
  });

  scored.sort((a, b) => {
    if (a.rankKey !== b.rankKey) {
      return b.rankKey - a.rankKey;
    }
    if (a.record.price !== b.record.price) {
      return a.record.price - b.record.price;
    }
    return compareBicycleIds(a.record.id, b.record.id);
  });

  return scored.map(({ record, factors, rawScore }, index) => ({
    bicycleId: record.id,
    rawScore,
    rank: index + 1,
    ...factors,
  }));
}
