/**
 * Recommendation score data structures
 */

/**
 * Per-bicycle inputs to the weighted score, each in [0, 1].
 */
export interface ScoreFactors {
  conditionScore: number;
  popularityScore: number;
  priceEfficiency: number;
}

export interface RecommendationScore extends ScoreFactors {
  bicycleId: string;
  rawScore: number;
  rank: number; // 1-based, unique within one scoring run
}

/**
 * A scored bicycle joined with its price, as consumed by the selector.
 */
export interface ScoredCandidate {
  bicycleId: string;
  price: number;
  rawScore: number;
  rank: number;
}
