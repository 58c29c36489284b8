import { compareBicycleIds } from "../models/BicycleRecord";
import { ScoredCandidate } from "../models/RecommendationScore";
import {
  ApproximatePurchasePlan,
  ExactPurchasePlan,
  GreedyFallbackReason,
  PurchasePlan,
} from "../models/PurchasePlan";
import { InvalidOptionError, InvalidRecordError, NegativeBudgetError } from "../models/errors";
import {
  DEFAULT_CURRENCY_DECIMALS,
  DEFAULT_MAX_DP_CELLS,
  MAX_CURRENCY_DECIMALS,
  SCORE_EPSILON,
} from "../utils/constants";
import { floorCurrencyUnits, fromCurrencyUnits, greatestCommonDivisor, roundTo, toCurrencyUnits } from "../utils/math";

/**
 * Selector options.
 *
 * @property maxItems - Upper bound on the number of bicycles bought
 * @property currencyDecimals - Price quantum for the exact selector (2 = cents)
 * @property maxDpCells - Largest knapsack table the exact selector will build
 */
export interface SelectorOptions {
  maxItems?: number;
  currencyDecimals?: number;
  maxDpCells?: number;
}

interface QuantizedCandidate extends ScoredCandidate {
  units: number;
}

function validateInputs(
  candidates: readonly ScoredCandidate[],
  budget: number,
  options: SelectorOptions
): void {
  if (!Number.isFinite(budget) || budget < 0) {
    throw new NegativeBudgetError(budget);
  }
  if (options.maxItems !== undefined && (!Number.isInteger(options.maxItems) || options.maxItems < 0)) {
    throw new InvalidOptionError("maxItems", "must be a non-negative integer");
  }
  if (
    options.currencyDecimals !== undefined &&
    (!Number.isInteger(options.currencyDecimals) ||
      options.currencyDecimals < 0 ||
      options.currencyDecimals > MAX_CURRENCY_DECIMALS)
  ) {
    throw new InvalidOptionError("currencyDecimals", `must be an integer between 0 and ${MAX_CURRENCY_DECIMALS}`);
  }
  if (options.maxDpCells !== undefined && (!Number.isInteger(options.maxDpCells) || options.maxDpCells <= 0)) {
    throw new InvalidOptionError("maxDpCells", "must be a positive integer");
  }

  const seen = new Set<string>();
  for (const candidate of candidates) {
    if (seen.has(candidate.bicycleId)) {
      throw new InvalidRecordError(candidate.bicycleId, "duplicate identifier");
    }
    seen.add(candidate.bicycleId);
    if (!Number.isFinite(candidate.price) || candidate.price < 0) {
      throw new InvalidRecordError(candidate.bicycleId, `price must be non-negative, got ${candidate.price}`);
    }
    if (!Number.isFinite(candidate.rawScore)) {
      throw new InvalidRecordError(candidate.bicycleId, "score must be a finite number");
    }
  }
}

function byPriceThenId(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.price !== b.price) {
    return a.price - b.price;
  }
  return compareBicycleIds(a.bicycleId, b.bicycleId);
}

function byRank(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.rank !== b.rank) {
    return a.rank - b.rank;
  }
  return compareBicycleIds(a.bicycleId, b.bicycleId);
}

function sumScores(items: readonly ScoredCandidate[]): number {
  return items.reduce((sum, item) => sum + item.rawScore, 0);
}

function exactPlan(
  selected: ScoredCandidate[],
  totalCost: number,
  budget: number,
  currencyDecimals: number
): ExactPurchasePlan {
  const ordered = [...selected].sort(byRank);
  return {
    strategy: "dynamic_programming",
    optimal: true,
    currencyDecimals,
    selectedIds: ordered.map((item) => item.bicycleId),
    budget,
    totalCost,
    totalScore: sumScores(ordered),
    budgetRemaining: roundTo(budget - totalCost, MAX_CURRENCY_DECIMALS),
  };
}

/**
 * Greedy fill by score per unit of price. Free bicycles come first;
 * ties go to the lower price, then the lower identifier.
 * Each bicycle that still fits is taken, so total score never decreases as the budget grows.
 */
export function selectGreedy(
  candidates: readonly ScoredCandidate[],
  budget: number,
  fallbackReason: GreedyFallbackReason,
  maxItems?: number
): ApproximatePurchasePlan {
  const ratio = (item: ScoredCandidate): number =>
    item.price === 0 ? Infinity : item.rawScore / item.price;

  const ordered = [...candidates].sort((a, b) => {
    const ra = ratio(a);
    const rb = ratio(b);
    if (ra !== rb) {
      return rb > ra ? 1 : -1;
    }
    return byPriceThenId(a, b);
  });

  const selected: ScoredCandidate[] = [];
  let totalCost = 0;
  for (const item of ordered) {
    if (maxItems !== undefined && selected.length >= maxItems) {
      break;
    }
    if (totalCost + item.price <= budget) {
      selected.push(item);
      totalCost += item.price;
    }
  }

  selected.sort(byRank);
  return {
    strategy: "greedy",
    optimal: false,
    fallbackReason,
    selectedIds: selected.map((item) => item.bicycleId),
    budget,
    totalCost,
    totalScore: sumScores(selected),
    budgetRemaining: roundTo(budget - totalCost, MAX_CURRENCY_DECIMALS),
  };
}

/**
 * Exact 0/1 knapsack over integer cost units.
 *
 * The table holds the best score for each (item count, exact cost) state; the count
 * dimension exists only when `limit` is set. Items are visited once each in
 * price/id order and replace an existing state only on a strictly better score,
 * so among equal-score subsets the cheaper and lower-id items win.
 */
function solveKnapsack(
  items: readonly QuantizedCandidate[],
  capacity: number,
  limit: number | null
): { selected: QuantizedCandidate[]; units: number } {
  const n = items.length;
  const layers = limit === null ? 1 : limit + 1;
  const width = capacity + 1;

  const best = new Float64Array(layers * width).fill(-Infinity);
  best[0] = 0;
  const taken = new Uint8Array(n * layers * width);

  items.forEach((item, i) => {
    for (let j = layers - 1; j >= 0; j--) {
      const from = limit === null ? j : j - 1;
      if (from < 0) {
        continue;
      }
      for (let c = capacity; c >= item.units; c--) {
        const previous = best[from * width + c - item.units];
        if (previous === -Infinity) {
          continue;
        }
        const candidate = previous + item.rawScore;
        if (candidate > best[j * width + c] + SCORE_EPSILON) {
          best[j * width + c] = candidate;
          taken[(i * layers + j) * width + c] = 1;
        }
      }
    }
  });

  // Best reachable state; lowest cost wins a tie, then fewest items
  let bestScore = -Infinity;
  let bestLayer = 0;
  let bestCost = 0;
  for (let c = 0; c <= capacity; c++) {
    for (let j = 0; j < layers; j++) {
      const value = best[j * width + c];
      if (value > bestScore + SCORE_EPSILON) {
        bestScore = value;
        bestLayer = j;
        bestCost = c;
      }
    }
  }

  const selected: QuantizedCandidate[] = [];
  let j = bestLayer;
  let c = bestCost;
  for (let i = n - 1; i >= 0; i--) {
    if (taken[(i * layers + j) * width + c] === 1) {
      selected.push(items[i]);
      c -= items[i].units;
      if (limit !== null) {
        j -= 1;
      }
    }
  }

  return { selected, units: bestCost };
}

/**
 * Chooses the bicycles to buy within the budget, maximizing total score.
 *
 * Uses the exact knapsack when every price is a whole number of currency units and
 * the table fits within `maxDpCells`; otherwise falls back to the greedy fill and
 * tags the plan with the reason. Bicycles with a non-positive score are never bought.
 */
export function selectPurchases(
  candidates: readonly ScoredCandidate[],
  budget: number,
  options: SelectorOptions = {}
): PurchasePlan {
  validateInputs(candidates, budget, options);

  const currencyDecimals = options.currencyDecimals ?? DEFAULT_CURRENCY_DECIMALS;
  const maxDpCells = options.maxDpCells ?? DEFAULT_MAX_DP_CELLS;
  const { maxItems } = options;

  if (budget === 0 || maxItems === 0) {
    return exactPlan([], 0, budget, currencyDecimals);
  }

  const affordable = candidates
    .filter((item) => item.price <= budget && item.rawScore > 0)
    .sort(byPriceThenId);

  if (affordable.length === 0) {
    return exactPlan([], 0, budget, currencyDecimals);
  }

  const quantized: QuantizedCandidate[] = [];
  for (const item of affordable) {
    const units = toCurrencyUnits(item.price, currencyDecimals);
    if (units === null) {
      return selectGreedy(affordable, budget, "unquantizable_prices", maxItems);
    }
    quantized.push({ ...item, units });
  }

  let budgetUnits = floorCurrencyUnits(budget, currencyDecimals);
  if (fromCurrencyUnits(budgetUnits, currencyDecimals) > budget) {
    budgetUnits -= 1;
  }
  const fitting = quantized.filter((item) => item.units <= budgetUnits);
  if (fitting.length === 0) {
    return exactPlan([], 0, budget, currencyDecimals);
  }

  // Whole-amount prices share a common factor; solve over multiples of it
  const step = fitting.reduce((divisor, item) => greatestCommonDivisor(divisor, item.units), 0) || 1;
  const scaled = fitting.map((item) => ({ ...item, units: item.units / step }));

  const totalUnits = scaled.reduce((sum, item) => sum + item.units, 0);
  const capacity = Math.min(Math.floor(budgetUnits / step), totalUnits);
  const limit = maxItems !== undefined && maxItems < scaled.length ? maxItems : null;
  const layers = limit === null ? 1 : limit + 1;

  if (scaled.length * layers * (capacity + 1) > maxDpCells) {
    return selectGreedy(fitting, budget, "state_space_too_large", maxItems);
  }

  const { selected, units } = solveKnapsack(scaled, capacity, limit);
  return exactPlan(selected, fromCurrencyUnits(units * step, currencyDecimals), budget, currencyDecimals);
}
