import {
  BicycleFilters,
  BicycleRecord,
  isAvailable,
  matchesFilters,
} from "../models/BicycleRecord";
import { PreferenceWeights, assertValidWeights } from "../models/PreferenceWeights";
import { RecommendationScore, ScoredCandidate } from "../models/RecommendationScore";
import {
  EmptyCatalogReason,
  PlanningDiagnostics,
  PlanningResult,
  PurchaseOrderLine,
} from "../models/PurchasePlan";
import { EmptyCatalogError, NegativeBudgetError } from "../models/errors";
import { CatalogSnapshot, createCatalogSnapshot } from "../catalog/catalogSnapshot";
import { ScoreCombiner, scoreBicycles } from "../engine/scoring";
import { SelectorOptions, selectPurchases } from "../engine/selector";
import { percentageOf } from "../utils/math";

/**
 * Planning context containing all inputs for one purchase planning run.
 *
 * @property catalog - Catalog records; the planner works on its own frozen copy
 * @property weights - Buyer preference weights
 * @property budget - Spending ceiling (non-negative)
 * @property filters - Optional type, frame size and condition floor filters
 * @property options - Selector tuning (item cap, price quantum, table size limit)
 * @property combine - Optional replacement for the weighted-sum score formula
 */
export interface PlanningContext {
  catalog: readonly BicycleRecord[];
  weights: PreferenceWeights;
  budget: number;
  filters?: BicycleFilters;
  options?: SelectorOptions;
  combine?: ScoreCombiner;
}

/**
 * Outcome of applying status and buyer filters to the catalog.
 */
export interface EligibilityResult {
  eligible: Readonly<BicycleRecord>[];
  diagnostics: PlanningDiagnostics;
}

/**
 * Splits the catalog into eligible candidates and counts what was excluded.
 * Status is checked first, so a record that is both unavailable and filtered out
 * counts as excluded by status.
 */
export function filterEligible(catalog: CatalogSnapshot, filters: BicycleFilters = {}): EligibilityResult {
  let excludedByStatus = 0;
  let excludedByFilters = 0;
  const eligible: Readonly<BicycleRecord>[] = [];

  for (const record of catalog) {
    if (!isAvailable(record)) {
      excludedByStatus++;
    } else if (!matchesFilters(record, filters)) {
      excludedByFilters++;
    } else {
      eligible.push(record);
    }
  }

  return {
    eligible,
    diagnostics: {
      catalogSize: catalog.length,
      excludedByStatus,
      excludedByFilters,
      candidatesConsidered: eligible.length,
    },
  };
}

function getEmptyReason(diagnostics: PlanningDiagnostics): EmptyCatalogReason {
  if (diagnostics.catalogSize === 0) {
    return "no_catalog_data";
  }
  if (diagnostics.excludedByFilters > 0) {
    return "filters_excluded_all";
  }
  return "none_available";
}

const EMPTY_MESSAGES: Record<EmptyCatalogReason, string> = {
  no_catalog_data: "The catalog contains no bicycles",
  none_available: "No bicycle in the catalog is available",
  filters_excluded_all: "No available bicycle matches the requested filters",
};

/**
 * Purchase planner: filters the catalog, scores eligible bicycles and selects
 * the subset to buy within the budget.
 *
 * The planner never mutates the catalog; it copies it into a frozen snapshot
 * on construction, so later changes to the caller's array do not affect it.
 */
export class PurchasePlanner {
  private context: PlanningContext;
  private snapshot: CatalogSnapshot;

  constructor(context: PlanningContext) {
    this.context = context;
    this.snapshot = createCatalogSnapshot(context.catalog);
  }

  /**
   * Score every eligible bicycle without selecting a purchase.
   */
  score(): RecommendationScore[] {
    return this.rankEligible().scores;
  }

  /**
   * Run filter → score → select and assemble the planning result.
   */
  plan(): PlanningResult {
    const { budget, options } = this.context;
    if (!Number.isFinite(budget) || budget < 0) {
      throw new NegativeBudgetError(budget);
    }

    const { scores, eligible, diagnostics } = this.rankEligible();

    const recordsById = new Map<string, Readonly<BicycleRecord>>(eligible.map((record) => [record.id, record]));
    const orderLines = new Map<string, PurchaseOrderLine>();
    const candidates: ScoredCandidate[] = [];

    for (const score of scores) {
      const record = recordsById.get(score.bicycleId);
      if (!record) {
        continue;
      }
      candidates.push({
        bicycleId: record.id,
        price: record.price,
        rawScore: score.rawScore,
        rank: score.rank,
      });
      orderLines.set(record.id, {
        bicycleId: record.id,
        brand: record.brand,
        type: record.type,
        frameSize: record.frameSize,
        price: record.price,
        rawScore: score.rawScore,
        rank: score.rank,
      });
    }

    const plan = selectPurchases(candidates, budget, options);

    const purchaseOrder: PurchaseOrderLine[] = [];
    for (const bicycleId of plan.selectedIds) {
      const line = orderLines.get(bicycleId);
      if (line) {
        purchaseOrder.push(line);
      }
    }

    return {
      plan,
      purchaseOrder,
      scores,
      summary: {
        selectedCount: plan.selectedIds.length,
        budgetUtilizationPct: percentageOf(plan.totalCost, budget),
      },
      diagnostics: {
        ...diagnostics,
        strategy: plan.strategy,
      },
    };
  }

  private rankEligible(): EligibilityResult & { scores: RecommendationScore[] } {
    const { weights, filters, combine } = this.context;
    assertValidWeights(weights);

    const { eligible, diagnostics } = filterEligible(this.snapshot, filters);
    if (eligible.length === 0) {
      const emptyReason = getEmptyReason(diagnostics);
      throw new EmptyCatalogError(EMPTY_MESSAGES[emptyReason], { ...diagnostics, emptyReason });
    }

    return { eligible, diagnostics, scores: scoreBicycles(eligible, weights, { combine }) };
  }
}

/**
 * Convenience wrapper for a single planning run.
 */
export function planPurchases(context: PlanningContext): PlanningResult {
  return new PurchasePlanner(context).plan();
}
