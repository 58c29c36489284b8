import { BicycleType, FrameSize } from "./BicycleRecord";
import { RecommendationScore } from "./RecommendationScore";

/**
 * Purchase plan data structures
 */

export type SelectionStrategy = "dynamic_programming" | "greedy";

export type GreedyFallbackReason = "unquantizable_prices" | "state_space_too_large";

interface PurchasePlanBase {
  selectedIds: string[]; // ordered by rank
  budget: number;
  totalCost: number;
  totalScore: number;
  budgetRemaining: number;
}

export interface ExactPurchasePlan extends PurchasePlanBase {
  strategy: "dynamic_programming";
  optimal: true;
  currencyDecimals: number;
}

export interface ApproximatePurchasePlan extends PurchasePlanBase {
  strategy: "greedy";
  optimal: false;
  fallbackReason: GreedyFallbackReason;
}

export type PurchasePlan = ExactPurchasePlan | ApproximatePurchasePlan;

export interface PurchaseOrderLine {
  bicycleId: string;
  brand: string;
  type: BicycleType;
  frameSize: FrameSize;
  price: number;
  rawScore: number;
  rank: number;
}

export type EmptyCatalogReason = "no_catalog_data" | "none_available" | "filters_excluded_all";

export interface PlanningDiagnostics {
  catalogSize: number;
  excludedByStatus: number;
  excludedByFilters: number;
  candidatesConsidered: number;
}

export interface PlanningSummary {
  selectedCount: number;
  budgetUtilizationPct: number; // one decimal place
}

export interface PlanningResult {
  plan: PurchasePlan;
  purchaseOrder: PurchaseOrderLine[];
  scores: RecommendationScore[];
  summary: PlanningSummary;
  diagnostics: PlanningDiagnostics & { strategy: SelectionStrategy };
}
