import { EmptyCatalogReason, PlanningDiagnostics } from "./PurchasePlan";

/**
 * Base class for every validation failure raised by the planner.
 * `status` is the HTTP status the API answers with.
 */
export class PlanningError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, message: string, status: number = 400) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export interface EmptyCatalogDetails extends PlanningDiagnostics {
  emptyReason: EmptyCatalogReason;
}

export class EmptyCatalogError extends PlanningError {
  readonly diagnostics: EmptyCatalogDetails | null;

  constructor(message: string = "No eligible bicycles to plan with", diagnostics: EmptyCatalogDetails | null = null) {
    super("EMPTY_CATALOG", message, 422);
    this.diagnostics = diagnostics;
  }
}

export class InvalidWeightError extends PlanningError {
  readonly weight: string;
  readonly value: number;

  constructor(weight: string, value: number) {
    super("INVALID_WEIGHT", `Weight ${weight} must be a non-negative number, got ${value}`);
    this.weight = weight;
    this.value = value;
  }
}

export class NegativeBudgetError extends PlanningError {
  readonly budget: number;

  constructor(budget: number) {
    super("NEGATIVE_BUDGET", `Budget must be a non-negative number, got ${budget}`);
    this.budget = budget;
  }
}

export class InvalidRecordError extends PlanningError {
  readonly bicycleId: string;

  constructor(bicycleId: string, reason: string) {
    super("INVALID_RECORD", `Bicycle ${bicycleId}: ${reason}`);
    this.bicycleId = bicycleId;
  }
}

export class InvalidOptionError extends PlanningError {
  constructor(option: string, reason: string) {
    super("INVALID_OPTION", `Option ${option} ${reason}`);
  }
}
