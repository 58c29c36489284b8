import { z } from "zod";
import { BICYCLE_TYPES, LETTER_FRAME_SIZES } from "../models/BicycleRecord";
import { MAX_CURRENCY_DECIMALS } from "./constants";

/**
 * Zod validation schemas for input data validation.
 * These schemas guard every boundary where catalog or buyer data enters the planner.
 */

export const FrameSizeSchema = z.union([z.enum(LETTER_FRAME_SIZES), z.number().positive()]);

export const BicycleTypeSchema = z.enum(BICYCLE_TYPES);

/**
 * Schema for a single catalog entry. Scores are fractions in [0, 1].
 */
export const BicycleRecordSchema = z.object({
  id: z.string().min(1),
  brand: z.string(),
  frameSize: FrameSizeSchema,
  type: BicycleTypeSchema,
  price: z.number().min(0),
  conditionScore: z.number().min(0).max(1),
  popularityScore: z.number().min(0).max(1),
  availabilityStatus: z.enum(["AVAILABLE", "RENTED", "OUT_OF_SERVICE"]),
});

/**
 * Schema for a catalog snapshot. Identifiers must be unique.
 */
export const CatalogSchema = z.array(BicycleRecordSchema).superRefine((records, ctx) => {
  const seen = new Set<string>();
  records.forEach((record, index) => {
    if (seen.has(record.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "id"],
        message: `Duplicate bicycle id ${record.id}`,
      });
    }
    seen.add(record.id);
  });
});

/**
 * Schema for buyer preference weights. Weights need not sum to 1.
 * The sign is checked by the planner, which reports INVALID_WEIGHT.
 */
export const PreferenceWeightsSchema = z.object({
  wCondition: z.number().finite(),
  wPopularity: z.number().finite(),
  wPriceEfficiency: z.number().finite(),
});

export const BicycleFiltersSchema = z.object({
  types: z.array(BicycleTypeSchema).optional(),
  frameSizes: z.array(FrameSizeSchema).optional(),
  minCondition: z.number().min(0).max(1).optional(),
});

export const SelectorOptionsSchema = z.object({
  maxItems: z.number().int().min(0).optional(),
  currencyDecimals: z.number().int().min(0).max(MAX_CURRENCY_DECIMALS).optional(),
  maxDpCells: z.number().int().positive().optional(),
});

/**
 * Schema for a full planning request (API body and script input).
 */
export const PlanRequestSchema = z.object({
  catalog: CatalogSchema,
  weights: PreferenceWeightsSchema,
  // Negative budgets reach the planner, which reports NEGATIVE_BUDGET
  budget: z.number().finite(),
  filters: BicycleFiltersSchema.optional(),
  options: SelectorOptionsSchema.optional(),
});

export const ScoreRequestSchema = z.object({
  catalog: CatalogSchema,
  weights: PreferenceWeightsSchema,
  filters: BicycleFiltersSchema.optional(),
});

export type PlanRequest = z.infer<typeof PlanRequestSchema>;
export type ScoreRequest = z.infer<typeof ScoreRequestSchema>;

/**
 * Flattens zod issues into "path: message" strings for error responses.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
