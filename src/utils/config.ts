import { z } from "zod";
import {
  DEFAULT_CURRENCY_DECIMALS,
  DEFAULT_MAX_DP_CELLS,
  DEFAULT_PORT,
  MAX_CURRENCY_DECIMALS,
} from "./constants";

/**
 * Runtime configuration read from environment variables.
 */
export interface PlannerConfig {
  port: number;
  currencyDecimals: number;
  maxDpCells: number;
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  PLANNER_CURRENCY_DECIMALS: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_CURRENCY_DECIMALS)
    .default(DEFAULT_CURRENCY_DECIMALS),
  PLANNER_MAX_DP_CELLS: z.coerce.number().int().positive().default(DEFAULT_MAX_DP_CELLS),
});

/**
 * Parse configuration from the given environment (defaults to process.env).
 * Throws with every offending variable listed when a value is malformed.
 */
export function loadPlannerConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return {
    port: parsed.data.PORT,
    currencyDecimals: parsed.data.PLANNER_CURRENCY_DECIMALS,
    maxDpCells: parsed.data.PLANNER_MAX_DP_CELLS,
  };
}
