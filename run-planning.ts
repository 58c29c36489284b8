import * as fs from "fs";
import * as path from "path";
import { planPurchases } from "./src/planner/purchasePlanner";
import { PlanningError } from "./src/models/errors";
import { loadPlannerConfig } from "./src/utils/config";
import { PlanRequestSchema, formatIssues } from "./src/utils/validation";

/**
 * Run purchase planning for a request file and write the result as JSON.
 * Usage: node dist/run-planning.js [input-file] [output-file]
 * Default input: example-request.json, default output: plan-output.json
 */
const inputPath = process.argv[2] ?? "example-request.json";
const outputPath = process.argv[3] ?? "plan-output.json";

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

const parsed = PlanRequestSchema.safeParse(inputData);
if (!parsed.success) {
  console.error("Input file must contain catalog, weights and budget:");
  for (const issue of formatIssues(parsed.error)) {
    console.error(`  ${issue}`);
  }
  process.exit(1);
}

const config = loadPlannerConfig();
const { catalog, weights, budget, filters, options } = parsed.data;

console.log(`Planning purchases from ${catalog.length} catalog records with budget ${budget}...`);

try {
  const result = planPurchases({
    catalog,
    weights,
    budget,
    filters,
    options: { currencyDecimals: config.currencyDecimals, maxDpCells: config.maxDpCells, ...options },
  });

  fs.writeFileSync(outputPath, JSON.stringify(result, null, 2));
  console.log(
    `Selected ${result.summary.selectedCount} of ${result.diagnostics.candidatesConsidered} candidates ` +
      `(${result.plan.strategy}), total cost ${result.plan.totalCost}, ` +
      `budget used ${result.summary.budgetUtilizationPct}%`
  );
  console.log(`Plan saved to ${outputPath}`);
} catch (err) {
  if (err instanceof PlanningError) {
    console.error(`Planning failed (${err.code}): ${err.message}`);
  } else {
    console.error("Planning failed:", err);
  }
  process.exit(1);
}
