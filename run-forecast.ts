import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { SavingsPlanner } from "./src/planner/savingsPlanner";
import { loadConfig } from "./src/config";
import { DepositEntrySchema, ForecastYearsSchema } from "./src/utils/validation";
import { generateSavingsChartHTML } from "./src/utils/graphGenerator";

/**
 * Reconstruct a deposit history and forecast the default scenarios.
 * Writes forecast-output.json and forecast-chart.html to the project root.
 * Usage: npx ts-node run-forecast.ts [input-file]
 * Default input: example-deposits.json
 */
const InputSchema = z.object({
  deposits: z.array(DepositEntrySchema).min(1),
  monthlyContribution: z.number().min(0).optional(),
  years: ForecastYearsSchema.optional(),
  historyGrowthRate: z.number().gt(-1).optional(),
});

const inputPath = process.argv[2] ?? "example-deposits.json";

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

const parsed = InputSchema.safeParse(inputData);
if (!parsed.success) {
  console.error("Input file must contain a non-empty deposits array:");
  for (const issue of parsed.error.issues) {
    console.error(`  ${issue.path.join(".")}: ${issue.message}`);
  }
  process.exit(1);
}

const config = loadConfig();
const input = parsed.data;
const deposits = [...input.deposits].sort((a, b) => a.date.localeCompare(b.date));

const planner = new SavingsPlanner({
  records: deposits,
  historyGrowthRate: input.historyGrowthRate ?? config.historyGrowthRate,
});

const projection = planner.project({
  monthlyContribution: input.monthlyContribution ?? config.defaultMonthlyContribution,
  years: input.years ?? config.defaultForecastYears,
});

const rootDir = process.cwd();
const outputPath = path.join(rootDir, "forecast-output.json");
fs.writeFileSync(outputPath, JSON.stringify(projection, null, 2), "utf-8");
console.log(`Wrote ${outputPath}`);

generateSavingsChartHTML(projection, path.join(rootDir, "forecast-chart.html"));

console.log(`Forecasted savings after ${projection.years} years:`);
for (const scenario of projection.scenarios) {
  const last = scenario.series[scenario.series.length - 1];
  console.log(`  ${scenario.label}: ${last.value.toFixed(2)}`);
}
