import "dotenv/config";
import { z } from "zod";
import {
  DEFAULT_FORECAST_YEARS,
  DEFAULT_HISTORY_GROWTH_RATE,
  DEFAULT_MONTHLY_CONTRIBUTION,
  MAX_FORECAST_YEARS,
} from "./utils/constants";
import { blankAsUndefined } from "./utils/validation";

/**
 * Runtime configuration read from the environment (and .env when present).
 */
const EnvSchema = z.object({
  PORT: blankAsUndefined(z.coerce.number().int().positive().default(3000)),
  HISTORY_GROWTH_RATE: blankAsUndefined(
    z.coerce.number().gt(-1).default(DEFAULT_HISTORY_GROWTH_RATE)
  ),
  DEFAULT_MONTHLY_CONTRIBUTION: blankAsUndefined(
    z.coerce.number().min(0).default(DEFAULT_MONTHLY_CONTRIBUTION)
  ),
  DEFAULT_FORECAST_YEARS: blankAsUndefined(
    z.coerce.number().int().min(1).max(MAX_FORECAST_YEARS).default(DEFAULT_FORECAST_YEARS)
  ),
});

export interface AppConfig {
  port: number;
  historyGrowthRate: number;
  defaultMonthlyContribution: number;
  defaultForecastYears: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    historyGrowthRate: parsed.HISTORY_GROWTH_RATE,
    defaultMonthlyContribution: parsed.DEFAULT_MONTHLY_CONTRIBUTION,
    defaultForecastYears: parsed.DEFAULT_FORECAST_YEARS,
  };
}
