import { z } from "zod";
import { isMatch } from "date-fns";
import { CALENDAR_DATE_FORMAT, MAX_FORECAST_YEARS } from "./constants";

/**
 * Zod validation schemas for deposit and forecast inputs.
 * Rates are decimals (e.g., 0.04 means 4%); amounts are in currency units.
 */

/**
 * Treats an empty string (a blank query value or env var) as absent, so that
 * optional and default values apply instead of coercing "" to 0.
 */
export function blankAsUndefined<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema);
}

/**
 * Forecast horizon in whole years, capped to keep a run to a bounded number of points.
 */
export const ForecastYearsSchema = z.number().int().min(1).max(MAX_FORECAST_YEARS);

/**
 * Calendar date in "YYYY-MM-DD" form that names a real day.
 */
export const CalendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date in YYYY-MM-DD format")
  .refine((value) => isMatch(value, CALENDAR_DATE_FORMAT), "Not a valid calendar date");

/**
 * Annual rate that can be compounded: strictly greater than -100%.
 */
export const AnnualRateSchema = z.number().gt(-1);

/**
 * Schema for a deposit entry as the engine reads it.
 */
export const DepositEntrySchema = z.object({
  date: CalendarDateSchema,
  amount: z.number().min(0),
  isTotal: z.boolean().default(false),
  currentTotal: z.number().min(0).nullable().optional(),
});

/**
 * Schema for a new deposit submitted through the entry form.
 * Amount defaults to 0 so a record may carry only a current total.
 */
export const NewDepositSchema = z.object({
  date: CalendarDateSchema,
  amount: z.number().min(0).default(0),
  currentTotal: z.number().min(0).nullable().optional(),
  isTotal: z.boolean().optional(),
});

/**
 * Schema for a forecast over a user's stored history.
 */
export const ForecastRequestSchema = z.object({
  monthlyContribution: z.number().min(0).optional(),
  years: ForecastYearsSchema.optional(),
  rates: z.array(AnnualRateSchema).min(1).optional(),
});

/**
 * Schema for a stateless single-rate forecast.
 */
export const StatelessForecastSchema = z.object({
  initial: z.number(),
  monthlyContribution: z.number().min(0),
  years: ForecastYearsSchema,
  annualRate: AnnualRateSchema,
});

/**
 * Schema for the history growth rate query parameter.
 */
export const GrowthRateQuerySchema = z.object({
  growthRate: blankAsUndefined(z.coerce.number().gt(-1).optional()),
});

export type NewDepositInput = z.infer<typeof NewDepositSchema>;
export type ForecastRequest = z.infer<typeof ForecastRequestSchema>;
