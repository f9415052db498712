/**
 * Shared constants for history reconstruction and forecasting.
 * Centralizing these keeps the history and forecast axes consistent.
 */

/** Assumed annual market growth between sparse deposit records (6%). */
export const DEFAULT_HISTORY_GROWTH_RATE = 0.06;

/** Days per synthetic month when stepping dates. Approximates a calendar month. */
export const DAYS_PER_STEP = 30;

/** Monthly contribution used when a forecast request omits one. */
export const DEFAULT_MONTHLY_CONTRIBUTION = 500;

/** Forecast horizon in years used when a request omits one. */
export const DEFAULT_FORECAST_YEARS = 10;

/** Longest forecast horizon accepted from callers (1200 monthly points). */
export const MAX_FORECAST_YEARS = 100;

/** Annual growth rates of the default forecast scenarios. */
export const DEFAULT_SCENARIO_RATES: readonly number[] = [0.0, 0.04, 0.08];

/** Calendar date format used for every date the engine reads or emits. */
export const CALENDAR_DATE_FORMAT = "yyyy-MM-dd";
