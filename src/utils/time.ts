import { addDays, differenceInCalendarMonths, format, isValid, parse } from "date-fns";
import { CALENDAR_DATE_FORMAT, DAYS_PER_STEP } from "./constants";
import { InvalidParameterError } from "./errors";

/**
 * Calendar date utilities shared by history reconstruction and forecasts.
 * Dates travel through the engine as "YYYY-MM-DD" strings.
 */

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parses a "YYYY-MM-DD" calendar date into a local-midnight Date.
 *
 * @param value - Calendar date string
 * @returns Parsed date
 * @throws InvalidParameterError if the string is not a real calendar date
 */
export function parseCalendarDate(value: string): Date {
  const parsed = parse(value, CALENDAR_DATE_FORMAT, REFERENCE_DATE);
  if (!isValid(parsed) || format(parsed, CALENDAR_DATE_FORMAT) !== value) {
    throw new InvalidParameterError("date", `expected YYYY-MM-DD, got "${value}"`);
  }
  return parsed;
}

/**
 * Formats a Date as a "YYYY-MM-DD" calendar date.
 */
export function formatCalendarDate(date: Date): string {
  return format(date, CALENDAR_DATE_FORMAT);
}

/**
 * Whole calendar months between two dates, ignoring the day of month.
 * Equivalent to (yearDiff * 12) + monthDiff.
 *
 * @example
 * ```ts
 * monthsBetween(new Date(2024, 0, 31), new Date(2024, 1, 1)) // returns 1
 * ```
 */
export function monthsBetween(from: Date, to: Date): number {
  return differenceInCalendarMonths(to, from);
}

/**
 * Date of the k-th synthetic month after `from`, stepping 30 days per month.
 * This is an approximation kept identical for history and forecast axes.
 *
 * @param from - Anchor date
 * @param k - Number of steps (1-based for the first synthetic month)
 * @returns Calendar date string
 */
export function stepDate(from: Date, k: number): string {
  return formatCalendarDate(addDays(from, DAYS_PER_STEP * k));
}

/**
 * Date axis for a forecast of `months` points starting after `lastDate`.
 *
 * @param lastDate - Last historical date ("YYYY-MM-DD")
 * @param months - Number of forecast points
 * @returns Dates for steps 1..months
 */
export function forecastDates(lastDate: string, months: number): string[] {
  const anchor = parseCalendarDate(lastDate);
  const dates: string[] = [];
  for (let k = 1; k <= months; k++) {
    dates.push(stepDate(anchor, k));
  }
  return dates;
}

/**
 * Converts whole years to months.
 */
export function yearsToMonths(years: number): number {
  return years * 12;
}
