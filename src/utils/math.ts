import { InvalidParameterError } from "./errors";

/**
 * Financial calculation utilities for balance reconstruction and forecasts.
 * All calculations use monthly compounding periods.
 */

/**
 * Checks that an annual rate can be compounded: finite and greater than -100%.
 * A rate at or below -1 makes (1 + rate) non-positive, which has no real
 * fractional power.
 *
 * @param annualRate - Annual rate as a decimal (e.g., 0.06 for 6%)
 * @param parameter - Name reported in the error
 */
export function assertValidAnnualRate(annualRate: number, parameter = "annualRate"): void {
  if (!Number.isFinite(annualRate)) {
    throw new InvalidParameterError(parameter, `expected a finite number, got ${annualRate}`);
  }
  if (annualRate <= -1) {
    throw new InvalidParameterError(parameter, `must be greater than -1, got ${annualRate}`);
  }
}

/**
 * Converts an annual return to the compound-equivalent monthly return, so that
 * twelve monthly compoundings reproduce the annual return exactly.
 * Formula: r_m = (1 + r_a)^(1/12) - 1
 *
 * @param annualReturn - Annual return as a decimal (e.g., 0.06 for 6%)
 * @returns Monthly return as a decimal
 *
 * @example
 * ```ts
 * annualToMonthlyReturn(0.12) // returns ~0.009489 (not 0.01)
 * ```
 */
export function annualToMonthlyReturn(annualReturn: number): number {
  assertValidAnnualRate(annualReturn);
  return Math.pow(1 + annualReturn, 1 / 12) - 1;
}

/**
 * Advances a balance by one month: growth first, then the contribution.
 * The contribution does not earn growth until the following month.
 *
 * @param value - Balance at the start of the month
 * @param monthlyReturn - Monthly return rate as a decimal
 * @param contribution - Amount added at the end of the month
 * @returns Balance at the end of the month
 */
export function compoundMonth(
  value: number,
  monthlyReturn: number,
  contribution: number = 0
): number {
  return value * (1 + monthlyReturn) + contribution;
}

/**
 * Calculates the future value of a single sum with compound interest.
 * Formula: FV = PV × (1 + r)^n
 *
 * @param presentValue - Starting balance
 * @param monthlyReturn - Monthly return rate as a decimal
 * @param periods - Number of monthly periods
 * @returns Future value of the balance
 */
export function futureValue(
  presentValue: number,
  monthlyReturn: number,
  periods: number
): number {
  return presentValue * Math.pow(1 + monthlyReturn, periods);
}

/**
 * Rounds a currency amount to whole cents for display.
 *
 * @example
 * ```ts
 * roundCurrency(1234.5678) // returns 1234.57
 * ```
 */
export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}
