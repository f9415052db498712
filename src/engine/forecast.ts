import { ForecastScenario, scenarioLabel } from "../models/SavingsProjection";
import { DEFAULT_SCENARIO_RATES } from "../utils/constants";
import { InvalidParameterError } from "../utils/errors";
import { annualToMonthlyReturn, assertValidAnnualRate, compoundMonth } from "../utils/math";
import { forecastDates, yearsToMonths } from "../utils/time";

/**
 * Validate forecast inputs shared by a single run and a scenario set.
 */
function assertForecastInputs(initial: number, monthlyContribution: number, years: number): void {
  if (!Number.isFinite(initial)) {
    throw new InvalidParameterError("initial", `expected a finite number, got ${initial}`);
  }
  if (!Number.isFinite(monthlyContribution) || monthlyContribution < 0) {
    throw new InvalidParameterError(
      "monthlyContribution",
      `must be a non-negative number, got ${monthlyContribution}`
    );
  }
  if (!Number.isInteger(years) || years < 1) {
    throw new InvalidParameterError("years", `must be an integer of at least 1, got ${years}`);
  }
}

/**
 * Project a balance month by month at a fixed annual rate.
 * Each month applies growth first, then adds the contribution.
 *
 * @param initial - Starting balance (not included in the output)
 * @param monthlyContribution - Amount added at the end of every month
 * @param years - Horizon in whole years
 * @param annualRate - Annual growth as a decimal
 * @returns `years * 12` end-of-month balances
 */
export function forecast(
  initial: number,
  monthlyContribution: number,
  years: number,
  annualRate: number
): number[] {
  assertForecastInputs(initial, monthlyContribution, years);
  const monthlyRate = annualToMonthlyReturn(annualRate);

  const values: number[] = [];
  let value = initial;
  for (let month = 1; month <= yearsToMonths(years); month++) {
    value = compoundMonth(value, monthlyRate, monthlyContribution);
    values.push(value);
  }
  return values;
}

/**
 * Run one forecast per rate from the same seed and align each series to the
 * 30-day date axis that follows the last historical date.
 */
export function forecastScenarios(
  initial: number,
  monthlyContribution: number,
  years: number,
  lastDate: string,
  rates: readonly number[] = DEFAULT_SCENARIO_RATES
): ForecastScenario[] {
  assertForecastInputs(initial, monthlyContribution, years);
  rates.forEach((rate, i) => assertValidAnnualRate(rate, `rates[${i}]`));

  const dates = forecastDates(lastDate, yearsToMonths(years));

  return rates.map((annualRate) => {
    const values = forecast(initial, monthlyContribution, years, annualRate);
    return {
      label: scenarioLabel(annualRate),
      annualRate,
      series: values.map((value, k) => ({ date: dates[k], value })),
    };
  });
}
