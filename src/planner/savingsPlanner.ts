import { DepositEntry } from "../models/DepositRecord";
import { BalancePoint, SavingsProjection } from "../models/SavingsProjection";
import { cumulative, reconstruct } from "../engine/reconstructor";
import { forecastScenarios } from "../engine/forecast";
import { DEFAULT_HISTORY_GROWTH_RATE, DEFAULT_SCENARIO_RATES } from "../utils/constants";
import { EmptyInputError } from "../utils/errors";

/**
 * Forecast parameters for a projection run.
 *
 * @property monthlyContribution - Amount added every month of the forecast
 * @property years - Forecast horizon in whole years
 * @property rates - Annual scenario rates as decimals (defaults to 0%, 4%, 8%)
 */
export interface ForecastInput {
  monthlyContribution: number;
  years: number;
  rates?: readonly number[];
}

/**
 * Planning context: one user's records, sorted ascending by date.
 */
interface PlanningContext {
  records: DepositEntry[];
  historyGrowthRate?: number;
}

/**
 * SavingsPlanner ties the reconstructor and forecast engine together for one
 * user's history. Every call recomputes from the records it was built with;
 * caching results is up to the caller.
 */
export class SavingsPlanner {
  private readonly records: DepositEntry[];
  private readonly historyGrowthRate: number;

  constructor(context: PlanningContext) {
    this.records = context.records;
    this.historyGrowthRate = context.historyGrowthRate ?? DEFAULT_HISTORY_GROWTH_RATE;
  }

  /**
   * Monthly balance curve with assumed growth between records.
   */
  reconstructHistory(): BalancePoint[] {
    return reconstruct(this.records, this.historyGrowthRate);
  }

  /**
   * Running total after each record.
   */
  cumulativeTotals(): number[] {
    return cumulative(this.records);
  }

  /**
   * Reconstruct history and forecast every scenario from the last known
   * balance and date.
   *
   * @throws EmptyInputError when there are no records to seed the forecast
   */
  project(input: ForecastInput): SavingsProjection {
    if (this.records.length === 0) {
      throw new EmptyInputError("Add deposit history to run forecast.");
    }

    const history = this.reconstructHistory();
    const totals = this.cumulativeTotals();
    const lastDate = this.records[this.records.length - 1].date;
    const lastBalance = totals[totals.length - 1];

    const scenarios = forecastScenarios(
      lastBalance,
      input.monthlyContribution,
      input.years,
      lastDate,
      input.rates ?? DEFAULT_SCENARIO_RATES
    );

    return {
      history,
      cumulative: totals,
      recordDates: this.records.map((record) => record.date),
      lastDate,
      lastBalance,
      years: input.years,
      monthlyContribution: input.monthlyContribution,
      scenarios,
    };
  }
}
