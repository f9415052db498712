/**
 * Reconstruction and forecast output structures
 */

export interface BalancePoint {
  date: string; // YYYY-MM-DD
  value: number;
}

export interface ForecastScenario {
  label: string; // e.g. "4% Growth"
  annualRate: number; // decimal
  series: BalancePoint[];
}

export interface SavingsProjection {
  history: BalancePoint[]; // reconstructed with interim growth
  cumulative: number[]; // one running total per record
  recordDates: string[]; // record dates, aligned with cumulative
  lastDate: string;
  lastBalance: number; // forecast seed
  years: number;
  monthlyContribution: number;
  scenarios: ForecastScenario[];
}

/**
 * Display label for a scenario rate, e.g. 0.04 -> "4% Growth"
 */
export function scenarioLabel(annualRate: number): string {
  const percent = Math.round(annualRate * 10000) / 100;
  return `${percent}% Growth`;
}
