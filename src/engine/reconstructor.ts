import { DepositEntry, applyRecord } from "../models/DepositRecord";
import { BalancePoint } from "../models/SavingsProjection";
import { InvalidRecordOrderError } from "../utils/errors";
import { annualToMonthlyReturn, compoundMonth } from "../utils/math";
import { monthsBetween, parseCalendarDate, stepDate } from "../utils/time";

/**
 * Parses every record date and checks the records are sorted ascending.
 * Unsorted input is a caller bug, so it fails instead of being re-sorted.
 */
function parseOrderedDates(records: DepositEntry[]): Date[] {
  const dates: Date[] = [];
  for (let i = 0; i < records.length; i++) {
    const date = parseCalendarDate(records[i].date);
    if (i > 0 && date.getTime() < dates[i - 1].getTime()) {
      throw new InvalidRecordOrderError(i, records[i - 1].date, records[i].date);
    }
    dates.push(date);
  }
  return dates;
}

/**
 * Reconstruct a dense monthly balance curve from sparse deposit records.
 *
 * Between two consecutive records the balance grows at the monthly equivalent
 * of `annualGrowthRate` with no contribution, one synthetic point per whole
 * calendar month in the gap, dated 30 days apart from the earlier record.
 * Each record then adds its amount (or replaces the balance for a total) and
 * emits a point on its own date.
 *
 * @param records - Deposit records sorted ascending by date
 * @param annualGrowthRate - Assumed annual growth as a decimal (0.06 for 6%)
 * @returns Synthetic and record points in chronological order
 */
export function reconstruct(records: DepositEntry[], annualGrowthRate: number): BalancePoint[] {
  const monthlyRate = annualToMonthlyReturn(annualGrowthRate);
  const dates = parseOrderedDates(records);

  const points: BalancePoint[] = [];
  let currentValue = 0;
  let lastDate: Date | undefined;

  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    const date = dates[i];

    if (lastDate) {
      const gapMonths = monthsBetween(lastDate, date);
      for (let k = 1; k <= gapMonths; k++) {
        currentValue = compoundMonth(currentValue, monthlyRate);
        points.push({ date: stepDate(lastDate, k), value: currentValue });
      }
    }

    currentValue = applyRecord(currentValue, record);
    points.push({ date: record.date, value: currentValue });
    lastDate = date;
  }

  return points;
}

/**
 * Running total after each record, without time-based growth.
 * Used to seed forecasts with the last known balance.
 */
export function cumulative(records: DepositEntry[]): number[] {
  parseOrderedDates(records);

  const totals: number[] = [];
  let total = 0;
  for (const record of records) {
    total = applyRecord(total, record);
    totals.push(total);
  }
  return totals;
}
