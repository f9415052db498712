/**
 * Deposit record data structures
 */

export interface DepositRecord {
  id: number;
  user: string;
  date: string; // YYYY-MM-DD
  amount: number; // added amount, non-negative
  isTotal: boolean; // true when the record asserts the absolute balance
  currentTotal?: number | null; // asserted balance, meaningful only when isTotal
}

/**
 * Input for creating a record. The store assigns the id.
 */
export interface NewDepositRecord {
  user: string;
  date: string;
  amount: number;
  isTotal?: boolean;
  currentTotal?: number | null;
}

/**
 * Fields the engine reads from a record.
 */
export type DepositEntry = Pick<DepositRecord, "date" | "amount" | "isTotal" | "currentTotal">;

/**
 * Running balance after applying one record.
 * A total record replaces the balance (with its asserted total, or its amount
 * when no total was stored); any other record adds its amount.
 */
export function applyRecord(total: number, record: DepositEntry): number {
  if (record.isTotal) {
    return record.currentTotal ?? record.amount;
  }
  return total + record.amount;
}

/**
 * Normalizes entry-form input: a positive current total marks the record as a
 * total unless isTotal is given, and non-total records carry no current total.
 */
export function normalizeNewRecord(input: NewDepositRecord): Omit<DepositRecord, "id"> {
  const currentTotal = input.currentTotal ?? null;
  const isTotal = input.isTotal ?? (currentTotal !== null && currentTotal > 0);
  return {
    user: input.user,
    date: input.date,
    amount: input.amount,
    isTotal,
    currentTotal: isTotal ? currentTotal : null,
  };
}
