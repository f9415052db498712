import { DepositRecord, NewDepositRecord, normalizeNewRecord } from "../models/DepositRecord";

/**
 * Persistence boundary for deposit records.
 */
export interface DepositStore {
  addRecord(input: NewDepositRecord): DepositRecord;
  /** Records of one user sorted ascending by date; equal dates keep insertion order. */
  listRecords(user: string): DepositRecord[];
  deleteRecord(id: number): boolean;
  /** @returns number of records removed */
  deleteAllRecords(user: string): number;
}

/**
 * Process-local store. Records are copied in and out so callers cannot
 * mutate stored state.
 */
export class InMemoryDepositStore implements DepositStore {
  private records: DepositRecord[] = [];
  private nextId = 1;

  addRecord(input: NewDepositRecord): DepositRecord {
    const record: DepositRecord = { id: this.nextId++, ...normalizeNewRecord(input) };
    this.records.push(record);
    return { ...record };
  }

  listRecords(user: string): DepositRecord[] {
    return this.records
      .filter((record) => record.user === user)
      .sort((a, b) => a.date.localeCompare(b.date) || a.id - b.id)
      .map((record) => ({ ...record }));
  }

  deleteRecord(id: number): boolean {
    const before = this.records.length;
    this.records = this.records.filter((record) => record.id !== id);
    return this.records.length < before;
  }

  deleteAllRecords(user: string): number {
    const before = this.records.length;
    this.records = this.records.filter((record) => record.user !== user);
    return before - this.records.length;
  }
}
