import { applyRecord, normalizeNewRecord } from '../../models/DepositRecord';

describe('applyRecord', () => {
  it('should add an incremental deposit', () => {
    expect(applyRecord(100, { date: '2024-01-01', amount: 50, isTotal: false })).toBe(150);
  });

  it('should replace the balance with an asserted total', () => {
    expect(applyRecord(100, { date: '2024-01-01', amount: 50, isTotal: true, currentTotal: 900 })).toBe(900);
  });

  it('should use the amount for a total without a current total', () => {
    expect(applyRecord(100, { date: '2024-01-01', amount: 50, isTotal: true, currentTotal: null })).toBe(50);
  });

  it('should keep an asserted total of zero', () => {
    expect(applyRecord(100, { date: '2024-01-01', amount: 50, isTotal: true, currentTotal: 0 })).toBe(0);
  });
});

describe('normalizeNewRecord', () => {
  it('should mark a positive current total as a total record', () => {
    expect(normalizeNewRecord({ user: 'alice', date: '2024-01-01', amount: 0, currentTotal: 800 })).toEqual({
      user: 'alice',
      date: '2024-01-01',
      amount: 0,
      isTotal: true,
      currentTotal: 800,
    });
  });

  it('should drop a zero current total', () => {
    expect(normalizeNewRecord({ user: 'alice', date: '2024-01-01', amount: 200, currentTotal: 0 })).toEqual({
      user: 'alice',
      date: '2024-01-01',
      amount: 200,
      isTotal: false,
      currentTotal: null,
    });
  });

  it('should respect an explicit isTotal flag', () => {
    const record = normalizeNewRecord({ user: 'alice', date: '2024-01-01', amount: 300, isTotal: true });
    expect(record.isTotal).toBe(true);
    expect(record.currentTotal).toBeNull();
  });

  it('should clear the current total of an explicit non-total record', () => {
    const record = normalizeNewRecord({
      user: 'alice',
      date: '2024-01-01',
      amount: 300,
      isTotal: false,
      currentTotal: 999,
    });
    expect(record.currentTotal).toBeNull();
  });
});
