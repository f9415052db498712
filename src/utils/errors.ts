/**
 * Error taxonomy for the projection engine. Every error is local to the call
 * that raised it; no partial results are returned.
 */

export class SavingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Records were not sorted ascending by date.
 */
export class InvalidRecordOrderError extends SavingsError {
  constructor(
    public readonly index: number,
    public readonly previousDate: string,
    public readonly date: string
  ) {
    super(
      `Deposit records must be sorted ascending by date: record ${index} (${date}) precedes ${previousDate}`
    );
  }
}

/**
 * A rate, horizon, amount or date outside its valid range.
 */
export class InvalidParameterError extends SavingsError {
  constructor(
    public readonly parameter: string,
    message: string
  ) {
    super(`Invalid ${parameter}: ${message}`);
  }
}

/**
 * A forecast was requested without any history to seed it.
 */
export class EmptyInputError extends SavingsError {}
