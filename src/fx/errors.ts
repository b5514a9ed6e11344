export type FxErrorCode =
  | 'INVALID_DATE'
  | 'INVALID_BREAKDOWN'
  | 'INVALID_RANGE'
  | 'NO_DATA'
  | 'FALLBACK_UNREADABLE';

export abstract class FxError extends Error {
  abstract readonly code: FxErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidDateError extends FxError {
  readonly code = 'INVALID_DATE';
  readonly status = 400;

  constructor(readonly field: string, value: string | null) {
    super(
      value === null
        ? `Missing required date parameter: ${field}`
        : `Invalid ${field} date "${value}", expected YYYY-MM-DD`
    );
  }
}

export class InvalidBreakdownError extends FxError {
  readonly code = 'INVALID_BREAKDOWN';
  readonly status = 400;

  constructor(value: string) {
    super(`Invalid breakdown "${value}", expected "day" or "none"`);
  }
}

export class InvalidRangeError extends FxError {
  readonly code = 'INVALID_RANGE';
  readonly status = 400;

  constructor(readonly start: string, readonly end: string) {
    super('Start date must be before end date');
  }
}

export class NoDataError extends FxError {
  readonly code = 'NO_DATA';
  readonly status = 404;

  constructor() {
    super('No rate data available');
  }
}

/** The snapshot is the last resort, so this one is fatal. */
export class FallbackUnreadableError extends FxError {
  readonly code = 'FALLBACK_UNREADABLE';
  readonly status = 500;

  constructor(readonly path: string, reason: string, cause?: unknown) {
    super(`Fallback snapshot unreadable (${path}): ${reason}`, { cause });
  }
}

export function isFxError(error: unknown): error is FxError {
  return error instanceof FxError;
}
