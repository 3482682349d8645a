/**
 * Error taxonomy. Every error is local to the operation that raised it;
 * callers turn it into a notification or a log line.
 */

export type ErrorCode =
  | 'config_io'
  | 'fetch_not_found'
  | 'fetch_invalid_format'
  | 'fetch_transient'
  | 'fundamentals_unavailable';

export abstract class StockTerminalError extends Error {
  abstract readonly code: ErrorCode;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Config file unreadable, corrupt or not writable. */
export class ConfigIOError extends StockTerminalError {
  readonly code = 'config_io';
  constructor(readonly file: string, cause: unknown) {
    super(`Config I/O failed for ${file}: ${describeError(cause)}`, { cause });
  }
}

export class FetchNotFoundError extends StockTerminalError {
  readonly code = 'fetch_not_found';
  constructor(readonly symbol: string) {
    super(`No data found for '${symbol}'`);
  }
}

/** Provider answered but no bar carried all of open/high/low/close. */
export class FetchInvalidFormatError extends StockTerminalError {
  readonly code = 'fetch_invalid_format';
  constructor(readonly symbol: string) {
    super(`Invalid data format for ${symbol}`);
  }
}

export class FetchTransientError extends StockTerminalError {
  readonly code = 'fetch_transient';
  constructor(readonly symbol: string, cause: unknown) {
    super(`Fetch Error: ${describeError(cause)}`, { cause });
  }
}

export class FundamentalsUnavailableError extends StockTerminalError {
  readonly code = 'fundamentals_unavailable';
  constructor(readonly symbol: string, cause?: unknown) {
    super(`Fundamentals unavailable for ${symbol}`, { cause });
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
