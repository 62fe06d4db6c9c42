/**
 * Error taxonomy for the analysis pipeline.
 *
 * `code` is the stable identifier surfaced in logs and API error bodies;
 * `status` is the HTTP status the error handler answers with.
 */
export class AppError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, message: string, status = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Empty or failed fetch: closed market, unknown symbol, transport error or timeout. */
export class DataUnavailableError extends AppError {
  readonly symbol: string;

  constructor(symbol: string, reason: string, options?: { cause?: unknown }) {
    super("DATA_UNAVAILABLE", `No data available for ${symbol}: ${reason}`, 502, options);
    this.symbol = symbol;
  }
}

/** Fewer bars than the largest indicator window needs. */
export class InsufficientDataError extends AppError {
  readonly required: number;
  readonly actual: number;

  constructor(required: number, actual: number) {
    super(
      "INSUFFICIENT_DATA",
      `Not enough data points to calculate indicators (${actual} < ${required})`,
      422,
    );
    this.required = required;
    this.actual = actual;
  }
}

export class NotifierError extends AppError {
  readonly destination: string;

  constructor(destination: string, message: string, options?: { cause?: unknown }) {
    super("NOTIFIER_FAILURE", message, 502, options);
    this.destination = destination;
  }
}

/** Startup cannot continue: missing credential or unreadable configuration. */
export class FatalConfigError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FATAL_CONFIG", message, 500, options);
  }
}
