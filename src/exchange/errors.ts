/**
 * Transport-level error raised by the exchange data client
 */
export class ExchangeRequestError extends Error {
  /** Logical operation, e.g. "listMarkets" */
  readonly operation: string;

  /** HTTP status when the exchange answered */
  readonly status?: number;

  constructor(
    operation: string,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(`${operation} failed: ${message}`, { cause: options.cause });
    this.name = 'ExchangeRequestError';
    this.operation = operation;
    this.status = options.status;
  }
}
