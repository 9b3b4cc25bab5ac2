/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when required settings are missing or malformed
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Feed transport error - network failure, timeout or non-2xx status from the candidate feed
 */
export class FeedTransportError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, "FEED_TRANSPORT_ERROR", cause);
  }
}

/**
 * Feed blocked error - upstream explicitly refused service (HTTP 403 / Cloudflare page)
 */
export class FeedBlockedError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    public readonly rayId?: string,
    cause?: Error,
  ) {
    super(message, "FEED_BLOCKED", cause);
  }
}

/**
 * Feed payload error - response body did not have the expected shape
 */
export class FeedPayloadError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "FEED_PAYLOAD_ERROR", cause);
  }
}

/**
 * Persistence error - ledger or trade log could not be read or written
 */
export class PersistenceError extends AppError {
  constructor(
    message: string,
    public readonly path?: string,
    cause?: Error,
  ) {
    super(message, "PERSISTENCE_ERROR", cause);
  }
}

/**
 * Trade execution error - thrown when order execution fails
 */
export class TradeExecutionError extends AppError {
  constructor(
    message: string,
    public readonly conditionId?: string,
    public readonly tokenId?: string,
    cause?: Error,
  ) {
    super(message, "TRADE_EXECUTION_ERROR", cause);
  }
}

/**
 * Timeout error - an awaited venue or network call did not settle in time
 */
export class TimeoutError extends AppError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT");
  }
}

export const toError = (err: unknown): Error =>
  err instanceof Error ? err : new Error(String(err));

export const isMissingFileError = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "ENOENT";
