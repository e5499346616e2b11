import { describeCause } from "../oauth/errors.js";

export type ApiErrorCode =
  | "UNAUTHORIZED"
  | "RATE_LIMITED"
  | "SERVER_ERROR"
  | "NETWORK_ERROR"
  | "DECODING_ERROR"
  | "MAX_RETRIES_EXCEEDED"
  | "SESSION_EXPIRED";

export class ApiError extends Error {
  readonly code: ApiErrorCode;

  constructor(code: ApiErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnauthorizedError extends ApiError {
  constructor(options?: ErrorOptions) {
    super(
      "UNAUTHORIZED",
      "Authentication failed. Run `cycle-sync login` to reconnect.",
      options
    );
  }
}

export class RateLimitedError extends ApiError {
  constructor() {
    super("RATE_LIMITED", "API rate limit exceeded.");
  }
}

export class ServerError extends ApiError {
  readonly status: number;

  constructor(status: number) {
    super("SERVER_ERROR", `Server error (HTTP ${status}).`);
    this.status = status;
  }
}

export class NetworkError extends ApiError {
  constructor(cause: unknown) {
    super("NETWORK_ERROR", `Network error: ${describeCause(cause)}`, {
      cause,
    });
  }
}

export class DecodingError extends ApiError {
  constructor(cause: unknown) {
    super("DECODING_ERROR", `Failed to decode response: ${describeCause(cause)}`, {
      cause,
    });
  }
}

export class MaxRetriesExceededError extends ApiError {
  readonly retries: number;
  readonly lastError: ApiError | null;

  constructor(retries: number, lastError: ApiError | null) {
    super(
      "MAX_RETRIES_EXCEEDED",
      `Request failed after ${retries} retries${
        lastError ? `: ${lastError.message}` : "."
      }`,
      { cause: lastError ?? undefined }
    );
    this.retries = retries;
    this.lastError = lastError;
  }
}

export class SessionExpiredError extends ApiError {
  constructor(cause: unknown) {
    super(
      "SESSION_EXPIRED",
      "Session expired. Run `cycle-sync login` to reconnect.",
      { cause }
    );
  }
}

/** Errors the backoff layer waits out: 429 and 5xx. */
export function isRetryable(err: unknown): err is RateLimitedError | ServerError {
  if (err instanceof RateLimitedError) {
    return true;
  }
  return err instanceof ServerError && err.status >= 500;
}
