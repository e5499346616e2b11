import type { z } from "zod";
import type { TokenProvider } from "../oauth/auth-manager.js";
import { API_BASE_URL } from "../oauth/configuration.js";
import {
  AuthNetworkError,
  isSessionRejection,
  RefreshError,
} from "../oauth/errors.js";
import { debug, info, warn } from "../utils/log.js";
import { type Sleep, sleep, withTimeout } from "../utils/timers.js";
import {
  type ApiError,
  DecodingError,
  isRetryable,
  MaxRetriesExceededError,
  NetworkError,
  RateLimitedError,
  ServerError,
  SessionExpiredError,
  UnauthorizedError,
} from "./errors.js";
import {
  type RecoveryPage,
  recoveryPageSchema,
  type SleepPage,
  sleepPageSchema,
  type StrainPage,
  strainPageSchema,
} from "./schemas.js";

export const RECOVERY_PATH = "/v2/recovery";
export const SLEEP_PATH = "/v2/activity/sleep";
export const STRAIN_PATH = "/v2/cycle";

export type RetryPolicy = {
  maxBackoffRetries: number;
  baseDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxBackoffRetries: 3,
  baseDelayMs: 1000,
};

const DEFAULT_TIMEOUT_MS = 60 * 1000;

export type FetchRange = {
  start?: Date;
  end?: Date;
  nextToken?: string;
  signal?: AbortSignal;
};

type PreparedRequest = {
  url: string;
  headers: Record<string, string>;
};

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type ApiClientOptions = {
  auth: TokenProvider;
  baseUrl?: string;
  fetchFn?: typeof fetch;
  sleep?: Sleep;
  retry?: Partial<RetryPolicy>;
  timeoutMs?: number;
};

export function backoffDelay(policy: RetryPolicy, retry: number) {
  return policy.baseDelayMs * 2 ** (retry - 1);
}

/**
 * Client for the paginated biometric endpoints.
 *
 * Each call runs two retry layers: a 401 triggers one explicit token refresh
 * and exactly one more attempt, and every attempt (including that one) waits
 * out 429 and 5xx responses with exponential backoff.
 */
export class ApiClient {
  private readonly auth: TokenProvider;
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: Sleep;
  private readonly retry: RetryPolicy;
  private readonly timeoutMs: number;

  constructor(options: ApiClientOptions) {
    this.auth = options.auth;
    this.baseUrl = (options.baseUrl ?? API_BASE_URL).replace(/\/+$/, "");
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.sleep = options.sleep ?? sleep;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  fetchRecovery(range: FetchRange = {}): Promise<RecoveryPage> {
    return this.performRequest(RECOVERY_PATH, recoveryPageSchema, range);
  }

  fetchSleep(range: FetchRange = {}): Promise<SleepPage> {
    return this.performRequest(SLEEP_PATH, sleepPageSchema, range);
  }

  fetchStrain(range: FetchRange = {}): Promise<StrainPage> {
    return this.performRequest(STRAIN_PATH, strainPageSchema, range);
  }

  private async performRequest<T>(
    path: string,
    schema: ResponseSchema<T>,
    range: FetchRange
  ): Promise<T> {
    try {
      const request = await this.buildRequest(path, range);
      return await this.executeWithBackoff(request, schema, range.signal);
    } catch (err) {
      if (!(err instanceof UnauthorizedError)) {
        throw err;
      }
    }
    info(`${path}: unauthorized, refreshing tokens and retrying once`);
    await this.refreshAfterUnauthorized();
    const request = await this.buildRequest(path, range);
    return this.executeWithBackoff(request, schema, range.signal);
  }

  private async refreshAfterUnauthorized() {
    try {
      await this.auth.refreshTokens();
    } catch (err) {
      if (isSessionRejection(err)) {
        throw new SessionExpiredError(err);
      }
      if (err instanceof RefreshError) {
        throw new ServerError(err.status);
      }
      if (err instanceof AuthNetworkError) {
        throw new NetworkError(err.cause);
      }
      throw err;
    }
  }

  private async buildRequest(
    path: string,
    range: FetchRange
  ): Promise<PreparedRequest> {
    let token: string;
    try {
      token = await this.auth.validAccessToken();
    } catch (err) {
      debug(`Failed to get access token: ${String(err)}`);
      throw new UnauthorizedError({ cause: err });
    }
    const url = new URL(`${this.baseUrl}${path}`);
    if (range.start) {
      url.searchParams.set("start", range.start.toISOString());
    }
    if (range.end) {
      url.searchParams.set("end", range.end.toISOString());
    }
    if (range.nextToken) {
      url.searchParams.set("nextToken", range.nextToken);
    }
    return {
      url: url.toString(),
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: "application/json",
      },
    };
  }

  private async executeWithBackoff<T>(
    request: PreparedRequest,
    schema: ResponseSchema<T>,
    signal?: AbortSignal
  ): Promise<T> {
    let lastError: ApiError | null = null;
    for (let attempt = 0; attempt <= this.retry.maxBackoffRetries; attempt++) {
      if (attempt > 0) {
        const delay = backoffDelay(this.retry, attempt);
        debug(
          `Backoff retry ${attempt}/${this.retry.maxBackoffRetries}, waiting ${delay}ms`
        );
        await this.sleep(delay, signal);
      }
      try {
        return await this.executeOnce(request, schema, signal);
      } catch (err) {
        if (!isRetryable(err)) {
          throw err;
        }
        lastError = err;
      }
    }
    warn(`All ${this.retry.maxBackoffRetries} backoff retries exhausted`);
    throw new MaxRetriesExceededError(this.retry.maxBackoffRetries, lastError);
  }

  private async executeOnce<T>(
    request: PreparedRequest,
    schema: ResponseSchema<T>,
    signal?: AbortSignal
  ): Promise<T> {
    signal?.throwIfAborted();
    const guard = withTimeout(this.timeoutMs, signal);
    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(request.url, {
        method: "GET",
        headers: request.headers,
        signal: guard.signal,
      });
      text = await response.text();
    } catch (err) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      throw new NetworkError(err);
    } finally {
      guard.dispose();
    }

    const { status } = response;
    debug(`GET ${new URL(request.url).pathname} -> ${status}`);
    if (status === 401) {
      throw new UnauthorizedError();
    }
    if (status === 429) {
      warn("Rate limited by the API");
      throw new RateLimitedError();
    }
    if (status < 200 || status > 299) {
      warn(`Unexpected HTTP status: ${status}`);
      throw new ServerError(status);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (err) {
      throw new DecodingError(err);
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new DecodingError(parsed.error);
    }
    return parsed.data;
  }
}
