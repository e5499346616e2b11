export type AuthErrorCode =
  | "PKCE_GENERATION_FAILED"
  | "CONFIGURATION_MISSING"
  | "AUTHORIZATION_FAILED"
  | "TOKEN_EXCHANGE_FAILED"
  | "REFRESH_FAILED"
  | "TOKEN_RESPONSE_MALFORMED"
  | "REFRESH_TOKEN_MISSING"
  | "NO_ACCESS_TOKEN"
  | "NETWORK_ERROR";

export class AuthError extends Error {
  readonly code: AuthErrorCode;

  constructor(code: AuthErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class PkceGenerationError extends AuthError {
  constructor(options?: ErrorOptions) {
    super(
      "PKCE_GENERATION_FAILED",
      "Failed to generate PKCE code verifier and challenge.",
      options
    );
  }
}

export type ConfigurationField = "clientId" | "clientSecret";

export class ConfigurationError extends AuthError {
  readonly field: ConfigurationField;

  constructor(field: ConfigurationField) {
    super(
      "CONFIGURATION_MISSING",
      `Missing configuration: ${field}. Run \`cycle-sync configure\` or set it in the environment.`
    );
    this.field = field;
  }
}

export type AuthorizationFailureReason =
  | "cancelled"
  | "callback-parsing-failed"
  | "callback-missing-code"
  | "authorization-url-invalid";

const authorizationMessages: Record<AuthorizationFailureReason, string> = {
  cancelled: "The authorization flow was cancelled.",
  "callback-parsing-failed": "Failed to parse the callback URL",
  "callback-missing-code":
    "The callback URL did not contain an authorization code.",
  "authorization-url-invalid": "The authorization URL is invalid",
};

export class AuthorizationError extends AuthError {
  readonly reason: AuthorizationFailureReason;
  readonly detail?: string;

  constructor(
    reason: AuthorizationFailureReason,
    detail?: string,
    options?: ErrorOptions
  ) {
    const base = authorizationMessages[reason];
    super(
      "AUTHORIZATION_FAILED",
      detail ? `${base}: ${detail}` : base,
      options
    );
    this.reason = reason;
    this.detail = detail;
  }
}

/** Non-2xx answer from the token endpoint. */
export abstract class TokenEndpointError extends AuthError {
  readonly status: number;
  readonly body: string;

  protected constructor(
    code: "TOKEN_EXCHANGE_FAILED" | "REFRESH_FAILED",
    label: string,
    status: number,
    body: string
  ) {
    super(code, `${label} failed (HTTP ${status}): ${body}`);
    this.status = status;
    this.body = body;
  }
}

export class TokenExchangeError extends TokenEndpointError {
  constructor(status: number, body: string) {
    super("TOKEN_EXCHANGE_FAILED", "Token exchange", status, body);
  }
}

export class RefreshError extends TokenEndpointError {
  constructor(status: number, body: string) {
    super("REFRESH_FAILED", "Token refresh", status, body);
  }

  /** The server refused the refresh token itself. */
  get rejected() {
    return this.status === 400 || this.status === 401;
  }
}

export class TokenResponseMalformedError extends AuthError {
  constructor(options?: ErrorOptions) {
    super(
      "TOKEN_RESPONSE_MALFORMED",
      "The token response could not be decoded.",
      options
    );
  }
}

export class RefreshTokenMissingError extends AuthError {
  constructor() {
    super(
      "REFRESH_TOKEN_MISSING",
      "No refresh token is stored. Run `cycle-sync login` again."
    );
  }
}

export class NoAccessTokenError extends AuthError {
  constructor(options?: ErrorOptions) {
    super(
      "NO_ACCESS_TOKEN",
      "No access token is available. Run `cycle-sync login` first.",
      options
    );
  }
}

export class AuthNetworkError extends AuthError {
  constructor(cause: unknown) {
    super("NETWORK_ERROR", `Network error: ${describeCause(cause)}`, {
      cause,
    });
  }
}

export function describeCause(cause: unknown) {
  return cause instanceof Error ? cause.message : String(cause);
}

/** True when the stored session can no longer be renewed without a new login. */
export function isSessionRejection(err: unknown) {
  if (err instanceof RefreshError) {
    return err.rejected;
  }
  return (
    err instanceof RefreshTokenMissingError || err instanceof NoAccessTokenError
  );
}
