import { afterEach, beforeEach, expect, test, vi } from "vitest";
import {
  AuthManager,
  buildAuthorizationUrl,
} from "../src/oauth/auth-manager.js";
import {
  AuthorizationError,
  ConfigurationError,
  NoAccessTokenError,
  RefreshError,
  TokenExchangeError,
  TokenResponseMalformedError,
} from "../src/oauth/errors.js";
import { deriveCodeChallenge } from "../src/oauth/pkce.js";
import { SECRET_KEYS } from "../src/security/secret-store.js";
import type { AuthConfiguration } from "../src/types.js";
import {
  createFetchMock,
  json,
  status,
  tokenResponse,
} from "./fixtures/fetch-mock.js";
import { MemorySecretStore } from "./fixtures/memory-secret-store.js";
import { StaticBrowser } from "./fixtures/static-browser.js";

const NOW = new Date("2025-01-01T00:00:00Z").getTime();

const configuration: AuthConfiguration = {
  clientId: "test-client",
  clientSecret: "test-secret",
  redirectUri: "http://127.0.0.1:3334/oauth/callback",
  scopes: ["read:recovery", "offline"],
  authorizationUrl: "https://auth.example.com/oauth2/auth",
  tokenUrl: "https://auth.example.com/oauth2/token",
};

const CALLBACK = "http://127.0.0.1:3334/oauth/callback?code=auth-code&state=s";

beforeEach(() => {
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(NOW);
});

afterEach(() => {
  vi.useRealTimers();
});

function storedSession(expiresInMs: number) {
  return new MemorySecretStore({
    [SECRET_KEYS.accessToken]: "cached-access",
    [SECRET_KEYS.refreshToken]: "old-refresh",
    [SECRET_KEYS.tokenExpiry]: String(NOW + expiresInMs),
  });
}

test("authorize validates configuration before presenting the browser", async () => {
  const browser = new StaticBrowser(CALLBACK);
  const { fetchFn, requests } = createFetchMock(() => tokenResponse());
  const manager = new AuthManager({
    configuration: { ...configuration, clientId: "" },
    secretStore: new MemorySecretStore(),
    browser,
    fetchFn,
  });

  await expect(manager.authorize()).rejects.toBeInstanceOf(ConfigurationError);
  expect(browser.presented).toHaveLength(0);
  expect(requests).toHaveLength(0);
  expect(manager.state).toBe("unauthenticated");
});

test("authorization URL carries the PKCE and client parameters", () => {
  const url = buildAuthorizationUrl(configuration, "challenge-value", "state-1");
  expect(url.origin + url.pathname).toBe("https://auth.example.com/oauth2/auth");
  expect(Object.fromEntries(url.searchParams)).toEqual({
    client_id: "test-client",
    redirect_uri: "http://127.0.0.1:3334/oauth/callback",
    response_type: "code",
    scope: "read:recovery offline",
    code_challenge: "challenge-value",
    code_challenge_method: "S256",
    state: "state-1",
  });
});

test("authorize exchanges the code and stores the token set", async () => {
  const browser = new StaticBrowser(CALLBACK);
  const secretStore = new MemorySecretStore();
  const { fetchFn, requests } = createFetchMock(() => tokenResponse());
  const manager = new AuthManager({
    configuration,
    secretStore,
    browser,
    fetchFn,
  });

  await manager.authorize();

  expect(requests).toHaveLength(1);
  const [request] = requests;
  expect(request.url).toBe("https://auth.example.com/oauth2/token");
  expect(request.method).toBe("POST");
  expect(request.headers.get("content-type")).toBe(
    "application/x-www-form-urlencoded"
  );
  const body = new URLSearchParams(request.body ?? "");
  expect(body.get("grant_type")).toBe("authorization_code");
  expect(body.get("code")).toBe("auth-code");
  expect(body.get("redirect_uri")).toBe(configuration.redirectUri);
  expect(body.get("client_id")).toBe("test-client");
  expect(body.get("client_secret")).toBe("test-secret");
  const verifier = body.get("code_verifier") ?? "";
  expect(deriveCodeChallenge(verifier)).toBe(
    browser.presented[0].searchParams.get("code_challenge")
  );

  expect(secretStore.values.get(SECRET_KEYS.accessToken)).toBe("new-access");
  expect(secretStore.values.get(SECRET_KEYS.refreshToken)).toBe("new-refresh");
  expect(secretStore.values.get(SECRET_KEYS.tokenExpiry)).toBe(
    String(NOW + 3600 * 1000)
  );
  expect(manager.state).toBe("authorized");
  expect(manager.authorizationPending).toBe(false);
});

test("form values are percent-encoded", async () => {
  const browser = new StaticBrowser(
    "http://127.0.0.1:3334/oauth/callback?code=a%2Bb%20c"
  );
  const { fetchFn, requests } = createFetchMock(() => tokenResponse());
  const manager = new AuthManager({
    configuration,
    secretStore: new MemorySecretStore(),
    browser,
    fetchFn,
  });

  await manager.authorize();
  expect(requests[0].body).toContain("&code=a%2Bb%20c&");
});

test("provider error on the callback is a parsing failure", async () => {
  const browser = new StaticBrowser(
    "http://127.0.0.1:3334/oauth/callback?error=access_denied&error_description=User%20denied"
  );
  const { fetchFn, requests } = createFetchMock(() => tokenResponse());
  const manager = new AuthManager({
    configuration,
    secretStore: new MemorySecretStore(),
    browser,
    fetchFn,
  });

  const failure = await manager.authorize().catch((err: unknown) => err);
  expect(failure).toBeInstanceOf(AuthorizationError);
  expect(failure instanceof AuthorizationError && failure.reason).toBe(
    "callback-parsing-failed"
  );
  expect(failure instanceof Error && failure.message).toBe(
    "Failed to parse the callback URL: User denied"
  );
  expect(requests).toHaveLength(0);
  expect(manager.authorizationPending).toBe(false);
  expect(manager.state).toBe("unauthenticated");
});

test("callback without a code is rejected", async () => {
  const browser = new StaticBrowser(
    "http://127.0.0.1:3334/oauth/callback?state=s"
  );
  const manager = new AuthManager({
    configuration,
    secretStore: new MemorySecretStore(),
    browser,
    fetchFn: createFetchMock(() => tokenResponse()).fetchFn,
  });

  const failure = await manager.authorize().catch((err: unknown) => err);
  expect(failure instanceof AuthorizationError && failure.reason).toBe(
    "callback-missing-code"
  );
});

test("browser cancellation propagates unchanged", async () => {
  const cancelled = new AuthorizationError("cancelled");
  const browser = new StaticBrowser(() => Promise.reject(cancelled));
  const manager = new AuthManager({
    configuration,
    secretStore: new MemorySecretStore(),
    browser,
    fetchFn: createFetchMock(() => tokenResponse()).fetchFn,
  });

  await expect(manager.authorize()).rejects.toBe(cancelled);
  expect(manager.authorizationPending).toBe(false);
});

test("non-2xx code exchange raises TokenExchangeError with status and body", async () => {
  const manager = new AuthManager({
    configuration,
    secretStore: new MemorySecretStore(),
    browser: new StaticBrowser(CALLBACK),
    fetchFn: createFetchMock(() => status(400, "invalid_grant")).fetchFn,
  });

  const failure = await manager.authorize().catch((err: unknown) => err);
  expect(failure).toBeInstanceOf(TokenExchangeError);
  expect(failure instanceof TokenExchangeError && failure.status).toBe(400);
  expect(failure instanceof TokenExchangeError && failure.body).toBe(
    "invalid_grant"
  );
});

test("undecodable token response raises TokenResponseMalformedError", async () => {
  const manager = new AuthManager({
    configuration,
    secretStore: new MemorySecretStore(),
    browser: new StaticBrowser(CALLBACK),
    fetchFn: createFetchMock(() => json({ token_type: "bearer" })).fetchFn,
  });

  await expect(manager.authorize()).rejects.toBeInstanceOf(
    TokenResponseMalformedError
  );
});

test("a token with 61s left is returned without refreshing", async () => {
  const { fetchFn, requests } = createFetchMock(() => tokenResponse());
  const manager = new AuthManager({
    configuration,
    secretStore: storedSession(61 * 1000),
    browser: new StaticBrowser(CALLBACK),
    fetchFn,
  });

  await expect(manager.validAccessToken()).resolves.toBe("cached-access");
  expect(requests).toHaveLength(0);
});

test("a token with 59s left triggers exactly one refresh", async () => {
  const { fetchFn, requests } = createFetchMock(() => tokenResponse());
  const manager = new AuthManager({
    configuration,
    secretStore: storedSession(59 * 1000),
    browser: new StaticBrowser(CALLBACK),
    fetchFn,
  });

  await expect(manager.validAccessToken()).resolves.toBe("new-access");
  expect(requests).toHaveLength(1);
  const body = new URLSearchParams(requests[0].body ?? "");
  expect(Object.fromEntries(body)).toEqual({
    grant_type: "refresh_token",
    refresh_token: "old-refresh",
    client_id: "test-client",
    client_secret: "test-secret",
  });
});

test("refresh keeps the stored refresh token when none is returned", async () => {
  const secretStore = storedSession(0);
  const manager = new AuthManager({
    configuration,
    secretStore,
    browser: new StaticBrowser(CALLBACK),
    fetchFn: createFetchMock(() =>
      tokenResponse({ refresh_token: undefined })
    ).fetchFn,
  });

  await manager.refreshTokens();
  expect(secretStore.values.get(SECRET_KEYS.accessToken)).toBe("new-access");
  expect(secretStore.values.get(SECRET_KEYS.refreshToken)).toBe("old-refresh");
});

test("a rejected refresh expires the session", async () => {
  const manager = new AuthManager({
    configuration,
    secretStore: storedSession(0),
    browser: new StaticBrowser(CALLBACK),
    fetchFn: createFetchMock(() => status(400, "invalid_grant")).fetchFn,
  });

  const failure = await manager.refreshTokens().catch((err: unknown) => err);
  expect(failure).toBeInstanceOf(RefreshError);
  expect(failure instanceof RefreshError && failure.status).toBe(400);
  expect(failure instanceof RefreshError && failure.rejected).toBe(true);
  expect(manager.state).toBe("session-expired");
  await expect(manager.validAccessToken()).rejects.toBeInstanceOf(
    NoAccessTokenError
  );
});

test("a server error during refresh propagates from validAccessToken", async () => {
  const manager = new AuthManager({
    configuration,
    secretStore: storedSession(0),
    browser: new StaticBrowser(CALLBACK),
    fetchFn: createFetchMock(() => status(503, "unavailable")).fetchFn,
  });

  const failure = await manager.validAccessToken().catch((err: unknown) => err);
  expect(failure).toBeInstanceOf(RefreshError);
  expect(failure instanceof RefreshError && failure.status).toBe(503);
  expect(failure instanceof RefreshError && failure.rejected).toBe(false);
  expect(manager.state).toBe("authorized");
});

test("no stored refresh token means no access token", async () => {
  const { fetchFn, requests } = createFetchMock(() => tokenResponse());
  const manager = new AuthManager({
    configuration,
    secretStore: new MemorySecretStore(),
    browser: new StaticBrowser(CALLBACK),
    fetchFn,
  });

  await expect(manager.validAccessToken()).rejects.toBeInstanceOf(
    NoAccessTokenError
  );
  expect(requests).toHaveLength(0);
});

test("concurrent refreshes share one token request", async () => {
  const { fetchFn, requests } = createFetchMock(() => tokenResponse());
  const manager = new AuthManager({
    configuration,
    secretStore: storedSession(0),
    browser: new StaticBrowser(CALLBACK),
    fetchFn,
  });

  const tokens = await Promise.all([
    manager.validAccessToken(),
    manager.validAccessToken(),
    manager.refreshTokens().then(() => manager.validAccessToken()),
  ]);
  expect(tokens).toEqual(["new-access", "new-access", "new-access"]);
  expect(requests).toHaveLength(1);
});

test("logout removes every stored token", async () => {
  const secretStore = storedSession(60 * 60 * 1000);
  secretStore.values.set(SECRET_KEYS.clientSecret, "test-secret");
  const manager = new AuthManager({
    configuration,
    secretStore,
    browser: new StaticBrowser(CALLBACK),
    fetchFn: createFetchMock(() => tokenResponse()).fetchFn,
  });

  await expect(manager.isAuthenticated()).resolves.toBe(true);
  await manager.logout();
  expect(Array.from(secretStore.values.keys())).toEqual([
    SECRET_KEYS.clientSecret,
  ]);
  await expect(manager.isAuthenticated()).resolves.toBe(false);
  expect(manager.state).toBe("unauthenticated");
});
