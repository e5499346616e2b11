import crypto from "node:crypto";
import PQueue from "p-queue";
import type { SecretStore } from "../security/secret-store.js";
import { parseExpiry, SECRET_KEYS } from "../security/secret-store.js";
import type {
  AuthConfiguration,
  AuthState,
  PKCEPair,
  TokenSet,
} from "../types.js";
import { debug, info, warn } from "../utils/log.js";
import type { BrowserPresenter } from "./browser.js";
import { validateConfiguration } from "./configuration.js";
import {
  AuthorizationError,
  isSessionRejection,
  NoAccessTokenError,
  RefreshTokenMissingError,
} from "./errors.js";
import { generatePKCE } from "./pkce.js";
import { requestTokens, type TokenGrant, toTokenSet } from "./token-endpoint.js";

/** A cached access token is only handed out while it has this much life left. */
export const TOKEN_EXPIRY_MARGIN_MS = 60 * 1000;

/** The narrow capability the API client needs from the auth layer. */
export interface TokenProvider {
  validAccessToken(): Promise<string>;
  refreshTokens(): Promise<void>;
}

export function buildAuthorizationUrl(
  configuration: AuthConfiguration,
  codeChallenge: string,
  state: string
) {
  let url: URL;
  try {
    url = new URL(configuration.authorizationUrl);
  } catch (err) {
    throw new AuthorizationError(
      "authorization-url-invalid",
      configuration.authorizationUrl,
      { cause: err }
    );
  }
  url.searchParams.set("client_id", configuration.clientId);
  url.searchParams.set("redirect_uri", configuration.redirectUri);
  url.searchParams.set("response_type", "code");
  url.searchParams.set("scope", configuration.scopes.join(" "));
  url.searchParams.set("code_challenge", codeChallenge);
  url.searchParams.set("code_challenge_method", "S256");
  url.searchParams.set("state", state);
  return url;
}

export function extractAuthorizationCode(callbackUrl: string) {
  let url: URL;
  try {
    url = new URL(callbackUrl);
  } catch (err) {
    throw new AuthorizationError(
      "callback-parsing-failed",
      `cannot parse ${callbackUrl}`,
      { cause: err }
    );
  }
  const providerError = url.searchParams.get("error");
  if (providerError !== null) {
    throw new AuthorizationError(
      "callback-parsing-failed",
      url.searchParams.get("error_description") || providerError
    );
  }
  const code = url.searchParams.get("code");
  if (!code) {
    throw new AuthorizationError("callback-missing-code");
  }
  return code;
}

/**
 * Owns the OAuth 2.0 + PKCE flow and the token lifecycle. Token state is
 * mirrored between the secret store and an in-memory cache; every mutation
 * runs on a single-slot queue, and concurrent refreshes share one request.
 */
export class AuthManager implements TokenProvider {
  private readonly configuration: AuthConfiguration;
  private readonly secretStore: SecretStore;
  private readonly browser: BrowserPresenter;
  private readonly fetchFn?: typeof fetch;
  private readonly queue = new PQueue({ concurrency: 1 });
  private cachedAccessToken: string | null = null;
  private cachedExpiresAt: number | null = null;
  private currentPkce: PKCEPair | null = null;
  private loaded = false;
  private loadPromise: Promise<void> | null = null;
  private refreshPromise: Promise<void> | null = null;
  private stateValue: AuthState = "unauthenticated";

  constructor(options: {
    configuration: AuthConfiguration;
    secretStore: SecretStore;
    browser: BrowserPresenter;
    fetchFn?: typeof fetch;
  }) {
    this.configuration = options.configuration;
    this.secretStore = options.secretStore;
    this.browser = options.browser;
    this.fetchFn = options.fetchFn;
  }

  get state() {
    return this.stateValue;
  }

  /** True while a PKCE pair is waiting for its code exchange. */
  get authorizationPending() {
    return this.currentPkce !== null;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.add(task, { throwOnTimeout: true });
  }

  private async hydrate() {
    this.cachedAccessToken = await this.secretStore.read(
      SECRET_KEYS.accessToken
    );
    this.cachedExpiresAt = parseExpiry(
      await this.secretStore.read(SECRET_KEYS.tokenExpiry)
    );
    if (this.cachedAccessToken) {
      this.stateValue = "authorized";
    }
    this.loaded = true;
  }

  private async ensureLoaded() {
    if (this.loaded) {
      return;
    }
    if (!this.loadPromise) {
      this.loadPromise = this.hydrate().finally(() => {
        this.loadPromise = null;
      });
    }
    await this.loadPromise;
  }

  private freshAccessToken() {
    if (!(this.cachedAccessToken && this.cachedExpiresAt !== null)) {
      return null;
    }
    if (this.cachedExpiresAt - Date.now() > TOKEN_EXPIRY_MARGIN_MS) {
      return this.cachedAccessToken;
    }
    return null;
  }

  async isAuthenticated() {
    await this.ensureLoaded();
    return this.cachedAccessToken !== null;
  }

  authorize(): Promise<void> {
    return this.serialize(async () => {
      validateConfiguration(this.configuration);
      await this.ensureLoaded();
      const pkce = generatePKCE();
      this.currentPkce = pkce;
      const previousState = this.stateValue;
      this.stateValue = "authorizing";
      try {
        const authorizationUrl = buildAuthorizationUrl(
          this.configuration,
          pkce.codeChallenge,
          crypto.randomUUID()
        );
        const callbackUrl = await this.browser.present(
          authorizationUrl,
          this.configuration.redirectUri
        );
        const code = extractAuthorizationCode(callbackUrl);
        await this.exchangeCode(code, pkce.codeVerifier);
        this.stateValue = "authorized";
        info("Authorization complete.");
      } catch (err) {
        this.stateValue = previousState;
        throw err;
      } finally {
        this.currentPkce = null;
      }
    });
  }

  async validAccessToken(): Promise<string> {
    await this.ensureLoaded();
    const cached = this.freshAccessToken();
    if (cached) {
      return cached;
    }
    const refreshToken = await this.secretStore.read(SECRET_KEYS.refreshToken);
    if (!refreshToken) {
      throw new NoAccessTokenError();
    }
    try {
      await this.startRefresh({ onlyIfStale: true });
    } catch (err) {
      if (isSessionRejection(err)) {
        throw new NoAccessTokenError({ cause: err });
      }
      throw err;
    }
    if (!this.cachedAccessToken) {
      throw new NoAccessTokenError();
    }
    return this.cachedAccessToken;
  }

  refreshTokens(): Promise<void> {
    return this.startRefresh({ onlyIfStale: false });
  }

  private startRefresh(options: { onlyIfStale: boolean }) {
    if (this.refreshPromise) {
      debug("Joining in-flight token refresh");
      return this.refreshPromise;
    }
    this.refreshPromise = this.serialize(async () => {
      // Another caller may have refreshed while this one waited in the queue.
      if (options.onlyIfStale && this.freshAccessToken()) {
        return;
      }
      await this.refreshLocked();
    }).finally(() => {
      this.refreshPromise = null;
    });
    return this.refreshPromise;
  }

  private async refreshLocked() {
    await this.ensureLoaded();
    const refreshToken = await this.secretStore.read(SECRET_KEYS.refreshToken);
    if (!refreshToken) {
      throw new RefreshTokenMissingError();
    }
    this.stateValue = "refreshing";
    try {
      await this.performGrant({
        grant_type: "refresh_token",
        refresh_token: refreshToken,
        client_id: this.configuration.clientId,
        client_secret: this.configuration.clientSecret,
      });
      this.stateValue = "authorized";
      debug("Access token refreshed.");
    } catch (err) {
      if (isSessionRejection(err)) {
        this.stateValue = "session-expired";
        warn("Refresh token was rejected. Run `cycle-sync login` again.");
      } else {
        this.stateValue = this.cachedAccessToken
          ? "authorized"
          : "unauthenticated";
      }
      throw err;
    }
  }

  logout(): Promise<void> {
    return this.serialize(async () => {
      await this.secretStore.delete(SECRET_KEYS.accessToken);
      await this.secretStore.delete(SECRET_KEYS.refreshToken);
      await this.secretStore.delete(SECRET_KEYS.tokenExpiry);
      this.cachedAccessToken = null;
      this.cachedExpiresAt = null;
      this.currentPkce = null;
      this.loaded = true;
      this.stateValue = "unauthenticated";
    });
  }

  private async exchangeCode(code: string, codeVerifier: string) {
    await this.performGrant({
      grant_type: "authorization_code",
      code,
      redirect_uri: this.configuration.redirectUri,
      client_id: this.configuration.clientId,
      client_secret: this.configuration.clientSecret,
      code_verifier: codeVerifier,
    });
  }

  private async performGrant(grant: TokenGrant) {
    const response = await requestTokens({
      tokenUrl: this.configuration.tokenUrl,
      grant,
      fetchFn: this.fetchFn,
    });
    await this.storeTokens(toTokenSet(response));
  }

  private async storeTokens(tokens: TokenSet) {
    await this.secretStore.write(SECRET_KEYS.accessToken, tokens.accessToken);
    // Servers may omit the refresh token on refresh; the old one stays valid.
    if (tokens.refreshToken) {
      await this.secretStore.write(
        SECRET_KEYS.refreshToken,
        tokens.refreshToken
      );
    }
    await this.secretStore.write(
      SECRET_KEYS.tokenExpiry,
      String(tokens.expiresAt)
    );
    this.cachedAccessToken = tokens.accessToken;
    this.cachedExpiresAt = tokens.expiresAt;
  }
}
