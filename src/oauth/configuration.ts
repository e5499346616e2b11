import getPort from "get-port";
import type { SecretStore } from "../security/secret-store.js";
import { SECRET_KEYS } from "../security/secret-store.js";
import type { AuthConfiguration, ConfigFile } from "../types.js";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_SCOPES = [
  "read:recovery",
  "read:cycles",
  "read:sleep",
  "offline",
];

export const AUTHORIZATION_URL =
  process.env.CYCLE_SYNC_AUTHORIZATION_URL ??
  "https://api.prod.whoop.com/oauth/oauth2/auth";
export const TOKEN_URL =
  process.env.CYCLE_SYNC_TOKEN_URL ??
  "https://api.prod.whoop.com/oauth/oauth2/token";
export const API_BASE_URL =
  process.env.CYCLE_SYNC_API_BASE_URL ?? "https://api.prod.whoop.com/developer";

const DEFAULT_CALLBACK_PORT = 3334;
const SCOPE_SPLIT_RE = /[ ,]+/;

export type ConfigurationOverrides = {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  scopes?: string;
};

export function parseScopes(scopes?: string) {
  if (!scopes) {
    return DEFAULT_SCOPES;
  }
  return scopes
    .split(SCOPE_SPLIT_RE)
    .map((scope) => scope.trim())
    .filter(Boolean);
}

export async function resolveRedirectUri(configured?: string) {
  if (configured) {
    return configured;
  }
  const port = await getPort({ port: DEFAULT_CALLBACK_PORT });
  return `http://127.0.0.1:${port}/oauth/callback`;
}

/**
 * Builds the process-wide OAuth configuration. Each value comes from the
 * first source that has it: explicit overrides, the environment, the config
 * file, then (client secret only) the secret store.
 */
export async function resolveAuthConfiguration(options: {
  overrides?: ConfigurationOverrides;
  config: ConfigFile;
  secretStore: SecretStore;
}): Promise<AuthConfiguration> {
  const { overrides, config, secretStore } = options;
  const clientId =
    overrides?.clientId ||
    process.env.CYCLE_SYNC_CLIENT_ID ||
    process.env.WHOOP_CLIENT_ID ||
    config.clientId ||
    "";
  const clientSecret =
    overrides?.clientSecret ||
    process.env.CYCLE_SYNC_CLIENT_SECRET ||
    process.env.WHOOP_CLIENT_SECRET ||
    (await secretStore.read(SECRET_KEYS.clientSecret)) ||
    "";
  const scopeOverride = overrides?.scopes || process.env.CYCLE_SYNC_SCOPES;
  const scopes = scopeOverride
    ? parseScopes(scopeOverride)
    : (config.scopes ?? DEFAULT_SCOPES);
  const redirectUri = await resolveRedirectUri(
    overrides?.redirectUri ||
      process.env.CYCLE_SYNC_REDIRECT_URI ||
      config.redirectUri
  );
  return Object.freeze({
    clientId,
    clientSecret,
    redirectUri,
    scopes: Object.freeze([...scopes]),
    authorizationUrl: AUTHORIZATION_URL,
    tokenUrl: TOKEN_URL,
  });
}

export function validateConfiguration(configuration: AuthConfiguration) {
  if (!configuration.clientId) {
    throw new ConfigurationError("clientId");
  }
  if (!configuration.clientSecret) {
    throw new ConfigurationError("clientSecret");
  }
}
