export {
  ApiClient,
  type ApiClientOptions,
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  type FetchRange,
  type RetryPolicy,
} from "./api/client.js";
export * from "./api/errors.js";
export { collectPages } from "./api/pagination.js";
export type {
  Page,
  RecoveryPage,
  RecoveryRecord,
  SleepPage,
  SleepRecord,
  StrainPage,
  StrainRecord,
} from "./api/schemas.js";
export {
  AuthManager,
  buildAuthorizationUrl,
  extractAuthorizationCode,
  TOKEN_EXPIRY_MARGIN_MS,
  type TokenProvider,
} from "./oauth/auth-manager.js";
export {
  type BrowserPresenter,
  LoopbackBrowserPresenter,
} from "./oauth/browser.js";
export {
  DEFAULT_SCOPES,
  resolveAuthConfiguration,
  validateConfiguration,
} from "./oauth/configuration.js";
export * from "./oauth/errors.js";
export { generatePKCE } from "./oauth/pkce.js";
export {
  createSecretStore,
  EncryptedFileSecretStore,
  getAuthStatus,
  PlaintextSecretStore,
  SECRET_KEYS,
  type SecretStore,
} from "./security/secret-store.js";
export { FileCycleStore, MemoryCycleStore } from "./sync/cycle-store.js";
export { mergeAndPersist } from "./sync/merge.js";
export {
  type StatusListener,
  type SyncClient,
  SyncManager,
} from "./sync/sync-manager.js";
export type { CycleStore, CycleTransaction } from "./sync/types.js";
export type * from "./types.js";
