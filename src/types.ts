export type TokenSet = {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number;
  tokenType?: string;
};

export type PKCEPair = {
  codeVerifier: string;
  codeChallenge: string;
};

export type AuthConfiguration = {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly redirectUri: string;
  readonly scopes: readonly string[];
  readonly authorizationUrl: string;
  readonly tokenUrl: string;
};

export type AuthState =
  | "unauthenticated"
  | "authorizing"
  | "authorized"
  | "refreshing"
  | "session-expired";

export type SecretStoreKind = "encrypted" | "plain";

export type AuthStatus = {
  status: "ok" | "missing" | "expired" | "locked";
  reason?: string;
};

export type ConfigFile = {
  clientId?: string;
  redirectUri?: string;
  scopes?: string[];
  secretStore?: SecretStoreKind;
  syncIntervalMs?: number;
};

export type Cycle = {
  cycleId: number;
  date: string;
  strain: number;
  kilojoules: number;
  averageHeartRate: number;
  maxHeartRate: number;
  recoveryScore: number;
  hrvRmssdMilli: number;
  restingHeartRate: number;
  sleepPerformance: number;
  sleepSwsMilli: number;
  sleepRemMilli: number;
  fetchedAt: string;
};

export type SyncOutcome =
  | { status: "syncing" }
  | { status: "synced"; at: Date; recordsUpdated: number }
  | { status: "transient-error"; message: string }
  | { status: "session-expired" };
