import { afterEach, expect, test, vi } from "vitest";
import { ApiClient, type FetchRange } from "../src/api/client.js";
import {
  MaxRetriesExceededError,
  SessionExpiredError,
  UnauthorizedError,
} from "../src/api/errors.js";
import type {
  RecoveryPage,
  SleepPage,
  StrainPage,
} from "../src/api/schemas.js";
import type { TokenProvider } from "../src/oauth/auth-manager.js";
import { MemoryCycleStore } from "../src/sync/cycle-store.js";
import {
  DEFAULT_SYNC_INTERVAL_MS,
  resolveSyncIntervalMs,
  type SyncClient,
  SyncManager,
} from "../src/sync/sync-manager.js";
import type { SyncOutcome } from "../src/types.js";
import type { Sleep } from "../src/utils/timers.js";
import { createFetchMock, status } from "./fixtures/fetch-mock.js";
import {
  rawRecovery,
  rawSleep,
  rawStrain,
  recoveryRecords,
  sleepRecords,
  strainRecords,
} from "./fixtures/records.js";

const NOW = new Date("2025-01-08T00:00:00Z");
const WEEK_AGO = new Date("2025-01-01T00:00:00Z");

class FakeClient implements SyncClient {
  readonly calls: { resource: string; range: FetchRange }[] = [];
  failure: unknown = null;

  fetchRecovery(range: FetchRange = {}): Promise<RecoveryPage> {
    this.calls.push({ resource: "recovery", range });
    return this.respond({
      records: recoveryRecords(rawRecovery(1), rawRecovery(2)),
      nextToken: null,
    });
  }

  fetchSleep(range: FetchRange = {}): Promise<SleepPage> {
    this.calls.push({ resource: "sleep", range });
    return this.respond({
      records: sleepRecords(
        rawSleep({ id: "s1", cycleId: 1, end: "2025-01-02T07:00:00Z" })
      ),
      nextToken: null,
    });
  }

  fetchStrain(range: FetchRange = {}): Promise<StrainPage> {
    this.calls.push({ resource: "strain", range });
    if (range.nextToken === "page-2") {
      return this.respond({
        records: strainRecords(rawStrain(2, "2025-01-03T00:00:00Z")),
        nextToken: null,
      });
    }
    return this.respond({
      records: strainRecords(rawStrain(1, "2025-01-02T00:00:00Z")),
      nextToken: "page-2",
    });
  }

  private respond<T>(page: T) {
    if (this.failure !== null) {
      return Promise.reject(this.failure);
    }
    return Promise.resolve(page);
  }
}

/** A sleep that only ends when woken or aborted. */
function manualSleep() {
  const waits: number[] = [];
  const wakers: (() => void)[] = [];
  const sleep: Sleep = (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      waits.push(ms);
      wakers.push(resolve);
      signal?.addEventListener("abort", () => reject(signal.reason), {
        once: true,
      });
    });
  const wake = () => {
    wakers.shift()?.();
  };
  return { waits, sleep, wake };
}

function createManager(client: SyncClient, sleep?: Sleep) {
  const store = new MemoryCycleStore({ now: () => NOW });
  const manager = new SyncManager({
    client,
    store,
    intervalMs: 1000,
    sleep,
    now: () => NOW,
  });
  return { manager, store };
}

afterEach(() => {
  vi.unstubAllEnvs();
});

test("performSync drains every page of the trailing week", async () => {
  const client = new FakeClient();
  const { manager, store } = createManager(client);

  const outcome = await manager.performSync();

  expect(outcome).toEqual({ status: "synced", at: NOW, recordsUpdated: 2 });
  const strainCalls = client.calls.filter((call) => call.resource === "strain");
  expect(strainCalls.map((call) => call.range.nextToken)).toEqual([
    undefined,
    "page-2",
  ]);
  for (const call of client.calls) {
    expect(call.range.start).toEqual(WEEK_AGO);
    expect(call.range.end).toEqual(NOW);
  }
  const rows = await store.list();
  expect(rows.map((row) => row.cycleId)).toEqual([2, 1]);
  expect(rows[1].sleepPerformance).toBe(88);
});

test("performSync twice does not duplicate cycles", async () => {
  const { manager, store } = createManager(new FakeClient());

  await manager.performSync();
  await manager.performSync();

  expect(await store.list()).toHaveLength(2);
});

test("session failures are reported as session-expired", async () => {
  const client = new FakeClient();
  const { manager } = createManager(client);

  client.failure = new SessionExpiredError(new Error("invalid_grant"));
  await expect(manager.performSync()).resolves.toEqual({
    status: "session-expired",
  });

  client.failure = new UnauthorizedError();
  await expect(manager.performSync()).resolves.toEqual({
    status: "session-expired",
  });
});

test("other failures are transient and leave the store untouched", async () => {
  const client = new FakeClient();
  const { manager, store } = createManager(client);
  client.failure = new MaxRetriesExceededError(3, null);

  await expect(manager.performSync()).resolves.toEqual({
    status: "transient-error",
    message: "Request failed after 3 retries.",
  });
  expect(await store.list()).toEqual([]);
});

test("the loop reports each iteration and sleeps between them", async () => {
  const client = new FakeClient();
  const { waits, sleep, wake } = manualSleep();
  const { manager } = createManager(client, sleep);
  const outcomes: SyncOutcome[] = [];

  manager.startSync((outcome) => outcomes.push(outcome));
  await vi.waitFor(() => expect(waits).toHaveLength(1));
  client.failure = new Error("offline");
  wake();
  await vi.waitFor(() => expect(waits).toHaveLength(2));

  manager.stopSync();
  await manager.settled();

  expect(outcomes.map((outcome) => outcome.status)).toEqual([
    "syncing",
    "synced",
    "syncing",
    "transient-error",
  ]);
  expect(waits).toEqual([1000, 1000]);
  expect(manager.isRunning).toBe(false);
});

test("the loop ends on session-expired", async () => {
  const client = new FakeClient();
  client.failure = new SessionExpiredError(new Error("invalid_grant"));
  const { waits, sleep } = manualSleep();
  const { manager } = createManager(client, sleep);
  const outcomes: SyncOutcome[] = [];

  manager.startSync((outcome) => outcomes.push(outcome));
  await manager.settled();

  expect(outcomes).toEqual([
    { status: "syncing" },
    { status: "session-expired" },
  ]);
  expect(waits).toEqual([]);
  expect(manager.isRunning).toBe(false);
});

test("starting again supersedes the running loop", async () => {
  const { waits, sleep } = manualSleep();
  const { manager } = createManager(new FakeClient(), sleep);
  const first: SyncOutcome[] = [];
  const second: SyncOutcome[] = [];

  manager.startSync((outcome) => first.push(outcome));
  await vi.waitFor(() => expect(waits).toHaveLength(1));
  manager.startSync((outcome) => second.push(outcome));
  await vi.waitFor(() => expect(waits).toHaveLength(2));
  manager.stopSync();
  await manager.settled();

  expect(first.map((outcome) => outcome.status)).toEqual(["syncing", "synced"]);
  expect(second.map((outcome) => outcome.status)).toEqual([
    "syncing",
    "synced",
  ]);
});

test("stopSync during backoff prevents further requests", async () => {
  const auth: TokenProvider = {
    validAccessToken: () => Promise.resolve("access"),
    refreshTokens: () => Promise.resolve(),
  };
  const { fetchFn, requests } = createFetchMock(() => status(429));
  const backoff = manualSleep();
  const client = new ApiClient({
    auth,
    baseUrl: "https://api.example.com/developer",
    fetchFn,
    sleep: backoff.sleep,
  });
  const { manager } = createManager(client, manualSleep().sleep);
  const outcomes: SyncOutcome[] = [];

  manager.startSync((outcome) => outcomes.push(outcome));
  await vi.waitFor(() => expect(backoff.waits).toHaveLength(3));
  manager.stopSync();
  await manager.settled();

  expect(requests).toHaveLength(3);
  expect(backoff.waits).toEqual([1000, 1000, 1000]);
  expect(outcomes).toEqual([{ status: "syncing" }]);
});

test("a failed fetch cancels the other fetches of the same sync", async () => {
  const auth: TokenProvider = {
    validAccessToken: () => Promise.resolve("access"),
    refreshTokens: () => Promise.resolve(),
  };
  const { fetchFn, requests } = createFetchMock((request) =>
    request.url.includes("/v2/recovery") ? status(404) : status(429)
  );
  const backoff = manualSleep();
  const client = new ApiClient({
    auth,
    baseUrl: "https://api.example.com/developer",
    fetchFn,
    sleep: backoff.sleep,
  });
  const { manager } = createManager(client);

  const outcome = await manager.performSync();
  const issued = requests.length;
  for (let i = 0; i < 6; i += 1) {
    backoff.wake();
  }
  await new Promise((resolve) => setTimeout(resolve, 10));

  expect(outcome).toEqual({
    status: "transient-error",
    message: "Server error (HTTP 404).",
  });
  expect(issued).toBeLessThanOrEqual(3);
  expect(requests).toHaveLength(issued);
});

test("sync interval comes from the environment, then the config", () => {
  expect(resolveSyncIntervalMs()).toBe(DEFAULT_SYNC_INTERVAL_MS);
  expect(resolveSyncIntervalMs({ syncIntervalMs: 5000 })).toBe(5000);

  vi.stubEnv("CYCLE_SYNC_INTERVAL_MS", "2500");
  expect(resolveSyncIntervalMs({ syncIntervalMs: 5000 })).toBe(2500);

  vi.stubEnv("CYCLE_SYNC_INTERVAL_MS", "soon");
  expect(resolveSyncIntervalMs({ syncIntervalMs: 5000 })).toBe(5000);
});
