import type { ApiClient } from "../api/client.js";
import { SessionExpiredError, UnauthorizedError } from "../api/errors.js";
import { collectPages } from "../api/pagination.js";
import { describeCause } from "../oauth/errors.js";
import type { ConfigFile, SyncOutcome } from "../types.js";
import { debug, info, warn } from "../utils/log.js";
import { type Sleep, sleep } from "../utils/timers.js";
import { mergeAndPersist } from "./merge.js";
import type { CycleStore } from "./types.js";

export const DEFAULT_SYNC_INTERVAL_MS = 30 * 60 * 1000;
export const DEFAULT_WINDOW_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export type SyncClient = Pick<
  ApiClient,
  "fetchRecovery" | "fetchSleep" | "fetchStrain"
>;

export type StatusListener = (outcome: SyncOutcome) => void;

export function resolveSyncIntervalMs(config?: ConfigFile) {
  const raw = process.env.CYCLE_SYNC_INTERVAL_MS;
  if (raw) {
    const parsed = Number(raw);
    if (Number.isFinite(parsed) && parsed > 0) {
      return Math.floor(parsed);
    }
    warn(`Ignoring CYCLE_SYNC_INTERVAL_MS=${raw}: expected a positive number.`);
  }
  return config?.syncIntervalMs ?? DEFAULT_SYNC_INTERVAL_MS;
}

function isSessionEnding(err: unknown) {
  return err instanceof UnauthorizedError || err instanceof SessionExpiredError;
}

export class SyncManager {
  private readonly client: SyncClient;
  private readonly store: CycleStore;
  private readonly intervalMs: number;
  private readonly windowDays: number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private controller: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;

  constructor(options: {
    client: SyncClient;
    store: CycleStore;
    intervalMs?: number;
    windowDays?: number;
    sleep?: Sleep;
    now?: () => Date;
  }) {
    this.client = options.client;
    this.store = options.store;
    this.intervalMs = options.intervalMs ?? DEFAULT_SYNC_INTERVAL_MS;
    this.windowDays = options.windowDays ?? DEFAULT_WINDOW_DAYS;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  get isRunning() {
    return this.controller !== null;
  }

  /** Resolves once the current loop, if any, has fully ended. */
  settled() {
    return this.loopPromise ?? Promise.resolve();
  }

  /** Starts a new loop, superseding any loop already running. */
  startSync(onStatusChange: StatusListener) {
    this.stopSync();
    const controller = new AbortController();
    this.controller = controller;
    this.loopPromise = this.runLoop(controller.signal, onStatusChange)
      .catch((err) => {
        warn(`Sync loop stopped: ${describeCause(err)}`);
      })
      .finally(() => {
        if (this.controller === controller) {
          this.controller = null;
        }
      });
  }

  stopSync() {
    if (!this.controller) {
      return;
    }
    this.controller.abort(new Error("Sync stopped."));
    this.controller = null;
    debug("Sync loop cancelled.");
  }

  private async runLoop(signal: AbortSignal, onStatusChange: StatusListener) {
    while (!signal.aborted) {
      onStatusChange({ status: "syncing" });
      const outcome = await this.performSync(signal);
      if (signal.aborted) {
        return;
      }
      onStatusChange(outcome);
      if (outcome.status === "session-expired") {
        warn("Session expired; sync loop stopped. Run `cycle-sync login`.");
        return;
      }
      try {
        await this.sleep(this.intervalMs, signal);
      } catch (err) {
        if (signal.aborted) {
          return;
        }
        throw err;
      }
    }
  }

  /**
   * Fetches the trailing window, merges it, and reports. Never throws.
   * The three fetches share one signal, so a failure in any of them
   * cancels the others before the outcome is returned.
   */
  async performSync(signal?: AbortSignal): Promise<SyncOutcome> {
    const end = this.now();
    const start = new Date(end.getTime() - this.windowDays * DAY_MS);
    const fanOut = new AbortController();
    const follow = () => fanOut.abort(signal?.reason);
    if (signal?.aborted) {
      follow();
    } else {
      signal?.addEventListener("abort", follow, { once: true });
    }
    const range = { start, end, signal: fanOut.signal };
    try {
      const [recovery, sleepRecords, strain] = await Promise.all([
        collectPages((nextToken) =>
          this.client.fetchRecovery({ ...range, nextToken })
        ),
        collectPages((nextToken) =>
          this.client.fetchSleep({ ...range, nextToken })
        ),
        collectPages((nextToken) =>
          this.client.fetchStrain({ ...range, nextToken })
        ),
      ]);
      const recordsUpdated = await mergeAndPersist(
        this.store,
        { recovery, sleep: sleepRecords, strain },
        this.now()
      );
      const at = this.now();
      info(`Synced ${recordsUpdated} cycle(s).`);
      return { status: "synced", at, recordsUpdated };
    } catch (err) {
      fanOut.abort(new Error("Sync cycle failed."));
      if (isSessionEnding(err)) {
        return { status: "session-expired" };
      }
      const message = describeCause(err);
      if (!signal?.aborted) {
        warn(`Sync failed: ${message}`);
      }
      return { status: "transient-error", message };
    } finally {
      signal?.removeEventListener("abort", follow);
    }
  }
}
