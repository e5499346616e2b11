#!/usr/bin/env node
import { existsSync } from "node:fs";
import { confirm, input, password } from "@inquirer/prompts";
import { Command } from "commander";
import { ApiClient } from "./api/client.js";
import { plainSecretFilePath, secretFilePath } from "./config/paths.js";
import { loadConfig, setSecretStore, updateConfig } from "./config/store.js";
import { AuthManager } from "./oauth/auth-manager.js";
import { LoopbackBrowserPresenter } from "./oauth/browser.js";
import {
  type ConfigurationOverrides,
  parseScopes,
  resolveAuthConfiguration,
} from "./oauth/configuration.js";
import {
  createSecretStore,
  getAuthStatus,
  SECRET_KEYS,
  type SecretStore,
} from "./security/secret-store.js";
import { FileCycleStore, latestFetchedAt } from "./sync/cycle-store.js";
import { resolveSyncIntervalMs, SyncManager } from "./sync/sync-manager.js";
import type {
  AuthStatus,
  ConfigFile,
  Cycle,
  SecretStoreKind,
  SyncOutcome,
} from "./types.js";
import {
  error,
  info,
  setLogLevel,
  setLogTarget,
  warn,
} from "./utils/log.js";
import { PACKAGE_VERSION } from "./version.js";

const DEFAULT_CYCLE_LIMIT = 14;

function normalizeSecretStore(value?: string): SecretStoreKind | null {
  if (!value) {
    return null;
  }
  const normalized = value.toLowerCase();
  if (normalized === "encrypted" || normalized === "plain") {
    return normalized;
  }
  return null;
}

function resolveSecretStoreFromConfig(config: ConfigFile): SecretStoreKind {
  if (config.secretStore) {
    return config.secretStore;
  }
  const plainExists = existsSync(plainSecretFilePath());
  const encryptedExists = existsSync(secretFilePath());
  if (encryptedExists && !plainExists) {
    return "encrypted";
  }
  return "plain";
}

function describeSecretStore(store: SecretStoreKind) {
  return store === "encrypted" ? "encrypted file" : "plaintext file";
}

async function createRuntime(overrides: ConfigurationOverrides) {
  const config = await loadConfig();
  const storeKind = resolveSecretStoreFromConfig(config);
  const secretStore = createSecretStore(storeKind);
  const configuration = await resolveAuthConfiguration({
    overrides,
    config,
    secretStore,
  });
  const auth = new AuthManager({
    configuration,
    secretStore,
    browser: new LoopbackBrowserPresenter(),
  });
  const sync = new SyncManager({
    client: new ApiClient({ auth }),
    store: new FileCycleStore(),
    intervalMs: resolveSyncIntervalMs(config),
  });
  return { auth, sync };
}

function formatTable(headers: string[], rows: string[][]) {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index].length))
  );
  const formatRow = (row: string[]) =>
    row
      .map((cell, index) => cell.padEnd(widths[index]))
      .join("  ")
      .trimEnd();
  return [
    formatRow(headers),
    formatRow(widths.map((w) => "-".repeat(w))),
    ...rows.map(formatRow),
  ].join("\n");
}

function formatCycles(cycles: Cycle[]) {
  if (cycles.length === 0) {
    return "No cycles stored. Run `cycle-sync sync` first.";
  }
  const minutes = (milli: number) => String(Math.round(milli / 60_000));
  return formatTable(
    ["Cycle", "Date", "Strain", "Recovery", "HRV", "RHR", "Sleep %", "SWS", "REM"],
    cycles.map((cycle) => [
      String(cycle.cycleId),
      cycle.date.slice(0, 10),
      cycle.strain.toFixed(1),
      String(Math.round(cycle.recoveryScore)),
      cycle.hrvRmssdMilli.toFixed(1),
      String(Math.round(cycle.restingHeartRate)),
      String(Math.round(cycle.sleepPerformance)),
      minutes(cycle.sleepSwsMilli),
      minutes(cycle.sleepRemMilli),
    ])
  );
}

function formatAuthStatus(status: AuthStatus): string {
  switch (status.status) {
    case "ok":
      return "ok";
    case "missing":
      return "needs login";
    case "expired":
      return "expired";
    case "locked":
      return "locked";
    default:
      return "unknown";
  }
}

function formatOutcome(outcome: SyncOutcome) {
  switch (outcome.status) {
    case "syncing":
      return "Syncing...";
    case "synced":
      return `Synced ${outcome.recordsUpdated} cycle(s) at ${outcome.at.toISOString()}.`;
    case "transient-error":
      return `Sync failed: ${outcome.message}`;
    case "session-expired":
      return "Session expired. Run `cycle-sync login` to reconnect.";
    default:
      return "Unknown sync status.";
  }
}

async function handleConfigure(options: ConfigurationOverrides) {
  const config = await loadConfig();
  const clientId =
    options.clientId ||
    (await input({
      message: "OAuth client ID",
      default: config.clientId,
      required: true,
    }));
  const clientSecret =
    options.clientSecret ||
    (await password({ message: "OAuth client secret", mask: "*" }));
  const patch: ConfigFile = { clientId };
  if (options.redirectUri) {
    patch.redirectUri = options.redirectUri;
  }
  if (options.scopes) {
    patch.scopes = parseScopes(options.scopes);
  }
  await updateConfig(patch);
  if (clientSecret) {
    const secretStore = createSecretStore(resolveSecretStoreFromConfig(config));
    await secretStore.write(SECRET_KEYS.clientSecret, clientSecret);
  }
  info("Configuration saved.");
}

async function handleLogin(overrides: ConfigurationOverrides) {
  const { auth } = await createRuntime(overrides);
  await auth.authorize();
}

async function handleLogout(overrides: ConfigurationOverrides) {
  const confirmed = await confirm({
    message: "Log out and delete stored tokens?",
    default: false,
  });
  if (!confirmed) {
    info("Logout cancelled.");
    return;
  }
  const { auth } = await createRuntime(overrides);
  await auth.logout();
  info("Logged out.");
}

async function handleStatus() {
  const config = await loadConfig();
  const storeKind = resolveSecretStoreFromConfig(config);
  const status = await getAuthStatus({
    secretStore: createSecretStore(storeKind),
    storeKind,
    allowPrompt: process.stdin.isTTY,
  });
  const cycles = await new FileCycleStore().list();
  info(`Auth: ${formatAuthStatus(status)}`);
  if (status.reason) {
    info(status.reason);
  }
  info(`Secret store: ${describeSecretStore(storeKind)}`);
  info(`Stored cycles: ${cycles.length}`);
  const lastFetched = latestFetchedAt(cycles);
  if (lastFetched) {
    info(`Last fetched: ${lastFetched}`);
  }
}

async function handleSync(overrides: ConfigurationOverrides) {
  const { sync } = await createRuntime(overrides);
  const outcome = await sync.performSync();
  info(formatOutcome(outcome));
  if (outcome.status !== "synced") {
    process.exitCode = 1;
  }
}

async function handleWatch(overrides: ConfigurationOverrides) {
  const { sync } = await createRuntime(overrides);
  const stop = () => {
    info("Stopping sync.");
    sync.stopSync();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  sync.startSync((outcome) => {
    info(formatOutcome(outcome));
    if (outcome.status === "session-expired") {
      process.exitCode = 1;
    }
  });
  try {
    await sync.settled();
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
}

async function handleCycles(options: { limit?: string; json?: boolean }) {
  const limit = options.limit ? Number(options.limit) : DEFAULT_CYCLE_LIMIT;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Invalid --limit: ${options.limit}`);
  }
  if (options.json) {
    setLogTarget("stderr");
  }
  const cycles = (await new FileCycleStore().list()).slice(0, limit);
  if (options.json) {
    process.stdout.write(`${JSON.stringify(cycles, null, 2)}\n`);
    return;
  }
  info(formatCycles(cycles));
}

async function migrateSecrets(from: SecretStore, to: SecretStore) {
  let migrated = 0;
  for (const key of Object.values(SECRET_KEYS)) {
    const value = await from.read(key);
    if (value === null) {
      continue;
    }
    await to.write(key, value);
    await from.delete(key);
    migrated += 1;
  }
  return migrated;
}

async function migrateSecretStoreIfConfirmed(
  fromStore: SecretStoreKind,
  toStore: SecretStoreKind
) {
  if (!process.stdin.isTTY) {
    warn(
      "No TTY available to prompt for migration. Secrets will remain in the previous store."
    );
    return false;
  }
  const shouldMigrate = await confirm({
    message: `Migrate stored secrets from ${describeSecretStore(
      fromStore
    )} to ${describeSecretStore(toStore)}?`,
    default: true,
  });
  if (!shouldMigrate) {
    return false;
  }
  const migrated = await migrateSecrets(
    createSecretStore(fromStore),
    createSecretStore(toStore)
  );
  info(`Migrated ${migrated} secret(s) to ${toStore}.`);
  return true;
}

async function handleSecretStore(storeValue?: string) {
  const config = await loadConfig();
  const current = resolveSecretStoreFromConfig(config);
  if (!storeValue) {
    info(`Current secret store: ${current}.`);
    info("Available secret stores: encrypted, plain.");
    info("Set with: cycle-sync secret-store <store>");
    return;
  }
  const normalized = normalizeSecretStore(storeValue);
  if (!normalized) {
    throw new Error("Invalid secret store. Use one of: encrypted, plain.");
  }
  if (normalized === current) {
    info(`Secret store already set to ${normalized}.`);
    return;
  }
  const migrated = await migrateSecretStoreIfConfirmed(current, normalized);
  await setSecretStore(normalized);
  info(`Secret store set to ${normalized}.`);
  if (!migrated) {
    warn(
      "Secrets remain in the previous store. Run the secret-store command again to migrate, or re-login."
    );
  }
}

function overridesFrom(program: Command): ConfigurationOverrides {
  const opts = program.opts<ConfigurationOverrides>();
  return {
    clientId: opts.clientId,
    clientSecret: opts.clientSecret,
    redirectUri: opts.redirectUri,
    scopes: opts.scopes,
  };
}

async function main() {
  const program = new Command();
  program
    .name("cycle-sync")
    .description("Sync recovery, sleep and strain cycles into a local store")
    .version(PACKAGE_VERSION)
    .option("--client-id <clientId>", "OAuth client ID")
    .option("--client-secret <clientSecret>", "OAuth client secret")
    .option("--redirect-uri <redirectUri>", "OAuth redirect URI")
    .option("--scopes <scopes>", "OAuth scopes (space or comma separated)")
    .option("--verbose", "Log debug output")
    .option("--quiet", "Only log warnings and errors")
    .hook("preAction", () => {
      const opts = program.opts<{ verbose?: boolean; quiet?: boolean }>();
      if (opts.verbose) {
        setLogLevel("debug");
      } else if (opts.quiet) {
        setLogLevel("warn");
      }
    });

  program
    .command("configure")
    .description("Store OAuth client credentials")
    .action(async () => {
      await handleConfigure(overridesFrom(program));
    });

  program
    .command("login")
    .description("Authorize in the browser and store tokens")
    .action(async () => {
      await handleLogin(overridesFrom(program));
    });

  program
    .command("logout")
    .description("Delete stored tokens")
    .action(async () => {
      await handleLogout(overridesFrom(program));
    });

  program
    .command("status")
    .description("Show auth status and stored cycle count")
    .action(handleStatus);

  program
    .command("sync")
    .description("Fetch the trailing week once and merge it")
    .action(async () => {
      await handleSync(overridesFrom(program));
    });

  program
    .command("watch")
    .description("Sync on an interval until interrupted")
    .action(async () => {
      await handleWatch(overridesFrom(program));
    });

  program
    .command("cycles")
    .option("--limit <n>", "Number of cycles to show")
    .option("--json", "Print cycles as JSON")
    .description("List stored cycles, newest first")
    .action(async (options: { limit?: string; json?: boolean }) => {
      await handleCycles(options);
    });

  program
    .command("secret-store")
    .argument("[store]", "Secret store backend (encrypted|plain)")
    .description("Show or set the secret storage backend")
    .action(async (store?: string) => {
      await handleSecretStore(store);
    });

  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
