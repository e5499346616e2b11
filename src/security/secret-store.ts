import crypto from "node:crypto";
import { password as promptPassword } from "@inquirer/prompts";
import PQueue from "p-queue";
import { z } from "zod";
import { plainSecretFilePath, secretFilePath } from "../config/paths.js";
import type { AuthStatus, SecretStoreKind } from "../types.js";
import { atomicWrite, readFileIfExists } from "../utils/fs.js";

export type SecretStore = {
  read(key: string): Promise<string | null>;
  write(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
};

export const SECRET_KEYS = {
  accessToken: "access_token",
  refreshToken: "refresh_token",
  tokenExpiry: "token_expiry",
  clientSecret: "client_secret",
} as const;

const PASSWORD_ENV = "CYCLE_SYNC_SECRET_PASSWORD";

const secretMapSchema = z.record(z.string());
const encryptedPayloadSchema = z.object({
  version: z.literal(1),
  salt: z.string(),
  iv: z.string(),
  tag: z.string(),
  ciphertext: z.string(),
});

type SecretMap = Record<string, string>;

let cachedPassword: string | null = null;
const fileStoreQueue = new PQueue({ concurrency: 1 });

export function resetCachedPassword() {
  cachedPassword = null;
}

async function getMasterPassword(intent: "read" | "write") {
  if (cachedPassword !== null) {
    return cachedPassword;
  }
  const fromEnv = process.env[PASSWORD_ENV];
  if (fromEnv !== undefined) {
    cachedPassword = fromEnv;
    return cachedPassword;
  }
  if (!process.stdin.isTTY) {
    throw new Error(
      `Encrypted secret store requires a password. Set ${PASSWORD_ENV} to run non-interactively.`
    );
  }
  cachedPassword = await promptPassword({
    message:
      intent === "read"
        ? "Enter master password to unlock stored credentials"
        : "Create a master password to encrypt stored credentials",
    mask: "*",
  });
  return cachedPassword;
}

type EncryptedPayload = z.infer<typeof encryptedPayloadSchema>;

function deriveKey(password: string, salt: Buffer) {
  return crypto.scryptSync(password, salt, 32);
}

function encryptSecrets(
  password: string,
  secrets: SecretMap
): EncryptedPayload {
  const salt = crypto.randomBytes(16);
  const iv = crypto.randomBytes(12);
  const key = deriveKey(password, salt);
  const cipher = crypto.createCipheriv("aes-256-gcm", key, iv);
  const ciphertext = Buffer.concat([
    cipher.update(JSON.stringify(secrets), "utf8"),
    cipher.final(),
  ]);
  return {
    version: 1,
    salt: salt.toString("base64"),
    iv: iv.toString("base64"),
    tag: cipher.getAuthTag().toString("base64"),
    ciphertext: ciphertext.toString("base64"),
  };
}

function decryptSecrets(password: string, payload: EncryptedPayload) {
  const key = deriveKey(password, Buffer.from(payload.salt, "base64"));
  const decipher = crypto.createDecipheriv(
    "aes-256-gcm",
    key,
    Buffer.from(payload.iv, "base64")
  );
  decipher.setAuthTag(Buffer.from(payload.tag, "base64"));
  const plain = Buffer.concat([
    decipher.update(Buffer.from(payload.ciphertext, "base64")),
    decipher.final(),
  ]).toString("utf8");
  return secretMapSchema.parse(JSON.parse(plain));
}

/**
 * A whole-file secret map. Reads go straight to disk; writes and deletes run
 * load, change, save inside the shared file queue.
 */
abstract class FileSecretStore implements SecretStore {
  protected abstract load(intent: "read" | "write"): Promise<SecretMap>;
  protected abstract save(secrets: SecretMap): Promise<void>;

  async read(key: string) {
    const secrets = await this.load("read");
    return secrets[key] ?? null;
  }

  async write(key: string, value: string) {
    await this.update("write", (secrets) => {
      secrets[key] = value;
      return true;
    });
  }

  async delete(key: string) {
    await this.update("read", (secrets) => {
      if (!(key in secrets)) {
        return false;
      }
      delete secrets[key];
      return true;
    });
  }

  private async update(
    intent: "read" | "write",
    change: (secrets: SecretMap) => boolean
  ) {
    await fileStoreQueue.add(async () => {
      const secrets = await this.load(intent);
      if (change(secrets)) {
        await this.save(secrets);
      }
    });
  }
}

export class EncryptedFileSecretStore extends FileSecretStore {
  protected async load(intent: "read" | "write"): Promise<SecretMap> {
    const password = await getMasterPassword(intent);
    const raw = await readFileIfExists(secretFilePath());
    if (raw === null) {
      return {};
    }
    return decryptSecrets(
      password,
      encryptedPayloadSchema.parse(JSON.parse(raw))
    );
  }

  protected async save(secrets: SecretMap) {
    const payload = encryptSecrets(await getMasterPassword("write"), secrets);
    await atomicWrite(secretFilePath(), JSON.stringify(payload, null, 2));
  }
}

export class PlaintextSecretStore extends FileSecretStore {
  protected async load(): Promise<SecretMap> {
    const raw = await readFileIfExists(plainSecretFilePath());
    return raw === null ? {} : secretMapSchema.parse(JSON.parse(raw));
  }

  protected async save(secrets: SecretMap) {
    await atomicWrite(plainSecretFilePath(), JSON.stringify(secrets, null, 2));
  }
}

export function parseExpiry(raw: string | null) {
  if (raw === null) {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export async function getAuthStatus(options: {
  secretStore: SecretStore;
  storeKind: SecretStoreKind;
  allowPrompt?: boolean;
}): Promise<AuthStatus> {
  const allowPrompt = options.allowPrompt ?? false;
  if (
    options.storeKind === "encrypted" &&
    !allowPrompt &&
    cachedPassword === null &&
    process.env[PASSWORD_ENV] === undefined
  ) {
    return {
      status: "locked",
      reason: `Encrypted secret store is locked. Set ${PASSWORD_ENV} or run interactively.`,
    };
  }
  const accessToken = await options.secretStore.read(SECRET_KEYS.accessToken);
  if (!accessToken) {
    return {
      status: "missing",
      reason: "No tokens found. Run `cycle-sync login` to authenticate.",
    };
  }
  const expiresAt = parseExpiry(
    await options.secretStore.read(SECRET_KEYS.tokenExpiry)
  );
  const refreshToken = await options.secretStore.read(
    SECRET_KEYS.refreshToken
  );
  if (expiresAt !== null && expiresAt < Date.now() && !refreshToken) {
    return {
      status: "expired",
      reason:
        "Token expired and no refresh token is available. Run `cycle-sync login` again.",
    };
  }
  return { status: "ok" };
}

export function createSecretStore(kind: SecretStoreKind): SecretStore {
  if (kind === "plain") {
    return new PlaintextSecretStore();
  }
  return new EncryptedFileSecretStore();
}
