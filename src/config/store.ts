import { z } from "zod";
import type { ConfigFile, SecretStoreKind } from "../types.js";
import { atomicWrite, readFileIfExists } from "../utils/fs.js";
import { configFilePath } from "./paths.js";

const configFileSchema = z.object({
  clientId: z.string().optional(),
  redirectUri: z.string().optional(),
  scopes: z.array(z.string()).optional(),
  secretStore: z.enum(["encrypted", "plain"]).optional(),
  syncIntervalMs: z.number().int().positive().optional(),
});

export async function loadConfig(): Promise<ConfigFile> {
  const filePath = configFilePath();
  const raw = await readFileIfExists(filePath);
  if (raw === null) {
    return {};
  }
  const parsed = configFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(
      `Invalid config file at ${filePath}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`
    );
  }
  return parsed.data;
}

export async function saveConfig(config: ConfigFile) {
  await atomicWrite(configFilePath(), JSON.stringify(config, null, 2));
}

export async function updateConfig(patch: Partial<ConfigFile>) {
  const config = await loadConfig();
  const next = { ...config, ...patch };
  await saveConfig(next);
  return next;
}

export async function setSecretStore(secretStore: SecretStoreKind) {
  await updateConfig({ secretStore });
}
