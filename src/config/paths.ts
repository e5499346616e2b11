import os from "node:os";
import path from "node:path";

export function configDir() {
  return process.env.CYCLE_SYNC_HOME || path.join(os.homedir(), ".cycle-sync");
}

export function configFilePath() {
  return path.join(configDir(), "config.json");
}

export function secretFilePath() {
  return path.join(configDir(), "secrets.enc.json");
}

export function plainSecretFilePath() {
  return path.join(configDir(), "secrets.json");
}

export function cycleFilePath() {
  return path.join(configDir(), "cycles.json");
}
