import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

export const STATE_DIR_ENV = "TIDEPOOL_STATE_DIR";
export const CONFIG_PATH_ENV = "TIDEPOOL_CONFIG_PATH";
export const DB_FILENAME = "agent.db";

/** Directory holding the database; overridable for tests and multiple agents. */
export function getStateDir(): string {
  return process.env[STATE_DIR_ENV] ?? join(homedir(), ".tidepool");
}

export function getConfigPath(): string {
  return process.env[CONFIG_PATH_ENV] ?? "tidepool.config.json";
}

/** Absolute config path: an explicit argument wins over the environment. */
export function resolveConfigPath(path?: string): string {
  return resolve(path ?? getConfigPath());
}

export function getDbPath(stateDir: string): string {
  return join(stateDir, DB_FILENAME);
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
