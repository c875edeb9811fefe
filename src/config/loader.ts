import { readFileSync } from "node:fs";
import type { AgentConfig } from "./types.js";
import { resolveConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export type ConfigFile =
  | { found: false; path: string }
  | { found: true; path: string; raw: unknown };

/** Replaces `${env:NAME}` references. A reference to an unset variable is an error. */
export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Reads and substitutes the config file without validating it. */
export function readConfigFile(path?: string): ConfigFile {
  const configPath = resolveConfigPath(path);
  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return { found: false, path: configPath };
    throw err;
  }
  const raw: unknown = JSON.parse(substituteEnv(content));
  return { found: true, path: configPath, raw };
}

/** A missing file yields the all-defaults config. */
export function loadConfig(path?: string): AgentConfig {
  const file = readConfigFile(path);
  return parseConfig(file.found ? file.raw : {});
}
