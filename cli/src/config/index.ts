import * as fs from "node:fs";
import * as path from "node:path";
import yaml from "js-yaml";
import { AppConfigSchema } from "./schema.js";
import type { AppConfig } from "./schema.js";
import type { SyncLayout } from "../store/interface.js";

export const CONFIG_FILE_NAME = "relay.yaml";

const ENV_PREFIX = "RELAY_";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced, not merged.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (isRecord(srcVal) && isRecord(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

/**
 * Parse env vars with RELAY_ prefix into nested config.
 * Example: RELAY_SYNC_AUTO_COMMIT=false -> { sync: { auto_commit: false } }
 */
function parseEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, Record<string, unknown>> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const parts = key.slice(ENV_PREFIX.length).toLowerCase().split("_");
    if (parts.length < 2) continue;

    const section = parts[0];
    const field = parts.slice(1).join("_");

    let parsed: unknown = value;
    if (value === "true") parsed = true;
    else if (value === "false") parsed = false;

    result[section] = { ...result[section], [field]: parsed };
  }

  return result;
}

/**
 * Load configuration from a YAML file, environment variables, and defaults.
 * Priority: env vars > YAML file > schema defaults
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  let fileConfig: Record<string, unknown> = {};

  if (configPath !== undefined && fs.existsSync(configPath)) {
    const loaded: unknown = yaml.load(fs.readFileSync(configPath, "utf-8"));
    if (isRecord(loaded)) fileConfig = loaded;
  }

  const merged = deepMerge(fileConfig, parseEnvOverrides(env));
  return AppConfigSchema.parse(merged);
}

/**
 * Resolve the store's directories against the sync root.
 * Absolute paths in config are kept as they are.
 */
export function resolveSyncLayout(config: AppConfig, root: string): SyncLayout {
  const abs = path.resolve(root);
  return {
    root: abs,
    pendingDir: path.resolve(abs, config.sync.pending_dir),
    archiveDir: path.resolve(abs, config.sync.archive_dir),
    stateDir: path.resolve(abs, config.sync.state_dir),
    autoCommit: config.sync.auto_commit,
  };
}

export type { AppConfig, LogLevel } from "./schema.js";
