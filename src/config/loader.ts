import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import type { GridConfig } from "../types/config.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "GRIDCI_";

/** Built-in layer beneath base.yaml. */
export const DEFAULT_CONFIG: GridConfig = {
  schema_version: "1.0.0",
  max_parallel: 4,
  shell: ["bash", "-e", "-c"],
  kill_grace_ms: 5000,
  max_output_bytes: 1024 * 1024,
  workspace_strategy: "shared",
  workspace_root: ".gridci/workspaces",
  keep_workspaces: false,
  format: "human",
};

export type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isRecord(val) && isRecord(prev)) {
      result[key] = deepMerge(prev, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigRecord {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigurationError(`Failed to parse ${filePath}: ${errorMessage(e)}`, filePath);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Expected a mapping in ${filePath}`, filePath);
  }
  return parsed;
}

function coerce(key: string, value: string): unknown {
  if (key === "shell") return value.split(/\s+/).filter((part) => part.length > 0);
  if (/^\d+$/.test(value)) return Number(value);
  if (value === "true") return true;
  if (value === "false") return false;
  return value;
}

/**
 * Apply GRIDCI_ prefixed environment variable overrides for known keys only:
 * stages export GRIDCI_JOB / GRIDCI_WORKSPACE, which are not settings.
 */
export function applyEnvOverrides(config: ConfigRecord, env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // GRIDCI_MAX_PARALLEL → max_parallel
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (!(configKey in DEFAULT_CONFIG)) continue;
    result[configKey] = coerce(configKey, value);
  }
  return result;
}

/**
 * Load layered config: defaults ← base.yaml ← <envName>.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig`.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const dir = configDir ?? CONFIG_DIR;

  let merged = deepMerge({ ...DEFAULT_CONFIG }, loadYaml(path.join(dir, "base.yaml")));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  return applyEnvOverrides(merged, env);
}
