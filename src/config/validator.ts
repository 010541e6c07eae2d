import { ConfigurationError } from "../core/errors.js";
import { deepMerge, loadConfig } from "./loader.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { GridConfig } from "../types/config.js";

export type ConfigValidationResult =
  | { valid: true; config: GridConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against schemas/config.schema.json. */
export function validateConfig(config: unknown, registry: SchemaRegistry = createRegistry()): ConfigValidationResult {
  if (registry.matches<GridConfig>("config", config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: registry.errorsFor("config") };
}

export function requireValidConfig(config: unknown, registry?: SchemaRegistry): GridConfig {
  const res = validateConfig(config, registry);
  if (!res.valid) throw new ConfigurationError(`Invalid settings: ${res.errors}`);
  return res.config;
}

export type SettingsOptions = {
  configDir?: string;
  /** Name of the overlay file, e.g. "ci" for config/ci.yaml. */
  envName?: string;
  processEnv?: NodeJS.ProcessEnv;
  /** Command-line values; applied last. */
  overrides?: Partial<GridConfig>;
  registry?: SchemaRegistry;
};

/** Layered settings plus command-line overrides, validated. */
export function resolveSettings(opts: SettingsOptions = {}): GridConfig {
  const loaded = loadConfig(opts.envName, opts.configDir, opts.processEnv);
  const merged = deepMerge(loaded, { ...opts.overrides });
  return requireValidConfig(merged, opts.registry);
}
