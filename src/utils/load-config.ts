/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and custom config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigError,
  PartialStoreConfig,
  StoreConfig,
} from "../types";
import { PartialStoreConfigSchema, StoreConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("epd-image-store", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/epd-image-store or ~/.config/epd-image-store
 * - macOS: ~/Library/Preferences/epd-image-store
 * - Windows: %APPDATA%\epd-image-store
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<StoreConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return StoreConfigSchema.parse(JSON.parse(content));
}

/**
 * Read a partial config file with Zod validation
 * Throws if the file is unreadable, not JSON, or fails the schema
 */
async function loadPartialConfig(configPath: string): Promise<PartialStoreConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialStoreConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialStoreConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Merge one layer over another, one level deep
 */
export function mergeConfig(
  base: StoreConfig,
  override: PartialStoreConfig,
): StoreConfig {
  return {
    imageDir: override.imageDir ?? base.imageDir,
    display: { ...base.display, ...override.display },
    server: { ...base.server, ...override.server },
    render: { ...base.render, ...override.render },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: StoreConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: overrides (CLI) > custom path > user config > default config
 * User/custom files that fail to load are reported in `errors` and skipped
 */
export async function loadConfig(
  custom?: string,
  overrides: PartialStoreConfig = {},
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error: toError(error) });
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error: toError(error) });
    }
  }

  // Overrides come from validated CLI options; the merged result is re-checked
  config = StoreConfigSchema.parse(mergeConfig(config, overrides));

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
