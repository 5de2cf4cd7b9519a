/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { AppConfig, ConfigError, PartialAppConfig } from "../types";
import { AppConfigSchema, PartialAppConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// OS-specific paths (XDG on Linux, ~/Library/Preferences on macOS, %APPDATA% on Windows)
const paths = envPaths("rfclink", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<AppConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return AppConfigSchema.parse(parsed);
}

/**
 * Read and validate a partial config file
 * Throws if the file is not valid JSON or fails the schema
 */
async function loadPartialConfig(configPath: string): Promise<PartialAppConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialAppConfigSchema.parse(parsed);
}

async function loadUserConfig(): Promise<PartialAppConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: AppConfig,
  override: PartialAppConfig,
): AppConfig {
  return {
    citations: { ...base.citations, ...override.citations },
    server: { ...base.server, ...override.server },
    backend: { ...base.backend, ...override.backend },
    templates: { ...base.templates, ...override.templates },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: AppConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
