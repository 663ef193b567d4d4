/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and a custom file
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { ZodError } from "zod";
import type { AppConfig, PartialAppConfig, ConfigError } from "../types";
import { AppConfigSchema, PartialAppConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (XDG Base Directory on Linux)
const paths = envPaths("mdanchor", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/mdanchor or ~/.config/mdanchor
 * - macOS: ~/Library/Preferences/mdanchor
 * - Windows: %APPDATA%\mdanchor
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<AppConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return AppConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is unreadable, not JSON, or fails the schema
 */
export async function loadPartialConfig(
  configPath: string,
): Promise<PartialAppConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialAppConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: AppConfig,
  override: PartialAppConfig,
): AppConfig {
  return {
    input: { ...base.input, ...override.input },
    render: { ...base.render, ...override.render },
    output: { ...base.output, ...override.output },
    toc: { ...base.toc, ...override.toc },
    logging: { ...base.logging, ...override.logging },
  };
}

export type ConfigIssueReason = "invalid-json" | "schema-validation" | "read-error";

/**
 * Describe why a config file failed to load
 */
export function mapConfigError(error: unknown): {
  reason: ConfigIssueReason;
  details: string;
} {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  if (error instanceof Error) {
    return { reason: "read-error", details: error.message };
  }
  return { reason: "read-error", details: String(error) };
}

interface LoadConfigResult {
  config: AppConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load is skipped and reported in errors
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
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
