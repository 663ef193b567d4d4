/**
 * CLI context - flows through every command
 * Each command reads what it needs from it
 */

import type { AppConfig } from "./config";
import type { Logger } from "../utils/logger";

export interface ConfigError {
  path: string;
  error: unknown;
}

export interface CliContext {
  config: AppConfig;
  logger: Logger;
}
