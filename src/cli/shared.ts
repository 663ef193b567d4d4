/**
 * Shared CLI helpers
 * Context creation and failure reporting common to every command
 */

import chalk from "chalk";
import { ZodError } from "zod";
import { toRenderIssue } from "../modules";
import { PartialAppConfigSchema } from "../types";
import type { CliContext, PartialAppConfig } from "../types";
import {
  formatIssue,
  loadConfig,
  mapConfigError,
  mergeConfig,
  Logger,
  RenderError,
} from "../utils";

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Load configuration (default → user → custom → CLI flags) and set up logging
 */
export async function createContext(
  options: CommonOptions,
  overrides: PartialAppConfig = {},
): Promise<CliContext> {
  const { config: loaded, errors } = await loadConfig(options.config);
  const config = mergeConfig(loaded, PartialAppConfigSchema.parse(overrides));
  const logger = new Logger(options.verbose ? "debug" : config.logging.level);

  // Broken user/custom config files are skipped, not fatal
  for (const { path, error } of errors) {
    const { reason, details } = mapConfigError(error);
    logger.warn(`Ignoring config file ${path} (${reason}): ${details}`);
  }
  logger.debug(`Effective config: ${JSON.stringify(config)}`);

  return { config, logger };
}

/**
 * Describe a thrown failure in one line
 */
export function describeFailure(error: unknown): string {
  if (error instanceof RenderError || error instanceof ZodError) {
    return formatIssue(toRenderIssue(error));
  }
  return `error: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Report a failure on stderr and mark the process as failed
 */
export function fail(message: string): void {
  console.error(chalk.red(message));
  process.exitCode = 1;
}
