/**
 * Helpers shared by the CLI commands
 */

import { loadConfig } from "../../utils/load-config";
import { Logger } from "../../utils/logger";
import { MissingEnvironmentError } from "../../utils/errors";
import type { AppConfig } from "../../types";

/**
 * Load configuration and report files that were skipped
 */
export async function loadCommandConfig(
  configPath: string | undefined,
  verbose = false,
): Promise<{ config: AppConfig; logger: Logger }> {
  const { config, errors } = await loadConfig(configPath);

  if (verbose) {
    config.logging.level = "debug";
  }
  const logger = new Logger(config.logging.level);

  for (const { path, error } of errors) {
    logger.warn(`Ignoring config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return { config, logger };
}

/**
 * Print a command failure; configuration problems need no stack trace
 */
export function reportCommandError(error: unknown): void {
  if (error instanceof MissingEnvironmentError) {
    console.error(`Error: ${error.message}`);
    return;
  }
  console.error(error);
}
