/**
 * Site context factory
 */

import { createCitationLinker } from "../citations";
import { loadPageTemplates } from "../templates";
import { HttpBackendClient } from "../utils/backend-client";
import { Logger } from "../utils/logger";
import type { AppConfig, SiteContext, SiteEnv } from "../types";

/**
 * Wire configuration, environment and templates into a site context
 * Throws if a configured template file cannot be read
 */
export async function createSiteContext(
  config: AppConfig,
  env: SiteEnv,
  logger: Logger = new Logger(config.logging.level),
): Promise<SiteContext> {
  const templates = await loadPageTemplates(
    config.templates,
    createCitationLinker(config.citations),
  );

  const backend = new HttpBackendClient({
    baseUrl: env.backendUrl,
    apiKey: env.backendApiKey,
    checkSmtpTls: env.checkSmtpTls,
    timeout: config.backend.timeout,
    retries: config.backend.retries,
    logger,
  });

  return { config, env, logger, backend, templates };
}
