/**
 * Site context - built once at startup and shared by every request
 */

import type { AppConfig } from "./config";
import type { SiteEnv } from "./env";
import type { Logger } from "../utils/logger";
import type { BackendClient } from "../utils/backend-client";
import type { PageTemplates } from "../templates";

export interface SiteContext {
  config: AppConfig;
  env: SiteEnv;
  logger: Logger;
  backend: BackendClient;
  templates: PageTemplates;
}
