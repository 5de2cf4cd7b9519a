/**
 * Site environment loader
 * Validates deployment settings once at startup
 */

import { REQUIRED_ENV_VARS, SiteEnvSchema } from "../types";
import type { SiteEnv } from "../types";
import { MissingEnvironmentError } from "./errors";

/**
 * Build the site environment from a variables map (process.env by default)
 * Throws MissingEnvironmentError naming every absent variable
 */
export function loadSiteEnv(
  env: Record<string, string | undefined> = process.env,
): SiteEnv {
  const missing = REQUIRED_ENV_VARS.filter((name) => env[name] === undefined);
  if (missing.length > 0) {
    throw new MissingEnvironmentError([...missing]);
  }

  return SiteEnvSchema.parse(env);
}
