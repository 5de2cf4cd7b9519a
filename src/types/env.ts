/**
 * Site environment schema
 * Deployment settings read from process environment (and .env)
 */

import { z } from "zod";

export const REQUIRED_ENV_VARS = [
  "SITE_TITLE",
  "BACKEND_URL",
  "SITE_AUTHOR",
  "SITE_AUTHOR_URL",
  "BACKEND_API_KEY",
] as const;

export const SiteEnvSchema = z
  .object({
    SITE_TITLE: z.string(),
    SITE_AUTHOR: z.string(),
    SITE_AUTHOR_URL: z.string(),
    BACKEND_URL: z.string().min(1),
    BACKEND_API_KEY: z.string(),
    // Any non-empty value enables the SMTP TLS check
    CHECK_SMTP_TLS: z.string().optional(),
  })
  .transform((env) => ({
    siteTitle: env.SITE_TITLE,
    siteAuthor: env.SITE_AUTHOR,
    siteAuthorUrl: env.SITE_AUTHOR_URL,
    backendUrl: env.BACKEND_URL.replace(/^\/+|\/+$/g, ""),
    backendApiKey: env.BACKEND_API_KEY,
    checkSmtpTls: Boolean(env.CHECK_SMTP_TLS),
  }));

export type SiteEnv = z.output<typeof SiteEnvSchema>;
