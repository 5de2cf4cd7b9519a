/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const CitationsConfigSchema = z.object({
  // Which host RFC links point at; drafts always go to the datatracker
  host: z.enum(["datatracker", "rfc-editor"]),
  datatrackerUrl: z.string().url(),
  rfcEditorUrl: z.string().url(),
});

export const ServerConfigSchema = z.object({
  host: z.string(),
  port: z.number().int().nonnegative(),
  debug: z.boolean(),
});

export const BackendConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  retries: z.number().int().nonnegative(),
});

// Custom template file paths; null keeps the built-in default
export const TemplatesConfigSchema = z.object({
  home: z.string().nullable(),
  domain: z.string().nullable(),
  notFound: z.string().nullable(),
  error: z.string().nullable(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const AppConfigSchema = z.object({
  citations: CitationsConfigSchema,
  server: ServerConfigSchema,
  backend: BackendConfigSchema,
  templates: TemplatesConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialAppConfigSchema = AppConfigSchema.partial().extend({
  citations: CitationsConfigSchema.partial().optional(),
  server: ServerConfigSchema.partial().optional(),
  backend: BackendConfigSchema.partial().optional(),
  templates: TemplatesConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type CitationsConfig = z.infer<typeof CitationsConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;

export const DEFAULT_CITATIONS_CONFIG: CitationsConfig = {
  host: "datatracker",
  datatrackerUrl: "https://datatracker.ietf.org",
  rfcEditorUrl: "https://www.rfc-editor.org",
};

export interface ConfigError {
  path: string;
  error: unknown;
}
