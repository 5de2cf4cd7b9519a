/**
 * Central type exports
 */

// Configuration
export type {
  AppConfig,
  PartialAppConfig,
  CitationsConfig,
  ServerConfig,
  BackendConfig,
  TemplatesConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  AppConfigSchema,
  PartialAppConfigSchema,
  DEFAULT_CITATIONS_CONFIG,
} from "./config";

// Environment
export type { SiteEnv } from "./env";
export { SiteEnvSchema, REQUIRED_ENV_VARS } from "./env";

// Citations
export type { Citation, DocumentKind, ResolvedLink, SafeHtml } from "./citation";

// Backend report
export type { DomainReport, ReportSection } from "./report";
export { DomainReportSchema, ReportSectionSchema } from "./report";

// Pages
export type {
  LayoutContext,
  HomePageContext,
  DomainPageContext,
  NotFoundPageContext,
  ErrorPageContext,
  RenderedPage,
} from "./site";

// Context
export type { SiteContext } from "./context";
