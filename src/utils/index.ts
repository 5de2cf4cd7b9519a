/**
 * Utility exports
 */

// Config utilities
export { loadConfig, loadDefaultConfig, getUserConfigPath, mergeConfig } from "./load-config";
export { loadSiteEnv } from "./load-env";

// Domain utilities
export { normalizeDomain } from "./normalize-domain";

// Backend
export { HttpBackendClient } from "./backend-client";
export type { BackendClient, BackendClientOptions } from "./backend-client";

// Errors
export { BackendError, MissingEnvironmentError } from "./errors";

// Classes
export { Logger } from "./logger";
