/**
 * Site exports
 */

export { SiteService, domainDoesNotExist } from "./service";
export { createSiteContext } from "./context";
export { createApp, startServer } from "./server";
