/**
 * Page template contexts
 */

import type { DomainReport } from "./report";

export interface LayoutContext {
  siteTitle: string;
  siteAuthor: string;
  siteAuthorUrl: string;
  debug: boolean;
  domain?: string;
  // Seconds spent producing the page
  elapsedTime?: number;
}

export type HomePageContext = LayoutContext;

export interface DomainPageContext extends LayoutContext {
  domain: string;
  report: DomainReport;
}

export interface NotFoundPageContext extends LayoutContext {
  domain: string;
}

export interface ErrorPageContext extends LayoutContext {
  domain: string;
  message: string;
}

export interface RenderedPage {
  status: number;
  html: string;
}
