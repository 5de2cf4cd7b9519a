/**
 * Citation type definitions
 */

import type Handlebars from "handlebars";

export type DocumentKind = "rfc" | "draft";

/**
 * A single RFC or Internet-Draft reference found in escaped text
 */
export interface Citation {
  kind: DocumentKind;
  // RFC: decimal digits without leading zeros; draft: lower-cased name
  documentId: string;
  rawSection?: string;
  // Exact substring of the escaped input, used as link text
  matchedSpan: string;
  index: number;
}

export interface ResolvedLink {
  kind: DocumentKind;
  documentId: string;
  fragment: string;
  href: string;
}

/**
 * HTML that must not be escaped again by the template engine
 */
export type SafeHtml = Handlebars.SafeString;
