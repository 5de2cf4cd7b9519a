/**
 * Document host conventions
 * Builds document URLs for the hosts that publish RFC and draft HTML
 */

import type { CitationsConfig, DocumentKind } from "../types";

export type CitationHost = CitationsConfig["host"];

function trimSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Base URL of a cited document, without fragment
 *
 * Drafts are only rendered by the datatracker, whichever host serves RFCs.
 *
 * @example
 * documentUrl("rfc", "5322", config) // "https://datatracker.ietf.org/doc/html/rfc5322"
 * documentUrl("draft", "draft-ietf-dmarc-base-11", config) // "https://datatracker.ietf.org/doc/html/draft-ietf-dmarc-base-11"
 */
export function documentUrl(
  kind: DocumentKind,
  documentId: string,
  config: CitationsConfig,
): string {
  const datatracker = trimSlashes(config.datatrackerUrl);

  if (kind === "draft") {
    return `${datatracker}/doc/html/${documentId}`;
  }

  switch (config.host) {
    case "rfc-editor":
      return `${trimSlashes(config.rfcEditorUrl)}/rfc/rfc${documentId}.html`;
    case "datatracker":
      return `${datatracker}/doc/html/rfc${documentId}`;
  }
}
