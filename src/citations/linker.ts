/**
 * Citation Linker
 * Escapes untrusted text and wraps every citation in a link
 */

import Handlebars from "handlebars";
import { findCitations } from "./matcher";
import { sectionToAnchor } from "./anchor";
import { documentUrl } from "./hosts";
import { escapeHtml } from "./escape";
import { DEFAULT_CITATIONS_CONFIG } from "../types";
import type {
  Citation,
  CitationsConfig,
  ResolvedLink,
  SafeHtml,
} from "../types";

export type CitationLinker = (text: string) => SafeHtml;

/**
 * Resolve a citation to its document URL and in-document fragment
 */
export function resolveCitation(
  citation: Citation,
  config: CitationsConfig = DEFAULT_CITATIONS_CONFIG,
): ResolvedLink {
  const fragment =
    citation.rawSection !== undefined
      ? sectionToAnchor(citation.rawSection)
      : "";
  const base = documentUrl(citation.kind, citation.documentId, config);

  return {
    kind: citation.kind,
    documentId: citation.documentId,
    fragment,
    href: fragment ? `${base}#${fragment}` : base,
  };
}

/**
 * Link citations in text that has already been escaped
 * Returns a plain string: callers own the trust decision
 */
export function linkEscapedText(
  escaped: string,
  config: CitationsConfig = DEFAULT_CITATIONS_CONFIG,
): string {
  let html = "";
  let cursor = 0;

  for (const citation of findCitations(escaped)) {
    const link = resolveCitation(citation, config);
    html += escaped.slice(cursor, citation.index);
    html += `<a href="${link.href}">${citation.matchedSpan}</a>`;
    cursor = citation.index + citation.matchedSpan.length;
  }

  return html + escaped.slice(cursor);
}

/**
 * Create a linker bound to one host convention
 *
 * @example
 * const link = createCitationLinker({ ...DEFAULT_CITATIONS_CONFIG, host: "rfc-editor" });
 * link("RFC 7489 § 6.3").toString()
 * // '<a href="https://www.rfc-editor.org/rfc/rfc7489.html#section-6.3">RFC 7489 § 6.3</a>'
 */
export function createCitationLinker(
  config: CitationsConfig = DEFAULT_CITATIONS_CONFIG,
): CitationLinker {
  return (text: string) =>
    new Handlebars.SafeString(
      linkEscapedText(escapeHtml(text), config),
    );
}

/**
 * Turn RFC/draft citations into datatracker links
 *
 * Recognizes, among others:
 * - RFC 5322
 * - (RFC 7489)
 * - RFC9116 section 2.1.2.
 * - RFC 7489, § A.1
 * - draft-ietf-dmarc-base-11 § 4.2
 */
export const linkRfc: CitationLinker = createCitationLinker();
