/**
 * Citation linking exports
 */

export { findCitations, citationPattern, CITATION_SOURCE } from "./matcher";
export { sectionToAnchor, normalizeSection } from "./anchor";
export { documentUrl } from "./hosts";
export { escapeHtml } from "./escape";
export type { CitationHost } from "./hosts";
export {
  createCitationLinker,
  linkEscapedText,
  linkRfc,
  resolveCitation,
} from "./linker";
export type { CitationLinker } from "./linker";
