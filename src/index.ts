/**
 * rfclink - RFC and Internet-Draft citation linking for posture report pages
 */

export {
  linkRfc,
  createCitationLinker,
  linkEscapedText,
  findCitations,
  resolveCitation,
  sectionToAnchor,
  normalizeSection,
  documentUrl,
} from "./citations";
export type { CitationLinker, CitationHost } from "./citations";
export { createHandlebars, loadPageTemplates, loadTemplate } from "./templates";
export type { PageTemplates } from "./templates";
export * from "./site";
export * from "./utils";
export * from "./types";
