/**
 * Anchor Mapper
 * Maps a cited section to the fragment used by IETF HTML renderings
 */

const NUMERIC_SECTION = /^\d+(?:\.\d+)*$/;
const APPENDIX_SECTION = /^([A-Za-z])(?:\.(\d+(?:\.\d+)*))?$/;
const TRAILING_PUNCTUATION = /[).,;: ]+$/;

/**
 * Collapse whitespace and drop trailing prose punctuation
 *
 * @example
 * normalizeSection(" 2.1.2. ") // "2.1.2"
 * normalizeSection("Appendix  B);") // "Appendix B"
 */
export function normalizeSection(section: string): string {
  return section
    .trim()
    .replace(/\s+/g, " ")
    .replace(TRAILING_PUNCTUATION, "");
}

/**
 * Convert a section reference into an anchor fragment (without "#")
 *
 * @example
 * sectionToAnchor("4.1.2") // "section-4.1.2"
 * sectionToAnchor("A") // "appendix-a"
 * sectionToAnchor("A.1.2") // "appendix-a-1-2"
 * sectionToAnchor("3.4-3.6") // "section-3-4-3-6"
 */
export function sectionToAnchor(section: string): string {
  const normalized = normalizeSection(section);

  if (NUMERIC_SECTION.test(normalized)) {
    return `section-${normalized}`;
  }

  const appendix = APPENDIX_SECTION.exec(normalized);
  if (appendix) {
    const letter = appendix[1].toLowerCase();
    const tail = appendix[2] ? `-${appendix[2].replace(/\./g, "-")}` : "";
    return `appendix-${letter}${tail}`;
  }

  // Punctuation-only input degrades to "section-"
  const slug = normalized
    .replace(/[^A-Za-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .toLowerCase();
  return `section-${slug}`;
}
