/**
 * Citation Matcher
 * Finds RFC and Internet-Draft citations in already-escaped text
 */

import type { Citation } from "../types";

// Characters a section token may not contain; also the set a match must end on
const SECTION_CHAR = String.raw`[^\s\]),;:.]`;

/**
 * RFC 5322 / RFC5322 / draft-ietf-dmarc-base-11, optionally followed by
 * ", § 4.1.2" / "§§ A.1" / "section 3.4-3.6"
 *
 * A draft may not start right after a hyphen, so a hyphenated run is
 * tried from its first character only.
 */
export const CITATION_SOURCE =
  String.raw`(?:(?<![\p{L}\p{N}_])RFC\s*(?<rfc>\d+)` +
  String.raw`|(?<![\p{L}\p{N}_-])(?<draft>draft-[A-Za-z0-9][A-Za-z0-9-]*?(?:-\d{2})?))` +
  String.raw`(?:\s*,?\s*(?:§{1,2}|section)\s*` +
  `(?<section>${SECTION_CHAR}+(?:\\.${SECTION_CHAR}+)*(?:-${SECTION_CHAR}+)*))?` +
  String.raw`(?=[\s\]),;:.]|$)`;

/**
 * A fresh global citation regex; each scan owns its own lastIndex
 */
export function citationPattern(): RegExp {
  return new RegExp(CITATION_SOURCE, "giu");
}

/**
 * Strip leading zeros so "RFC 0822" and "RFC 822" share a document
 */
function canonicalRfcNumber(digits: string): string {
  return digits.replace(/^0+(?=\d)/, "");
}

/**
 * Convert a regex match into a Citation
 */
function toCitation(match: RegExpMatchArray): Citation {
  const groups = match.groups ?? {};
  const citation: Citation =
    groups.rfc !== undefined
      ? {
          kind: "rfc",
          documentId: canonicalRfcNumber(groups.rfc),
          matchedSpan: match[0],
          index: match.index ?? 0,
        }
      : {
          kind: "draft",
          documentId: (groups.draft ?? "").toLowerCase(),
          matchedSpan: match[0],
          index: match.index ?? 0,
        };

  if (groups.section) {
    citation.rawSection = groups.section;
  }

  return citation;
}

/**
 * Lazily yield every non-overlapping citation, left to right
 *
 * Each call scans with its own copy of the pattern, so the sequence
 * can be restarted by calling again.
 *
 * @example
 * [...findCitations("see RFC 7489, § A.1")]
 * // [{ kind: "rfc", documentId: "7489", rawSection: "A.1", matchedSpan: "RFC 7489, § A.1", index: 4 }]
 */
export function* findCitations(escaped: string): Generator<Citation> {
  for (const match of escaped.matchAll(citationPattern())) {
    yield toCitation(match);
  }
}
