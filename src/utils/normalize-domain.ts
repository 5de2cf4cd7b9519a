/**
 * Zero-width space, non-joiner, joiner and byte order mark
 */
const ZERO_WIDTH = /[\u200B-\u200D\uFEFF]/g;

/**
 * Normalize a submitted domain before it is looked up
 * Domains are case-insensitive; pasted names often carry hidden characters
 *
 * @example
 * normalizeDomain(" Example.COM ") // "example.com"
 * normalizeDomain("exa\u200Bmple.com") // "example.com"
 */
export function normalizeDomain(domain: string): string {
  return domain.normalize("NFC").replace(ZERO_WIDTH, "").trim().toLowerCase();
}
