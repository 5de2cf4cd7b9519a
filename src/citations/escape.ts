/**
 * Escape HTML special characters
 *
 * Only & < > " ' are encoded, so every other character of a citation,
 * including = and `, survives escaping unchanged.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
