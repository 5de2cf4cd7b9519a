/**
 * Handlebars helpers for report pages
 */

import type Handlebars from "handlebars";
import type { CitationLinker } from "../citations";

type HandlebarsEnvironment = typeof Handlebars;

/**
 * Render backend JSON as nested HTML lists, linking citations in every string
 *
 * @example
 * renderValue({ policy: "reject" }, linkRfc, hbs) // "<dl><dt>policy</dt><dd>reject</dd></dl>"
 */
export function renderValue(
  value: unknown,
  link: CitationLinker,
  hbs: HandlebarsEnvironment,
): string {
  if (typeof value === "string") {
    return link(value).toHTML();
  }

  if (Array.isArray(value)) {
    const items = value.map((item) => `<li>${renderValue(item, link, hbs)}</li>`);
    return `<ul>${items.join("")}</ul>`;
  }

  if (value !== null && typeof value === "object") {
    const rows = Object.entries(value).map(
      ([key, item]) =>
        `<dt>${hbs.escapeExpression(key)}</dt><dd>${renderValue(item, link, hbs)}</dd>`,
    );
    return `<dl>${rows.join("")}</dl>`;
  }

  if (value === null || value === undefined) {
    return "";
  }

  return hbs.escapeExpression(String(value));
}

/**
 * Heading for a report section key; every check name is an acronym
 *
 * @example
 * sectionTitle("mta_sts") // "MTA-STS"
 */
export function sectionTitle(key: string): string {
  return key
    .split(/[_-]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.toUpperCase())
    .join("-");
}

export function registerHelpers(
  hbs: HandlebarsEnvironment,
  link: CitationLinker,
): void {
  // Usage: {{linkRfc result.description}}
  hbs.registerHelper("linkRfc", (text: unknown) =>
    link(text === null || text === undefined ? "" : String(text)),
  );

  // Usage: {{renderValue this}}
  hbs.registerHelper(
    "renderValue",
    (value: unknown) => new hbs.SafeString(renderValue(value, link, hbs)),
  );

  hbs.registerHelper("sectionTitle", (key: unknown) => sectionTitle(String(key)));

  hbs.registerHelper("json", (value: unknown) => JSON.stringify(value, null, 2));
}
