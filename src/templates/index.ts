/**
 * Template utilities for Handlebars page rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { createCitationLinker } from "../citations";
import type { CitationLinker } from "../citations";
import type {
  DomainPageContext,
  ErrorPageContext,
  HomePageContext,
  NotFoundPageContext,
  TemplatesConfig,
} from "../types";
import {
  DEFAULT_DOMAIN_TEMPLATE,
  DEFAULT_ERROR_TEMPLATE,
  DEFAULT_HOME_TEMPLATE,
  DEFAULT_NOT_FOUND_TEMPLATE,
  FOOTER_PARTIAL,
  HEADER_PARTIAL,
} from "./defaults";
import { registerHelpers } from "./helpers";

export { renderValue, sectionTitle } from "./helpers";

export interface PageTemplates {
  home: HandlebarsTemplateDelegate<HomePageContext>;
  domain: HandlebarsTemplateDelegate<DomainPageContext>;
  notFound: HandlebarsTemplateDelegate<NotFoundPageContext>;
  error: HandlebarsTemplateDelegate<ErrorPageContext>;
}

/**
 * Create an isolated Handlebars environment with the site helpers and partials
 */
export function createHandlebars(
  link: CitationLinker = createCitationLinker(),
): typeof Handlebars {
  const hbs = Handlebars.create();
  registerHelpers(hbs, link);
  hbs.registerPartial("header", HEADER_PARTIAL);
  hbs.registerPartial("footer", FOOTER_PARTIAL);
  return hbs;
}

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate<T>(
  hbs: typeof Handlebars,
  templatePath: string | null,
  defaultTemplate: string,
): Promise<HandlebarsTemplateDelegate<T>> {
  if (templatePath === null) {
    return hbs.compile<T>(defaultTemplate);
  }

  const templateContent = await readFile(templatePath, "utf-8");
  return hbs.compile<T>(templateContent);
}

/**
 * Compile every page template, preferring configured files over the defaults
 */
export async function loadPageTemplates(
  config: TemplatesConfig,
  link?: CitationLinker,
): Promise<PageTemplates> {
  const hbs = createHandlebars(link);

  const [home, domain, notFound, error] = await Promise.all([
    loadTemplate<HomePageContext>(hbs, config.home, DEFAULT_HOME_TEMPLATE),
    loadTemplate<DomainPageContext>(hbs, config.domain, DEFAULT_DOMAIN_TEMPLATE),
    loadTemplate<NotFoundPageContext>(hbs, config.notFound, DEFAULT_NOT_FOUND_TEMPLATE),
    loadTemplate<ErrorPageContext>(hbs, config.error, DEFAULT_ERROR_TEMPLATE),
  ]);

  return { home, domain, notFound, error };
}
