/**
 * Site Service
 * Renders the home page and domain report pages
 */

import { normalizeDomain } from "../utils/normalize-domain";
import type {
  DomainReport,
  LayoutContext,
  RenderedPage,
  SiteContext,
} from "../types";

/**
 * The backend reports unknown domains as an SOA lookup error
 */
export function domainDoesNotExist(report: DomainReport): boolean {
  const error = report.soa.error;
  return error !== undefined && error.toLowerCase().includes("does not exist");
}

function elapsedSeconds(startedAt: number): number {
  return Math.round(performance.now() - startedAt) / 1000;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SiteService {
  constructor(private readonly ctx: SiteContext) {}

  private layout(): LayoutContext {
    const { env, config } = this.ctx;
    return {
      siteTitle: env.siteTitle,
      siteAuthor: env.siteAuthor,
      siteAuthorUrl: env.siteAuthorUrl,
      debug: config.server.debug,
    };
  }

  renderHome(): RenderedPage {
    return { status: 200, html: this.ctx.templates.home(this.layout()) };
  }

  /**
   * Path of the report page for a submitted domain, or null when nothing
   * is left after normalization
   *
   * @example
   * site.redirectTarget(" Example.COM") // "/domain/example.com"
   */
  redirectTarget(rawDomain: string): string | null {
    const domain = normalizeDomain(rawDomain);
    if (domain.length === 0) {
      return null;
    }
    return `/domain/${encodeURIComponent(domain)}`;
  }

  /**
   * Fetch and render the report for a domain
   * 200 with the report, 404 when the domain does not exist, 502 when the
   * backend could not be reached
   */
  async renderDomain(
    rawDomain: string,
    startedAt: number = performance.now(),
  ): Promise<RenderedPage> {
    const { backend, templates, logger } = this.ctx;
    const domain = normalizeDomain(rawDomain);

    let report: DomainReport;
    try {
      report = await backend.fetchDomainReport(domain);
    } catch (error) {
      logger.error(`Failed to fetch report for ${domain}`, error);
      return {
        status: 502,
        html: templates.error({
          ...this.layout(),
          domain,
          message: errorMessage(error),
          elapsedTime: elapsedSeconds(startedAt),
        }),
      };
    }

    const elapsedTime = elapsedSeconds(startedAt);

    if (domainDoesNotExist(report)) {
      logger.debug(`${domain} does not exist`);
      return {
        status: 404,
        html: templates.notFound({ ...this.layout(), domain, elapsedTime }),
      };
    }

    return {
      status: 200,
      html: templates.domain({ ...this.layout(), domain, report, elapsedTime }),
    };
  }
}
