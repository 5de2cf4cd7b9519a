import { describe, it, expect, vi, beforeAll, afterEach } from "vitest";
import * as cheerio from "cheerio";
import { SiteService, domainDoesNotExist } from "./service";
import { loadPageTemplates } from "../templates";
import { loadDefaultConfig } from "../utils/load-config";
import { BackendError } from "../utils/errors";
import { Logger } from "../utils/logger";
import type { BackendClient } from "../utils/backend-client";
import type { AppConfig, DomainReport, SiteContext, SiteEnv } from "../types";

const env: SiteEnv = {
  siteTitle: "Posture Check",
  siteAuthor: "Test Author",
  siteAuthorUrl: "https://author.test",
  backendUrl: "https://backend.test",
  backendApiKey: "test-key",
  checkSmtpTls: false,
};

class FakeBackend implements BackendClient {
  requested: string[] = [];

  constructor(private readonly reports: Record<string, DomainReport>) {}

  async fetchDomainReport(domain: string): Promise<DomainReport> {
    this.requested.push(domain);
    const report = this.reports[domain];
    if (!report) {
      throw new BackendError("HTTP 503: Service Unavailable", 503);
    }
    return report;
  }
}

describe("SiteService", () => {
  let config: AppConfig;
  let backend: FakeBackend;
  let site: SiteService;

  beforeAll(async () => {
    config = await loadDefaultConfig();
    backend = new FakeBackend({
      "example.com": {
        soa: { primary_ns: "ns1.example.com" },
        dmarc: { description: "Published per RFC 7489 § 6.3" },
      },
      "nope.test": { soa: { error: "The domain DOES NOT EXIST" } },
    });

    const ctx: SiteContext = {
      config,
      env,
      logger: new Logger("error"),
      backend,
      templates: await loadPageTemplates(config.templates),
    };
    site = new SiteService(ctx);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("renders the home page", () => {
    const page = site.renderHome();
    expect(page.status).toBe(200);
    expect(cheerio.load(page.html)("h1").text()).toBe("Posture Check");
  });

  describe("redirectTarget", () => {
    it("normalizes the submitted domain", () => {
      expect(site.redirectTarget(" Example.COM\u200B")).toBe("/domain/example.com");
    });

    it("encodes non-ASCII names", () => {
      expect(site.redirectTarget("b\u00fccher.de")).toBe("/domain/b%C3%BCcher.de");
    });

    it("rejects an empty domain", () => {
      expect(site.redirectTarget(" \u200B ")).toBeNull();
    });
  });

  describe("renderDomain", () => {
    it("renders the report with linked citations", async () => {
      const page = await site.renderDomain("Example.com");
      const $ = cheerio.load(page.html);

      expect(page.status).toBe(200);
      expect(backend.requested.at(-1)).toBe("example.com");
      expect($("section#dmarc a").attr("href")).toBe(
        "https://datatracker.ietf.org/doc/html/rfc7489#section-6.3",
      );
    });

    it("returns 404 when the domain does not exist", async () => {
      const page = await site.renderDomain("nope.test");
      expect(page.status).toBe(404);
      expect(cheerio.load(page.html)("main p").text()).toBe(
        "The domain nope.test does not exist.",
      );
    });

    it("returns 502 when the backend fails", async () => {
      const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});

      const page = await site.renderDomain("down.test");
      expect(page.status).toBe(502);
      expect(cheerio.load(page.html)("p.error strong").text()).toBe("down.test");
      expect(consoleError).toHaveBeenCalled();
    });
  });
});

describe("domainDoesNotExist", () => {
  it("only matches the does-not-exist error", () => {
    expect(domainDoesNotExist({ soa: {} })).toBe(false);
    expect(domainDoesNotExist({ soa: { error: "Timeout" } })).toBe(false);
    expect(domainDoesNotExist({ soa: { error: "Domain does not exist" } })).toBe(true);
  });
});
