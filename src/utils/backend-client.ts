/**
 * Backend client
 * Fetches domain posture reports with retry logic
 */

import { DomainReportSchema } from "../types";
import type { DomainReport } from "../types";
import { BackendError } from "./errors";
import type { Logger } from "./logger";

export interface BackendClient {
  fetchDomainReport(domain: string): Promise<DomainReport>;
}

export interface BackendClientOptions {
  baseUrl: string;
  apiKey: string;
  checkSmtpTls?: boolean;
  timeout?: number;
  retries?: number;
  // Base delay before the first retry, doubled on each attempt
  backoffMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_RETRIES = 2;
const DEFAULT_BACKOFF_MS = 1000;

/**
 * Server errors and network failures are retried; anything the backend
 * answered with a 4xx or an unusable body is final
 */
function isRetryable(error: unknown): boolean {
  if (error instanceof BackendError) {
    return error.status === undefined || error.status >= 500;
  }
  return true;
}

export class HttpBackendClient implements BackendClient {
  private readonly timeout: number;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: BackendClientOptions) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.retries = options.retries ?? DEFAULT_RETRIES;
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Report URL for a domain, including the API key
   *
   * @example
   * client.reportUrl("example.com")
   * // "https://backend.test/domain/example.com?api_key=test-key"
   */
  reportUrl(domain: string): string {
    const params = new URLSearchParams({ api_key: this.options.apiKey });
    if (this.options.checkSmtpTls) {
      params.set("check_smtp_tls", "True");
    }
    return `${this.options.baseUrl}/domain/${encodeURIComponent(domain)}?${params.toString()}`;
  }

  async fetchDomainReport(domain: string): Promise<DomainReport> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        return await this.fetchOnce(domain);
      } catch (error) {
        lastError = error;
        if (!isRetryable(error) || attempt === this.retries) {
          break;
        }
        this.options.logger?.warn(
          `Backend request for ${domain} failed (attempt ${attempt + 1}), retrying`,
        );
        // Exponential backoff: 1s, 2s, 4s...
        await new Promise((r) =>
          setTimeout(r, Math.pow(2, attempt) * this.backoffMs),
        );
      }
    }

    if (lastError instanceof BackendError) {
      throw lastError;
    }
    throw new BackendError(`Failed to fetch report for ${domain}`, undefined, {
      cause: lastError,
    });
  }

  private async fetchOnce(domain: string): Promise<DomainReport> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchImpl(this.reportUrl(domain), {
        signal: controller.signal,
        headers: { accept: "application/json" },
      });

      if (response.status >= 500) {
        // Release the connection before retrying
        await response.body?.cancel();
        throw new BackendError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
        );
      }

      // The backend reports unknown domains inside the body, so a parsable
      // report is used whatever the status
      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new BackendError("Backend returned invalid JSON", response.status, {
          cause: error,
        });
      }

      const report = DomainReportSchema.safeParse(body);
      if (!report.success) {
        const message = response.ok
          ? "Backend returned an unexpected report"
          : `HTTP ${response.status}: ${response.statusText}`;
        throw new BackendError(message, response.status, {
          cause: report.error,
        });
      }

      return report.data;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
