import { describe, it, expect, vi } from "vitest";
import { HttpBackendClient } from "./backend-client";
import type { BackendClientOptions } from "./backend-client";
import { BackendError } from "./errors";

const REPORT = { soa: { serial: 2024010101 }, dmarc: { policy: "reject" } };

function jsonResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "content-type": "application/json" },
  });
}

function createFetch() {
  return vi.fn(
    async (_input: Parameters<typeof fetch>[0], _init?: RequestInit): Promise<Response> =>
      jsonResponse(REPORT),
  );
}

function createClient(
  fetchImpl: typeof fetch,
  options: Partial<BackendClientOptions> = {},
): HttpBackendClient {
  return new HttpBackendClient({
    baseUrl: "https://backend.test",
    apiKey: "test-key",
    backoffMs: 0,
    fetch: fetchImpl,
    ...options,
  });
}

describe("HttpBackendClient", () => {
  describe("reportUrl", () => {
    it("passes the API key as a query parameter", () => {
      const client = createClient(createFetch());
      expect(client.reportUrl("example.com")).toBe(
        "https://backend.test/domain/example.com?api_key=test-key",
      );
    });

    it("requests the SMTP TLS check when enabled", () => {
      const client = createClient(createFetch(), { checkSmtpTls: true });
      expect(client.reportUrl("example.com")).toBe(
        "https://backend.test/domain/example.com?api_key=test-key&check_smtp_tls=True",
      );
    });
  });

  describe("fetchDomainReport", () => {
    it("returns the parsed report", async () => {
      const fetchMock = createFetch();
      const report = await createClient(fetchMock).fetchDomainReport("example.com");

      expect(report).toEqual(REPORT);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(String(fetchMock.mock.calls[0][0])).toBe(
        "https://backend.test/domain/example.com?api_key=test-key",
      );
    });

    it("uses a report body whatever the status", async () => {
      const body = { soa: { error: "Domain does not exist" } };
      const fetchMock = createFetch();
      fetchMock.mockResolvedValueOnce(jsonResponse(body, 404, "Not Found"));

      await expect(createClient(fetchMock).fetchDomainReport("nope.test")).resolves.toEqual(body);
    });

    it("retries server errors", async () => {
      const fetchMock = createFetch();
      fetchMock.mockResolvedValueOnce(jsonResponse({}, 503, "Service Unavailable"));

      const report = await createClient(fetchMock).fetchDomainReport("example.com");
      expect(report).toEqual(REPORT);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("releases the body of a server error before retrying", async () => {
      const failed = jsonResponse({}, 502, "Bad Gateway");
      const fetchMock = createFetch();
      fetchMock.mockResolvedValueOnce(failed);

      await createClient(fetchMock).fetchDomainReport("example.com");
      expect(failed.bodyUsed).toBe(true);
    });

    it("gives up after the configured retries", async () => {
      const fetchMock = createFetch();
      fetchMock.mockImplementation(async () => jsonResponse({}, 503, "Service Unavailable"));

      const request = createClient(fetchMock, { retries: 2 }).fetchDomainReport("example.com");
      await expect(request).rejects.toBeInstanceOf(BackendError);
      await expect(request).rejects.toMatchObject({
        status: 503,
        message: "HTTP 503: Service Unavailable",
      });
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it("does not retry a client error without a report", async () => {
      const fetchMock = createFetch();
      fetchMock.mockResolvedValueOnce(jsonResponse({ detail: "bad key" }, 401, "Unauthorized"));

      await expect(createClient(fetchMock).fetchDomainReport("example.com")).rejects.toMatchObject({
        name: "BackendError",
        status: 401,
        message: "HTTP 401: Unauthorized",
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("rejects a body that is not JSON", async () => {
      const fetchMock = createFetch();
      fetchMock.mockResolvedValueOnce(new Response("not json", { status: 200 }));

      await expect(createClient(fetchMock).fetchDomainReport("example.com")).rejects.toMatchObject({
        status: 200,
        message: "Backend returned invalid JSON",
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("wraps network failures", async () => {
      const failure = new TypeError("fetch failed");
      const fetchMock = createFetch();
      fetchMock.mockRejectedValue(failure);

      const request = createClient(fetchMock, { retries: 1 }).fetchDomainReport("example.com");
      await expect(request).rejects.toMatchObject({
        message: "Failed to fetch report for example.com",
        cause: failure,
      });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });
});
