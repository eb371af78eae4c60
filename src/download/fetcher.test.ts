/**
 * Tests for the Fetcher.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import type { HttpFetch } from "../types.js";
import { Fetcher } from "./fetcher.js";
import { PolitenessGate } from "./politeness.js";

const mockFetch = vi.fn<HttpFetch>();

function createMockResponse(
  body: string,
  options: { status?: number; statusText?: string; contentType?: string; url?: string } = {}
): Response {
  const headers: Record<string, string> = options.contentType ? { "content-type": options.contentType } : {};
  const response = new Response(Buffer.from(body), {
    status: options.status ?? 200,
    statusText: options.statusText ?? "OK",
    headers,
  });
  if (options.url) {
    Object.defineProperty(response, "url", { value: options.url });
  }
  return response;
}

function createFetcher(maxRedirectHops?: number): Fetcher {
  const gate = new PolitenessGate({ loadRobots: async () => "", sleep: async () => {} });
  return new Fetcher({
    gate,
    fetchFn: mockFetch,
    userAgent: "test-agent",
    timeoutMs: 1000,
    ...(maxRedirectHops === undefined ? {} : { maxRedirectHops }),
  });
}

const landingPage = `<html><head>
  <meta name="citation_title" content="A Study">
  <meta name="citation_pdf_url" content="https://example.com/a.pdf">
</head><body></body></html>`;

describe("Fetcher.fetch", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("returns the body and kind of the final response", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse("%PDF-1.4 test", {
        contentType: "application/pdf",
        url: "https://cdn.example.com/a.pdf",
      })
    );

    const result = await createFetcher().fetch("https://example.com/a", "pdf");

    expect(result.error).toBeUndefined();
    expect(result.url).toBe("https://cdn.example.com/a.pdf");
    expect(result.statusCode).toBe(200);
    expect(result.fileKind).toBe("pdf");
    expect(result.content?.toString()).toBe("%PDF-1.4 test");
    expect(mockFetch).toHaveBeenCalledWith(
      "https://example.com/a",
      expect.objectContaining({ headers: { "User-Agent": "test-agent" }, redirect: "follow" })
    );
  });

  it("sniffs the kind when no content type is declared", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse("%PDF-1.5"));

    const result = await createFetcher().fetch("https://example.com/a", "pdf");

    expect(result.error).toBeUndefined();
    expect(result.fileKind).toBe("pdf");
  });

  it("keeps the content of a response of another kind than expected", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse("<html><body>Sign in</body></html>", { contentType: "text/html" })
    );

    const result = await createFetcher().fetch("https://example.com/a.pdf", "pdf");

    expect(result.error).toBe("Unexpected file type");
    expect(result.fileKind).toBe("html");
    expect(result.content?.toString()).toBe("<html><body>Sign in</body></html>");
  });

  it("accepts any kind when none is expected", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse("<html></html>", { contentType: "text/html" }));

    const result = await createFetcher().fetch("https://example.com/");

    expect(result.error).toBeUndefined();
    expect(result.fileKind).toBe("html");
  });

  it("reports HTTP errors with their status", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse("gone", { status: 404, statusText: "Not Found" }));

    const result = await createFetcher().fetch("https://example.com/missing", "pdf");

    expect(result).toEqual({
      url: "https://example.com/missing",
      error: "HTTP error: 404 Not Found",
      statusCode: 404,
    });
  });

  it("reports connection failures without content", async () => {
    const cause = Object.assign(new Error("getaddrinfo ENOTFOUND example.invalid"), { code: "ENOTFOUND" });
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed", { cause }));

    const result = await createFetcher().fetch("https://example.invalid/x");

    expect(result).toEqual({
      url: "https://example.invalid/x",
      error: "Connection error: getaddrinfo ENOTFOUND example.invalid",
    });
  });

  it("reports timeouts", async () => {
    mockFetch.mockRejectedValueOnce(
      Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" })
    );

    const result = await createFetcher().fetch("https://example.com/slow");

    expect(result.error).toBe("Timeout: The operation was aborted due to timeout");
  });

  it("rejects invalid URLs without a request", async () => {
    const result = await createFetcher().fetch("not a url");

    expect(result).toEqual({ url: "not a url", error: "Invalid URL: not a url" });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("follows the single link of a ScienceDirect interim page", async () => {
    mockFetch
      .mockResolvedValueOnce(
        createMockResponse('<html><body><a href="/pdfdirect/S1.pdf">Download</a></body></html>', {
          contentType: "text/html",
        })
      )
      .mockResolvedValueOnce(createMockResponse("%PDF-1.4", { contentType: "application/pdf" }));

    const result = await createFetcher().fetch("https://www.sciencedirect.com/science/article/pii/S1/pdf", "pdf");

    expect(result.error).toBeUndefined();
    expect(result.url).toBe("https://www.sciencedirect.com/pdfdirect/S1.pdf");
    expect(result.fileKind).toBe("pdf");
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("does not follow links of interim pages on other hosts", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse('<html><body><a href="/a.pdf">Download</a></body></html>', { contentType: "text/html" })
    );

    const result = await createFetcher().fetch("https://example.com/article", "pdf");

    expect(result.error).toBe("Unexpected file type");
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});

describe("Fetcher.fetchMetadata", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("extracts the citation metadata of a landing page", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse(landingPage, { contentType: "text/html", url: "https://example.com/article" })
    );

    const result = await createFetcher().fetchMetadata("https://doi.org/10.1234/example");

    expect(result.error).toBeUndefined();
    expect(result.url).toBe("https://example.com/article");
    expect(result.metadata).toEqual([
      { name: "citation_title", value: "A Study" },
      { name: "citation_pdf_url", value: "https://example.com/a.pdf" },
    ]);
  });

  it("parses bodies of unknown kind as HTML", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(landingPage));

    const result = await createFetcher().fetchMetadata("https://example.com/article");

    expect(result.fileKind).toBe("unknown");
    expect(result.metadata).toHaveLength(2);
  });

  it("follows meta refresh pages without metadata", async () => {
    mockFetch
      .mockResolvedValueOnce(
        createMockResponse('<html><head><meta http-equiv="refresh" content="0; url=/landing"></head></html>', {
          contentType: "text/html",
          url: "https://linkinghub.example.com/retrieve/pii/S1",
        })
      )
      .mockResolvedValueOnce(
        createMockResponse(landingPage, { contentType: "text/html", url: "https://www.example.com/article" })
      );

    const result = await createFetcher().fetchMetadata("https://doi.org/10.1234/example");

    expect(result.error).toBeUndefined();
    expect(result.url).toBe("https://www.example.com/article");
    expect(result.metadata).toHaveLength(2);
    expect(mockFetch).toHaveBeenNthCalledWith(2, "https://linkinghub.example.com/landing", expect.anything());
  });

  it("stops following meta refreshes at the hop limit", async () => {
    mockFetch.mockImplementation(async () =>
      createMockResponse('<html><head><meta http-equiv="refresh" content="0; url=/loop"></head></html>', {
        contentType: "text/html",
        url: "https://example.com/loop",
      })
    );

    const result = await createFetcher(2).fetchMetadata("https://example.com/loop");

    expect(result.error).toBe("Too many redirects");
    expect(result.content).toBeUndefined();
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it("reports pages without metadata", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse("<html><head><title>Article</title></head></html>", { contentType: "text/html" })
    );

    const result = await createFetcher().fetchMetadata("https://example.com/article");

    expect(result.error).toBe("No metadata found");
    expect(result.metadata).toBeUndefined();
  });

  it("rejects documents that are not HTML", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse("%PDF-1.4", { contentType: "application/pdf" }));

    const result = await createFetcher().fetchMetadata("https://example.com/a.pdf");

    expect(result.error).toBe("Not HTML page");
    expect(result.fileKind).toBe("pdf");
    expect(result.content).toBeUndefined();
  });

  it("reports empty pages", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse("", { contentType: "text/html" }));

    const result = await createFetcher().fetchMetadata("https://example.com/empty");

    expect(result.error).toBe("Empty or unparseable page");
  });

  it("passes on request failures", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse("denied", { status: 403, statusText: "Forbidden" }));

    const result = await createFetcher().fetchMetadata("https://example.com/article");

    expect(result.error).toBe("HTTP error: 403 Forbidden");
    expect(result.statusCode).toBe(403);
  });
});

describe("Fetcher.fetchJson", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("parses JSON documents", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse('{"is_oa":true}', { contentType: "application/json" }));

    const { result, data } = await createFetcher().fetchJson("https://api.example.com/v2/x");

    expect(result.error).toBeUndefined();
    expect(data).toEqual({ is_oa: true });
  });

  it("reports invalid JSON", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse("{not json", { contentType: "application/json" }));

    const { result, data } = await createFetcher().fetchJson("https://api.example.com/v2/x");

    expect(result.error).toMatch(/^Invalid JSON: /);
    expect(result.content).toBeUndefined();
    expect(data).toBeUndefined();
  });

  it("does not parse responses of another kind", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse("<html></html>", { contentType: "text/html" }));

    const { result, data } = await createFetcher().fetchJson("https://api.example.com/v2/x");

    expect(result.error).toBe("Unexpected file type");
    expect(data).toBeUndefined();
  });
});
