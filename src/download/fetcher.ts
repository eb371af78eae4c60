/**
 * Fetcher: the single choke point for outbound requests.
 *
 * Every request goes through the PolitenessGate of its host, follows HTTP
 * redirects and comes back as a LookupResult. Nothing is thrown past this
 * boundary; callers branch on `result.error === undefined`.
 */

import { classifyContent } from "../classify.js";
import {
  extractCitationMetadata,
  extractLinks,
  parseHtmlDocument,
  resolveMetaRefresh,
} from "../html.js";
import { createSilentLogger, type Logger } from "../logger.js";
import type { FileKind, HttpFetch, LookupResult, MetadataLookup } from "../types.js";
import { describeTransportError, httpError, LookupErrors } from "./errors.js";
import type { PolitenessGate } from "./politeness.js";

export const DEFAULT_USER_AGENT = "fulltext-resolver/0.1.0";

/** Default request timeout in ms */
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Default limit on meta-refresh and interim-page hops */
export const DEFAULT_MAX_REDIRECT_HOPS = 5;

/** Hosts that put an interim page with a single link in front of their PDFs */
const INTERIM_PAGE_HOSTS = ["sciencedirect.com"];

export interface FetcherOptions {
  gate: PolitenessGate;
  fetchFn?: HttpFetch;
  userAgent?: string;
  timeoutMs?: number;
  maxRedirectHops?: number;
  logger?: Logger;
}

/** Parsed JSON together with the lookup it came from */
export interface JsonLookup {
  result: LookupResult;
  data?: unknown;
}

/** Turn a result into a failure, dropping its content. */
function failWithoutContent(result: LookupResult, error: string): LookupResult {
  const { content: _content, ...rest } = result;
  return { ...rest, error };
}

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

function hasInterimPages(url: string): boolean {
  const host = new URL(url).hostname;
  return INTERIM_PAGE_HOSTS.some((suffix) => host === suffix || host.endsWith(`.${suffix}`));
}

export class Fetcher {
  private readonly gate: PolitenessGate;
  private readonly fetchFn: HttpFetch;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxRedirectHops: number;
  private readonly logger: Logger;

  constructor(options: FetcherOptions) {
    this.gate = options.gate;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRedirectHops = options.maxRedirectHops ?? DEFAULT_MAX_REDIRECT_HOPS;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Fetch a URL. When `expectedKind` is given and the body turns out to be of
   * another kind, the result keeps its content but carries an
   * "Unexpected file type" error: many servers answer 200 with a "not found" page.
   */
  async fetch(url: string, expectedKind?: FileKind): Promise<LookupResult> {
    return await this.fetchExpecting(url, expectedKind, 0);
  }

  /**
   * Fetch an HTML page and extract its citation metadata.
   * Pages without metadata that carry a meta refresh are followed, up to the hop limit.
   */
  async fetchMetadata(url: string): Promise<MetadataLookup> {
    return await this.fetchMetadataFrom(url, 0);
  }

  /** Fetch a JSON document. */
  async fetchJson(url: string): Promise<JsonLookup> {
    const result = await this.fetch(url, "json");
    if (result.error !== undefined || !result.content) return { result };

    try {
      const data: unknown = JSON.parse(result.content.toString("utf-8"));
      return { result, data };
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      return { result: failWithoutContent(result, `${LookupErrors.invalidJson}: ${detail}`) };
    }
  }

  private async fetchExpecting(
    url: string,
    expectedKind: FileKind | undefined,
    hops: number
  ): Promise<LookupResult> {
    const result = await this.request(url);
    if (result.error !== undefined || expectedKind === undefined || result.fileKind === expectedKind) {
      return result;
    }

    const next = hops < this.maxRedirectHops ? this.interimPageTarget(result) : null;
    if (next) {
      this.logger.debug("interim_page_followed", { url: result.url, next });
      return await this.fetchExpecting(next, expectedKind, hops + 1);
    }

    this.logger.debug("unexpected_file_type", {
      url: result.url,
      expected: expectedKind,
      actual: result.fileKind,
    });
    return { ...result, error: LookupErrors.unexpectedFileType };
  }

  /** ScienceDirect shows an HTML page whose only link leads to the PDF. */
  private interimPageTarget(result: LookupResult): string | null {
    if (result.fileKind !== "html" || !result.content || !hasInterimPages(result.url)) return null;
    const root = parseHtmlDocument(result.content);
    if (!root) return null;
    const links = extractLinks(root, result.url);
    return links.length === 1 ? (links[0] ?? null) : null;
  }

  private async fetchMetadataFrom(url: string, hops: number): Promise<MetadataLookup> {
    const result = await this.request(url);
    if (result.error !== undefined || !result.content) return result;

    if (result.fileKind !== "html" && result.fileKind !== "unknown") {
      return failWithoutContent(result, LookupErrors.notHtml);
    }

    const root = parseHtmlDocument(result.content);
    if (!root) return failWithoutContent(result, LookupErrors.unparseable);

    const metadata = extractCitationMetadata(root);
    if (metadata.length > 0) return { ...result, metadata };

    const target = resolveMetaRefresh(root, result.url);
    if (!target) return { ...result, error: LookupErrors.noMetadata };

    if (hops >= this.maxRedirectHops) {
      this.logger.warn("meta_refresh_limit_reached", { url: result.url, hops });
      return failWithoutContent(result, LookupErrors.tooManyRedirects);
    }
    this.logger.debug("meta_refresh_followed", { url: result.url, target });
    return await this.fetchMetadataFrom(target, hops + 1);
  }

  private async request(url: string): Promise<LookupResult> {
    const target = parseUrl(url);
    if (!target) return { url, error: `${LookupErrors.invalidUrl}: ${url}` };

    try {
      return await this.gate.run(target, async () => {
        this.logger.debug("fetch_start", { url: target.href });
        const response = await this.fetchFn(target.href, {
          headers: { "User-Agent": this.userAgent },
          redirect: "follow",
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        const finalUrl = response.url || target.href;

        if (!response.ok) {
          return {
            url: finalUrl,
            error: httpError(response.status, response.statusText),
            statusCode: response.status,
          };
        }

        const content = Buffer.from(await response.arrayBuffer());
        const fileKind = classifyContent(response.headers.get("content-type"), content);
        return { url: finalUrl, statusCode: response.status, content, fileKind };
      });
    } catch (err) {
      const error = describeTransportError(err);
      this.logger.debug("fetch_failed", { url: target.href, error });
      return { url: target.href, error };
    }
  }
}
