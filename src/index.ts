/**
 * # fulltext-resolver
 *
 * Resolves DOIs to the full text of the articles they identify and stores the
 * documents in a SQLite database.
 *
 * ## Workflow
 *
 * For each DOI, strategies are tried in order until one yields a document:
 *
 * 1. **Direct link**: the DOI resolves straight to a PDF.
 * 2. **HTML metadata**: the landing page advertises the PDF, XML or HTML full text
 *    in its `citation_*` meta tags.
 * 3. **URL templates**: the publisher's PDF location is derived from the DOI.
 * 4. **Unpaywall**: the Unpaywall API knows an Open Access copy.
 *
 * All requests to one host are serialized and spaced by the host's robots.txt
 * `Crawl-delay` (1 second by default).
 *
 * ## Quick Example
 *
 * ```typescript
 * import { exportFulltexts, loadConfig, retrieveFulltexts, SqliteStore } from "fulltext-resolver";
 *
 * const config = loadConfig("resolver.json");
 * const summary = await retrieveFulltexts(["10.1234/example"], config);
 *
 * const store = new SqliteStore(config.storePath);
 * await exportFulltexts(store, "fulltexts");
 * await store.close();
 * ```
 *
 * ## Configuration
 *
 * See {@link loadConfig}. `unpaywallEmail` is required for the Unpaywall strategy.
 *
 * @module fulltext-resolver
 */

import { loadConfig, type ResolverConfig } from "./config.js";
import { createDefaultStrategies } from "./discovery/index.js";
import { CrawlDelayCache } from "./download/crawl-delays.js";
import { Fetcher } from "./download/fetcher.js";
import {
  type BatchSummary,
  type ResolveOptions,
  resolveBatch,
} from "./download/orchestrator.js";
import { createRobotsLoader, PolitenessGate } from "./download/politeness.js";
import { createLogger, type Logger } from "./logger.js";
import { SqliteStore } from "./store/index.js";
import type { HttpFetch } from "./types.js";

export interface RetrieveOptions extends ResolveOptions {
  /** Replaces the global fetch */
  fetchFn?: HttpFetch;
  logger?: Logger;
}

/**
 * Resolve a batch of DOIs and store every full text found.
 * DOIs already in the store are skipped.
 */
export async function retrieveFulltexts(
  dois: readonly string[],
  config: ResolverConfig = loadConfig(),
  options: RetrieveOptions = {}
): Promise<BatchSummary> {
  const { fetchFn = (url, init) => fetch(url, init), logger: givenLogger, ...resolveOptions } = options;
  const logger =
    givenLogger ??
    createLogger({
      level: config.logLevel,
      name: "fulltext-resolver",
      ...(config.logFile ? { logFile: config.logFile } : {}),
    });

  const delays = config.crawlDelaysPath
    ? await CrawlDelayCache.load(config.crawlDelaysPath, logger)
    : new CrawlDelayCache();
  const gate = new PolitenessGate({
    delays,
    loadRobots: createRobotsLoader(fetchFn, {
      userAgent: config.userAgent,
      timeoutMs: config.requestTimeoutMs,
    }),
    defaultDelay: config.defaultCrawlDelay,
    logger,
  });
  const fetcher = new Fetcher({
    gate,
    fetchFn,
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs,
    maxRedirectHops: config.maxRedirectHops,
    logger,
  });

  const store = new SqliteStore(config.storePath);
  try {
    return await resolveBatch(
      dois,
      {
        store,
        fetcher,
        strategies: createDefaultStrategies({ unpaywallEmail: config.unpaywallEmail }),
        logger,
      },
      resolveOptions
    );
  } finally {
    await store.close();
  }
}

// === Configuration & logging ===
export { ConfigError, DEFAULT_CONFIG, loadConfig, ResolverConfigSchema } from "./config.js";
export type { ResolverConfig } from "./config.js";
export { createLogger, createSilentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

// === Classification & metadata ===
export { baseMediaType, classifyContent } from "./classify.js";
export {
  extractCitationMetadata,
  extractFulltextLink,
  extractLinks,
  groupCitationMetadata,
  parseHtmlDocument,
  resolveMetaRefresh,
} from "./html.js";

// === Fetching ===
export { Fetcher } from "./download/fetcher.js";
export type { FetcherOptions, JsonLookup } from "./download/fetcher.js";
export { createRobotsLoader, PolitenessGate } from "./download/politeness.js";
export type { PolitenessGateOptions, RobotsLoader } from "./download/politeness.js";
export { CrawlDelayCache, crawlDelayFromRobots, parseCrawlDelay } from "./download/crawl-delays.js";
export { describeTransportError, isErrorOfKind, LookupErrors } from "./download/errors.js";

// === Strategies & orchestration ===
export { createDefaultStrategies, resolveFulltext } from "./discovery/index.js";
export type { Resolution, StrategyConfig } from "./discovery/index.js";
export { directLink } from "./discovery/direct-link.js";
export { htmlMeta } from "./discovery/html-meta.js";
export { PUBLISHER_URL_TEMPLATES, templateUrls, urlTemplates } from "./discovery/url-templates.js";
export { bestUnpaywallUrl, createUnpaywallStrategy, unpaywallUrl } from "./discovery/unpaywall.js";
export { doiUrl, encodeDoi } from "./discovery/strategy.js";
export type { Strategy, StrategyFetcher, StrategyName } from "./discovery/strategy.js";
export { resolveBatch, toRecord } from "./download/orchestrator.js";
export type {
  BatchSummary,
  ResolveDependencies,
  ResolveOptions,
  ResolveProgress,
  ResolveStatus,
} from "./download/orchestrator.js";

// === Storage & export ===
export { formatTimestamp, parseTimestamp, SqliteStore } from "./store/index.js";
export type { FulltextStore } from "./store/index.js";
export { determineFilename, doiBasename, exportFulltexts, FileWithSameContentError } from "./files.js";
export type { ExportSummary } from "./files.js";

// === Types ===
export type {
  CitationField,
  FileKind,
  FulltextHit,
  FulltextRecord,
  HttpFetch,
  LookupResult,
  MetadataLookup,
} from "./types.js";
