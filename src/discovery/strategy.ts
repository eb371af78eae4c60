/**
 * Shared pieces of the resolution strategies.
 */

import type { Fetcher } from "../download/fetcher.js";
import type { FulltextHit, LookupResult } from "../types.js";

export type StrategyName = "direct_link" | "html_meta" | "url_templates" | "unpaywall";

/** The part of the Fetcher the strategies use */
export type StrategyFetcher = Pick<Fetcher, "fetch" | "fetchMetadata" | "fetchJson">;

/**
 * One way of locating the full text for a DOI.
 * `attempt` resolves to null when the strategy found nothing; it does not reject
 * on network or page-structure problems.
 */
export interface Strategy {
  readonly name: StrategyName;
  attempt(doi: string, fetcher: StrategyFetcher): Promise<FulltextHit | null>;
}

const DOI_RESOLVER = "https://doi.org/";

/**
 * Percent-encode a DOI for use in a URL path, keeping "/" as is.
 * Throws URIError for DOIs containing lone surrogates.
 */
export function encodeDoi(doi: string): string {
  return encodeURIComponent(doi).replace(/%2F/gi, "/");
}

/** The doi.org URL for a DOI */
export function doiUrl(doi: string): string {
  return `${DOI_RESOLVER}${encodeDoi(doi)}`;
}

/** Turn a successful lookup into a hit; null for failures. */
export function toHit(result: LookupResult): FulltextHit | null {
  if (
    result.error !== undefined ||
    !result.content ||
    !result.fileKind ||
    result.statusCode === undefined
  ) {
    return null;
  }
  return {
    url: result.url,
    statusCode: result.statusCode,
    content: result.content,
    fileKind: result.fileKind,
  };
}
