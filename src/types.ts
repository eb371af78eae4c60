/**
 * Fulltext resolution type definitions.
 * Defines the values passed between the fetcher, the strategies and the store.
 */

/**
 * The subset of the global fetch() the resolver relies on; injectable for tests.
 */
export type HttpFetch = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Basic kind of a fetched document, derived from its media type or content.
 */
export type FileKind = "pdf" | "xml" | "html" | "txt" | "epub" | "json" | "png" | "unknown";

/**
 * Outcome of one fetch attempt.
 *
 * Even a request that never produced a response yields a LookupResult.
 * `error` is absent exactly when `content` and `fileKind` are present and the
 * kind matches what the caller asked for.
 */
export interface LookupResult {
  /** URL actually reached, after redirects */
  readonly url: string;
  /** Error classification, e.g. "HTTP error: 404 Not Found" */
  readonly error?: string;
  /** HTTP status code of the final response */
  readonly statusCode?: number;
  /** Raw response body (absent on transport failure) */
  readonly content?: Buffer;
  /** Classified kind of the body (absent on transport failure) */
  readonly fileKind?: FileKind;
}

/**
 * A Google Scholar (`citation_*`) or Dublin Core (`dc.*`) `<meta>` field.
 */
export interface CitationField {
  name: string;
  value: string;
}

/**
 * LookupResult for an HTML landing page, with the metadata found on it.
 */
export interface MetadataLookup extends LookupResult {
  readonly metadata?: readonly CitationField[];
}

/**
 * A successful fetch of a full-text document: a LookupResult without error.
 */
export interface FulltextHit {
  url: string;
  statusCode: number;
  content: Buffer;
  fileKind: FileKind;
}

/**
 * A row of the `doi_fulltext` table.
 */
export interface FulltextRecord {
  doi: string;
  url: string;
  error: string | null;
  statusCode: number | null;
  content: Buffer | null;
  /** Classified file kind, e.g. "pdf" */
  contentType: string | null;
  lastChange: Date;
}
