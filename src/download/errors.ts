/**
 * Error classifications carried in LookupResult.error.
 */

export const LookupErrors = {
  connection: "Connection error",
  timeout: "Timeout",
  certificate: "Certificate error",
  http: "HTTP error",
  tooManyRedirects: "Too many redirects",
  invalidUrl: "Invalid URL",
  notHtml: "Not HTML page",
  unparseable: "Empty or unparseable page",
  noMetadata: "No metadata found",
  unexpectedFileType: "Unexpected file type",
  invalidJson: "Invalid JSON",
} as const;

/** Error codes raised by Node's TLS layer for certificate problems */
const CERTIFICATE_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_UNTRUSTED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

const TIMEOUT_CODES = new Set(["ETIMEDOUT", "UND_ERR_CONNECT_TIMEOUT", "UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT"]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Format an HTTP status failure, e.g. "HTTP error: 404 Not Found". */
export function httpError(status: number, statusText: string): string {
  return `${LookupErrors.http}: ${`${status} ${statusText}`.trim()}`;
}

/**
 * Classify an error thrown by fetch().
 * fetch wraps network failures in a TypeError whose `cause` holds the system error.
 */
export function describeTransportError(err: unknown): string {
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
    return `${LookupErrors.timeout}: ${err.message}`;
  }

  const cause = err instanceof Error && err.cause !== undefined ? err.cause : err;
  const code = errorCode(cause);
  const detail = errorMessage(cause);

  if (code && CERTIFICATE_CODES.has(code)) return `${LookupErrors.certificate}: ${detail}`;
  if (code && TIMEOUT_CODES.has(code)) return `${LookupErrors.timeout}: ${detail}`;
  if (code === "ERR_INVALID_URL") return `${LookupErrors.invalidUrl}: ${detail}`;
  if (/redirect count exceeded/i.test(detail)) return LookupErrors.tooManyRedirects;

  return `${LookupErrors.connection}: ${detail}`;
}

/** True when a LookupResult error is of the given classification. */
export function isErrorOfKind(error: string | undefined, kind: keyof typeof LookupErrors): boolean {
  return error !== undefined && error.startsWith(LookupErrors[kind]);
}
