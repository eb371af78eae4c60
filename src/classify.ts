/**
 * Content classification for fetched documents.
 *
 * Maps a declared Content-Type and/or the leading bytes of a body to a FileKind.
 * Many publishers answer with HTTP 200 and an HTML page where a PDF was promised,
 * so callers compare the classified kind with the kind they expected.
 */

import type { FileKind } from "./types.js";

/** Media type (without parameters) to file kind */
const MEDIA_TYPES: Readonly<Record<string, FileKind>> = {
  "application/pdf": "pdf",
  "application/xml": "xml",
  "text/xml": "xml",
  "text/html": "html",
  "text/plain": "txt",
  "application/epub+zip": "epub",
  "application/json": "json",
  "image/png": "png",
};

const PDF_MAGIC = Buffer.from("%PDF", "latin1");
const JATS_ARTICLE = Buffer.from("<article", "latin1");

/** Strip parameters such as "; charset=utf-8" from a media type. */
export function baseMediaType(mediaType: string | null | undefined): string | null {
  if (!mediaType) return null;
  const base = (mediaType.split(";")[0] ?? "").trim().toLowerCase();
  return base === "" ? null : base;
}

function sniff(body: Uint8Array): FileKind {
  const bytes = Buffer.from(body.buffer, body.byteOffset, body.byteLength);
  if (bytes.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC)) return "pdf";
  if (bytes.subarray(0, JATS_ARTICLE.length).equals(JATS_ARTICLE)) return "xml";
  return "unknown";
}

/**
 * Classify a document by its declared media type, falling back to content sniffing
 * when the media type is missing or not one we know.
 */
export function classifyContent(
  mediaType: string | null | undefined,
  body: Uint8Array
): FileKind {
  const base = baseMediaType(mediaType);
  const known = base ? MEDIA_TYPES[base] : undefined;
  return known ?? sniff(body);
}
