/**
 * HTML landing page helpers.
 *
 * Extracts Google Scholar / Dublin Core metadata, resolves `<meta http-equiv="refresh">`
 * redirects and picks the full-text link advertised in the metadata.
 */

import { type HTMLElement, NodeType, parse as parseHtml } from "node-html-parser";
import type { CitationField, FileKind } from "./types.js";

const METADATA_PREFIXES = ["citation_", "dc.", "DC."] as const;

/**
 * Metadata fields pointing at full text, in priority order.
 * `citation_fulltext_html_url` is left out on purpose: Springer uses it for
 * landing pages rather than full-text documents.
 */
const FULLTEXT_FIELDS: ReadonlyArray<readonly [string, FileKind]> = [
  ["citation_pdf_url", "pdf"],
  ["citation_xml_url", "xml"],
  ["citation_full_html_url", "html"],
];

const QUOTED_REFRESH_URL = /url\s*=\s*['"](.*?)['"]/i;
const BARE_REFRESH_URL = /url\s*=\s*(.+)/i;

/** Resolve a possibly relative URL, returning null when it cannot be parsed. */
export function resolveUrl(href: string, baseUrl?: string): string | null {
  try {
    return new URL(href.trim(), baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Parse an HTML body. Returns null for empty bodies and for bodies
 * that contain no elements at all.
 */
export function parseHtmlDocument(body: Buffer | string): HTMLElement | null {
  const text = typeof body === "string" ? body : body.toString("utf-8");
  if (text.trim() === "") return null;

  const root = parseHtml(text);
  const hasElements = root.childNodes.some((node) => node.nodeType === NodeType.ELEMENT_NODE);
  return hasElements ? root : null;
}

/** Return all Google Scholar and Dublin Core `<meta>` fields, in document order. */
export function extractCitationMetadata(root: HTMLElement): CitationField[] {
  const fields: CitationField[] = [];
  for (const el of root.getElementsByTagName("meta")) {
    const name = el.getAttribute("name");
    const value = el.getAttribute("content");
    if (name === undefined || value === undefined) continue;
    if (!METADATA_PREFIXES.some((prefix) => name.startsWith(prefix))) continue;
    fields.push({ name, value });
  }
  return fields;
}

/** Group metadata fields by name, e.g. all `citation_author` values together. */
export function groupCitationMetadata(fields: readonly CitationField[]): Map<string, string[]> {
  const grouped = new Map<string, string[]>();
  for (const { name, value } of fields) {
    const values = grouped.get(name) ?? [];
    if (!values.includes(value)) values.push(value);
    grouped.set(name, values);
  }
  return grouped;
}

/**
 * Find the target of an HTML meta refresh (e.g. `content="5; url=/foo"`),
 * resolved against the page URL. Elsevier's linking hub relies on these.
 */
export function resolveMetaRefresh(root: HTMLElement, baseUrl?: string): string | null {
  const refresh = root
    .getElementsByTagName("meta")
    .find((el) => el.getAttribute("http-equiv")?.trim().toLowerCase() === "refresh");
  if (!refresh) return null;

  const content = refresh.getAttribute("content") ?? "";
  const match = QUOTED_REFRESH_URL.exec(content) ?? BARE_REFRESH_URL.exec(content);
  const target = match?.[1]?.trim();
  if (!target) return null;

  return resolveUrl(target, baseUrl);
}

/**
 * Pick the full-text URL advertised in the metadata.
 * Blank values are skipped; relative URLs are resolved against `baseUrl`.
 */
export function extractFulltextLink(
  fields: readonly CitationField[],
  baseUrl?: string
): { url: string; kind: FileKind } | null {
  const grouped = groupCitationMetadata(fields);
  for (const [field, kind] of FULLTEXT_FIELDS) {
    for (const value of grouped.get(field) ?? []) {
      if (value.trim() === "") continue;
      const url = resolveUrl(value, baseUrl);
      if (url) return { url, kind };
    }
  }
  return null;
}

/** All `<a href>` targets on the page, made absolute. */
export function extractLinks(root: HTMLElement, baseUrl: string): string[] {
  const links: string[] = [];
  for (const el of root.getElementsByTagName("a")) {
    const href = el.getAttribute("href");
    if (href === undefined) continue;
    const url = resolveUrl(href, baseUrl);
    if (url) links.push(url);
  }
  return links;
}
