/**
 * HTML metadata strategy.
 *
 * Follows the DOI to its landing page and uses the full-text link advertised in
 * its `citation_pdf_url`, `citation_xml_url` or `citation_full_html_url` meta tag.
 */

import { extractFulltextLink } from "../html.js";
import { doiUrl, type Strategy, toHit } from "./strategy.js";

export const htmlMeta: Strategy = {
  name: "html_meta",
  async attempt(doi, fetcher) {
    const landing = await fetcher.fetchMetadata(doiUrl(doi));
    if (landing.error !== undefined || !landing.metadata) return null;

    const link = extractFulltextLink(landing.metadata, landing.url);
    if (!link) return null;

    return toHit(await fetcher.fetch(link.url, link.kind));
  },
};
