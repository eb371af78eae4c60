/**
 * Publisher URL template strategy.
 *
 * For publishers whose PDF location can be derived from the DOI, try the known
 * URL patterns for the landing page's host.
 */

import { encodeDoi, doiUrl, type Strategy, toHit } from "./strategy.js";

/** PDF URL templates by landing page host; `{doi}` is replaced by the encoded DOI */
export const PUBLISHER_URL_TEMPLATES: Readonly<Record<string, readonly string[]>> = {
  "link.springer.com": [
    "https://link.springer.com/content/pdf/{doi}.pdf",
    "https://page-one.springer.com/pdf/preview/{doi}",
  ],
  "www.magonlinelibrary.com": ["https://www.magonlinelibrary.com/doi/pdf/{doi}"],
  "onlinelibrary.wiley.com": [
    "https://onlinelibrary.wiley.com/doi/pdf/{doi}",
    "https://onlinelibrary.wiley.com/doi/pdfdirect/{doi}",
  ],
  "www.tandfonline.com": ["https://www.tandfonline.com/doi/pdf/{doi}"],
  "www.worldscientific.com": ["https://www.worldscientific.com/doi/pdf/{doi}"],
  "www.jstor.org": ["https://www.jstor.org/stable/pdf/{doi}.pdf"],
  "www.emerald.com": ["https://www.emerald.com/insight/content/doi/{doi}/full/pdf"],
};

/** Candidate PDF URLs for a DOI whose landing page lives on `host`. */
export function templateUrls(host: string, doi: string): string[] {
  const encoded = encodeDoi(doi);
  return (PUBLISHER_URL_TEMPLATES[host] ?? []).map((template) =>
    template.replaceAll("{doi}", encoded)
  );
}

export const urlTemplates: Strategy = {
  name: "url_templates",
  async attempt(doi, fetcher) {
    // The landing page may well answer 403; only the host it lives on matters here.
    const landing = await fetcher.fetch(doiUrl(doi));
    const host = new URL(landing.url).host;

    for (const url of templateUrls(host, doi)) {
      const hit = toHit(await fetcher.fetch(url, "pdf"));
      if (hit) return hit;
    }
    return null;
  },
};
