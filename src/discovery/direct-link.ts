/**
 * Direct link strategy: some DOIs resolve straight to a PDF.
 */

import { doiUrl, type Strategy, toHit } from "./strategy.js";

export const directLink: Strategy = {
  name: "direct_link",
  async attempt(doi, fetcher) {
    return toHit(await fetcher.fetch(doiUrl(doi), "pdf"));
  },
};
