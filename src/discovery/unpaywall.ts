/**
 * Unpaywall strategy.
 * Asks the Unpaywall API for the best Open Access location of a DOI.
 *
 * API: https://api.unpaywall.org/v2/{doi}?email={email}
 * Rate limit: 100,000 requests/day (no per-second limit documented)
 */

import { z } from "zod";
import { encodeDoi, type Strategy, type StrategyFetcher, toHit } from "./strategy.js";

const UNPAYWALL_BASE_URL = "https://api.unpaywall.org/v2";

const UnpaywallLocationSchema = z.object({
  url: z.string().nullish(),
  url_for_pdf: z.string().nullish(),
  url_for_landing_page: z.string().nullish(),
});

const UnpaywallResponseSchema = z.object({
  is_oa: z.boolean(),
  best_oa_location: UnpaywallLocationSchema.nullish(),
});

export type UnpaywallResponse = z.infer<typeof UnpaywallResponseSchema>;

/** Build the Unpaywall API URL for a DOI (email is URL-encoded). */
export function unpaywallUrl(doi: string, email: string): string {
  return `${UNPAYWALL_BASE_URL}/${encodeDoi(doi)}?email=${encodeURIComponent(email)}`;
}

/**
 * Look up the best OA location for a DOI.
 * Prefers the location's direct PDF link over its generic URL.
 *
 * @returns the URL, or null when the work is closed, unknown or the lookup failed
 */
export async function bestUnpaywallUrl(
  doi: string,
  email: string,
  fetcher: StrategyFetcher
): Promise<string | null> {
  const { result, data } = await fetcher.fetchJson(unpaywallUrl(doi, email));
  if (result.error !== undefined) return null;

  const parsed = UnpaywallResponseSchema.safeParse(data);
  if (!parsed.success || !parsed.data.is_oa) return null;

  const location = parsed.data.best_oa_location;
  return location?.url_for_pdf || location?.url || null;
}

/**
 * Create the Unpaywall strategy. Unpaywall requires a contact email;
 * without one the strategy never finds anything.
 */
export function createUnpaywallStrategy(email: string | undefined): Strategy {
  return {
    name: "unpaywall",
    async attempt(doi, fetcher) {
      if (!email) return null;

      const url = await bestUnpaywallUrl(doi, email, fetcher);
      if (!url) return null;

      return toHit(await fetcher.fetch(url, "pdf"));
    },
  };
}
