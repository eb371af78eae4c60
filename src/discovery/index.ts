/**
 * Fulltext strategy chain.
 * Tries the resolution strategies in a fixed order and stops at the first hit.
 */

import { createSilentLogger, type Logger } from "../logger.js";
import type { FulltextHit } from "../types.js";
import { directLink } from "./direct-link.js";
import { htmlMeta } from "./html-meta.js";
import type { Strategy, StrategyFetcher, StrategyName } from "./strategy.js";
import { createUnpaywallStrategy } from "./unpaywall.js";
import { urlTemplates } from "./url-templates.js";

export interface StrategyConfig {
  /** Contact email for the Unpaywall API; the Unpaywall strategy is inert without it */
  unpaywallEmail?: string | undefined;
}

export interface Resolution {
  doi: string;
  strategy: StrategyName;
  hit: FulltextHit;
}

/**
 * The default chain: direct link, HTML metadata, publisher URL templates, Unpaywall.
 */
export function createDefaultStrategies(config: StrategyConfig = {}): Strategy[] {
  return [directLink, htmlMeta, urlTemplates, createUnpaywallStrategy(config.unpaywallEmail)];
}

/**
 * Resolve a DOI to its full text by trying each strategy in order.
 *
 * @returns the first hit with the strategy that found it, or null when none did
 */
export async function resolveFulltext(
  doi: string,
  strategies: readonly Strategy[],
  fetcher: StrategyFetcher,
  logger: Logger = createSilentLogger()
): Promise<Resolution | null> {
  for (const strategy of strategies) {
    logger.debug("strategy_attempt", { doi, strategy: strategy.name });
    const hit = await strategy.attempt(doi, fetcher);
    if (hit) {
      logger.debug("strategy_hit", { doi, strategy: strategy.name, url: hit.url });
      return { doi, strategy: strategy.name, hit };
    }
  }
  return null;
}
