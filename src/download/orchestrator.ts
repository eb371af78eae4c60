/**
 * Batch resolution orchestrator.
 *
 * Starts one resolution task per DOI, all at once; the only throttling is the
 * per-host PolitenessGate behind the fetcher. Each result is committed to the
 * store as soon as its task completes.
 */

import { type Resolution, resolveFulltext } from "../discovery/index.js";
import type { Strategy, StrategyFetcher } from "../discovery/strategy.js";
import { createSilentLogger, type Logger } from "../logger.js";
import type { FulltextStore } from "../store/types.js";
import type { FulltextRecord } from "../types.js";

export type ResolveStatus = "resolved" | "unresolved" | "failed";

export interface ResolveProgress {
  completed: number;
  total: number;
  doi: string;
  status: ResolveStatus;
}

export interface ResolveDependencies {
  store: FulltextStore;
  fetcher: StrategyFetcher;
  strategies: readonly Strategy[];
  logger?: Logger;
}

export interface ResolveOptions {
  /** Called each time a DOI finishes, in completion order */
  onProgress?: (progress: ResolveProgress) => void;
  /** Clock used for last_change (default: new Date()) */
  now?: () => Date;
}

export interface BatchSummary {
  /** DOIs that were looked up in this run */
  total: number;
  /** DOIs skipped because the store already has their full text (or listed twice) */
  skipped: number;
  resolved: number;
  unresolved: number;
  failed: number;
}

/** Build the row stored for a resolution. */
export function toRecord(resolution: Resolution, lastChange: Date): FulltextRecord {
  const { hit } = resolution;
  return {
    doi: resolution.doi,
    url: hit.url,
    error: null,
    statusCode: hit.statusCode,
    content: hit.content,
    contentType: hit.fileKind,
    lastChange,
  };
}

/** DOIs still to resolve: not yet stored, each once, in input order. */
function pendingDois(dois: readonly string[], existing: ReadonlySet<string>): string[] {
  const seen = new Set<string>();
  const pending: string[] = [];
  for (const doi of dois) {
    if (existing.has(doi) || seen.has(doi)) continue;
    seen.add(doi);
    pending.push(doi);
  }
  return pending;
}

/**
 * Resolve and store full texts for a batch of DOIs.
 * DOIs already stored without error are skipped, so an interrupted batch can be re-run.
 */
export async function resolveBatch(
  dois: readonly string[],
  deps: ResolveDependencies,
  options?: ResolveOptions
): Promise<BatchSummary> {
  const logger = deps.logger ?? createSilentLogger();
  const now = options?.now ?? (() => new Date());

  const existing = await deps.store.existingDois();
  const pending = pendingDois(dois, existing);
  const summary: BatchSummary = {
    total: pending.length,
    skipped: dois.length - pending.length,
    resolved: 0,
    unresolved: 0,
    failed: 0,
  };
  logger.info("batch_start", { total: summary.total, skipped: summary.skipped });

  let completed = 0;

  async function resolveOne(doi: string): Promise<ResolveStatus> {
    const resolution = await resolveFulltext(doi, deps.strategies, deps.fetcher, logger);
    if (!resolution) {
      logger.debug("no_fulltext", { doi });
      return "unresolved";
    }

    const inserted = await deps.store.insert(toRecord(resolution, now()));
    if (inserted) {
      logger.info("fulltext_saved", {
        doi,
        url: resolution.hit.url,
        strategy: resolution.strategy,
        fileKind: resolution.hit.fileKind,
      });
    } else {
      logger.warn("fulltext_already_stored", { doi, url: resolution.hit.url });
    }
    return "resolved";
  }

  async function track(doi: string): Promise<void> {
    let status: ResolveStatus;
    try {
      status = await resolveOne(doi);
    } catch (err) {
      logger.error("doi_resolution_failed", {
        doi,
        error: err instanceof Error ? err.message : String(err),
      });
      status = "failed";
    }

    summary[status]++;
    completed++;
    options?.onProgress?.({ completed, total: summary.total, doi, status });
  }

  await Promise.all(pending.map((doi) => track(doi)));

  logger.info("batch_finished", { ...summary });
  return summary;
}
