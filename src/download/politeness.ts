/**
 * Per-host politeness gate.
 *
 * Requests to one host run one at a time. Each request first sleeps for the
 * host's crawl delay while holding the host's slot, so the next request's wait
 * only starts once the current one has finished. The delay is discovered from
 * robots.txt on first contact with a host, inside the same slot, so discovery
 * happens at most once per host. Different hosts never wait for each other.
 *
 * The limiter map lives as long as the gate; create one gate per batch.
 */

import pLimit, { type LimitFunction } from "p-limit";
import { createSilentLogger, type Logger } from "../logger.js";
import type { HttpFetch } from "../types.js";
import { CrawlDelayCache, crawlDelayFromRobots, DEFAULT_CRAWL_DELAY } from "./crawl-delays.js";
import { httpError } from "./errors.js";

/** Fetch the body of a robots.txt URL; rejects when it is unavailable. */
export type RobotsLoader = (robotsUrl: string) => Promise<string>;

export interface PolitenessGateOptions {
  delays?: CrawlDelayCache;
  loadRobots: RobotsLoader;
  /** Seconds to wait when a host has no usable robots.txt (default: 1) */
  defaultDelay?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Build a RobotsLoader on top of fetch. */
export function createRobotsLoader(
  fetchFn: HttpFetch,
  options: { userAgent: string; timeoutMs: number }
): RobotsLoader {
  return async (robotsUrl) => {
    const response = await fetchFn(robotsUrl, {
      headers: { "User-Agent": options.userAgent },
      redirect: "follow",
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(httpError(response.status, response.statusText));
    }
    return await response.text();
  };
}

export class PolitenessGate {
  readonly delays: CrawlDelayCache;
  private readonly loadRobots: RobotsLoader;
  private readonly defaultDelay: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly limiters = new Map<string, LimitFunction>();

  constructor(options: PolitenessGateOptions) {
    this.delays = options.delays ?? new CrawlDelayCache();
    this.loadRobots = options.loadRobots;
    this.defaultDelay = options.defaultDelay ?? DEFAULT_CRAWL_DELAY;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Run `task` once the host of `url` is free and its crawl delay has elapsed.
   * Rejections from `task` are passed on after the host is released.
   */
  async run<T>(url: URL, task: () => Promise<T>): Promise<T> {
    const limit = this.limiterFor(url.host);
    return await limit(async () => {
      const delay = await this.crawlDelay(url);
      await this.sleep(delay * 1000);
      return await task();
    });
  }

  private limiterFor(host: string): LimitFunction {
    let limit = this.limiters.get(host);
    if (!limit) {
      limit = pLimit(1);
      this.limiters.set(host, limit);
    }
    return limit;
  }

  /** Look up the delay for a host, reading its robots.txt on first contact. */
  private async crawlDelay(url: URL): Promise<number> {
    const host = url.host;
    const known = this.delays.get(host);
    if (known !== undefined) return known;

    const robotsUrl = `${url.protocol}//${host}/robots.txt`;
    let delay = this.defaultDelay;
    try {
      delay = crawlDelayFromRobots(await this.loadRobots(robotsUrl), this.defaultDelay);
      this.logger.debug("robots_checked", { host, delay });
    } catch (err) {
      this.logger.debug("robots_unavailable", {
        host,
        delay,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    try {
      await this.delays.set(host, delay);
    } catch (err) {
      this.logger.warn("crawl_delay_persist_failed", {
        host,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return delay;
  }
}
