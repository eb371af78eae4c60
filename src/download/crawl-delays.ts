/**
 * Crawl delay bookkeeping.
 *
 * A CrawlDelayCache maps host names to the number of seconds to wait between
 * requests to that host. It can be backed by an append-only text file with one
 * `host<TAB>seconds` line per host, so later runs skip robots.txt discovery.
 */

import { appendFile, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createSilentLogger, type Logger } from "../logger.js";

/** Delay used when a host has no usable robots.txt */
export const DEFAULT_CRAWL_DELAY = 1;

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export class CrawlDelayCache {
  private readonly delays = new Map<string, number>();
  private readonly filePath: string | undefined;

  constructor(filePath?: string, entries: Iterable<readonly [string, number]> = []) {
    this.filePath = filePath;
    for (const [host, delay] of entries) {
      this.delays.set(host, delay);
    }
  }

  /**
   * Load a cache from its file, creating the file when it does not exist yet.
   * Malformed lines are skipped.
   */
  static async load(filePath: string, logger: Logger = createSilentLogger()): Promise<CrawlDelayCache> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      if (!isNotFound(err)) throw err;
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, "", "utf-8");
      raw = "";
    }

    const entries: Array<[string, number]> = [];
    for (const [index, line] of raw.split("\n").entries()) {
      if (line.trim() === "") continue;
      const parts = line.trim().split(/\s+/);
      const [host, delay] = parts;
      const seconds = Number(delay);
      if (parts.length !== 2 || !host || !Number.isInteger(seconds) || seconds < 0) {
        logger.warn("crawl_delay_line_skipped", { file: filePath, line: index + 1 });
        continue;
      }
      entries.push([host, seconds]);
    }

    return new CrawlDelayCache(filePath, entries);
  }

  has(host: string): boolean {
    return this.delays.has(host);
  }

  get(host: string): number | undefined {
    return this.delays.get(host);
  }

  get size(): number {
    return this.delays.size;
  }

  /**
   * Record the delay for a host and append it to the backing file.
   * An existing entry is never overwritten.
   */
  async set(host: string, delay: number): Promise<void> {
    if (this.delays.has(host)) return;
    this.delays.set(host, delay);
    if (this.filePath) {
      await appendFile(this.filePath, `${host}\t${delay}\n`, "utf-8");
    }
  }
}

/**
 * Parse the `Crawl-delay` that applies to the wildcard user agent.
 *
 * Records are started by one or more consecutive `User-agent` lines.
 * Fractional delays are rounded up to whole seconds.
 *
 * @returns the delay in seconds, or undefined when none is declared
 */
export function parseCrawlDelay(robotsTxt: string): number | undefined {
  let agents: string[] = [];
  let inAgentLines = false;
  let delay: number | undefined;

  for (const rawLine of robotsTxt.split(/\r?\n/)) {
    const line = (rawLine.split("#")[0] ?? "").trim();
    const separator = line.indexOf(":");
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (key === "user-agent") {
      if (!inAgentLines) agents = [];
      agents.push(value);
      inAgentLines = true;
      continue;
    }

    inAgentLines = false;
    if (key === "crawl-delay" && agents.includes("*") && delay === undefined) {
      const seconds = Number(value);
      if (value !== "" && Number.isFinite(seconds) && seconds >= 0) {
        delay = Math.ceil(seconds);
      }
    }
  }

  return delay;
}

/** Delay to use for a robots.txt body: its wildcard Crawl-delay, unless missing or zero. */
export function crawlDelayFromRobots(robotsTxt: string, defaultDelay = DEFAULT_CRAWL_DELAY): number {
  const delay = parseCrawlDelay(robotsTxt);
  return delay === undefined || delay === 0 ? defaultDelay : delay;
}
