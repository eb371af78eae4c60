/**
 * Resolver configuration.
 *
 * Defaults, overridden by an optional JSON file, overridden by environment
 * variables. The merged result is validated before anything runs.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_CRAWL_DELAY } from "./download/crawl-delays.js";
import { DEFAULT_MAX_REDIRECT_HOPS, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from "./download/fetcher.js";

export const ResolverConfigSchema = z.object({
  /** Contact email for Unpaywall; the Unpaywall strategy is skipped without it */
  unpaywallEmail: z.string().email().optional(),
  userAgent: z.string().min(1),
  requestTimeoutMs: z.number().int().positive(),
  /** Seconds between requests to a host without usable robots.txt */
  defaultCrawlDelay: z.number().int().nonnegative(),
  maxRedirectHops: z.number().int().nonnegative(),
  /** Append-only `host<TAB>seconds` file; crawl delays are kept in memory only when unset */
  crawlDelaysPath: z.string().min(1).optional(),
  storePath: z.string().min(1),
  logLevel: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]),
  logFile: z.string().min(1).optional(),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;

export const DEFAULT_CONFIG: ResolverConfig = {
  userAgent: DEFAULT_USER_AGENT,
  requestTimeoutMs: DEFAULT_TIMEOUT_MS,
  defaultCrawlDelay: DEFAULT_CRAWL_DELAY,
  maxRedirectHops: DEFAULT_MAX_REDIRECT_HOPS,
  crawlDelaysPath: "crawl-delays.tsv",
  storePath: "fulltexts.sqlite",
  logLevel: "info",
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function readConfigFile(configPath?: string): Record<string, unknown> {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `Config file is not valid JSON: ${absolutePath} (${err instanceof Error ? err.message : String(err)})`
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return { ...parsed };
}

/** Unparseable numbers stay strings and fail validation. */
function toNumber(value: string): number | string {
  const parsed = Number(value.trim());
  return value.trim() !== "" && Number.isFinite(parsed) ? parsed : value;
}

function envOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const strings: Array<[string, string]> = [
    ["UNPAYWALL_EMAIL", "unpaywallEmail"],
    ["USER_AGENT", "userAgent"],
    ["CRAWL_DELAYS_PATH", "crawlDelaysPath"],
    ["STORE_PATH", "storePath"],
    ["LOG_LEVEL", "logLevel"],
    ["LOG_FILE", "logFile"],
  ];
  const numbers: Array<[string, string]> = [
    ["REQUEST_TIMEOUT_MS", "requestTimeoutMs"],
    ["DEFAULT_CRAWL_DELAY", "defaultCrawlDelay"],
    ["MAX_REDIRECT_HOPS", "maxRedirectHops"],
  ];

  for (const [name, key] of strings) {
    const value = env[name];
    if (value !== undefined && value !== "") overrides[key] = value;
  }
  for (const [name, key] of numbers) {
    const value = env[name];
    if (value !== undefined && value !== "") overrides[key] = toNumber(value);
  }
  return overrides;
}

/**
 * Load the configuration.
 *
 * @param configPath - Optional JSON file with overrides
 * @param env - Environment to read overrides from
 * @throws ConfigError when the file is missing or unreadable, or a value is invalid
 */
export function loadConfig(configPath?: string, env: Env = process.env): ResolverConfig {
  const merged = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
    ...envOverrides(env),
  };

  const result = ResolverConfigSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  return result.data;
}
