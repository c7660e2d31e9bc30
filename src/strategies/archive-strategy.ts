/**
 * @fileoverview Strategy 3: serve the most recent web-archive snapshot.
 *
 * ```
 *   attempt(url)
 *     |
 *     +--> budget spent?  -> BudgetExhaustedError  (ctx.canAcquire(), reserves nothing)
 *     |
 *     +--> snapshot cache hit?  -- yes --> timestamp (or "none")
 *     |         | no
 *     |         v
 *     |    ctx.pace()
 *     |    GET {base}/__wb/sparkline?url=...&collection=web&output=json
 *     |         -> { first_ts, last_ts }   (not budgeted, cached)
 *     |
 *     +--> no last_ts  -> SnapshotNotFoundError
 *     |
 *     +--> ctx.acquire()                   (one budget unit)
 *     +--> GET {base}/web/{last_ts}/{url}
 *     +--> unwrap archive-rewritten hrefs, report the page as `url`
 * ```
 *
 * The archive rewrites every link in a snapshot to point back into the
 * archive. Those prefixes are stripped so the links resolve against the live
 * origin and the crawl continues on the site itself.
 *
 * @module strategies/archive-strategy
 */

import { z } from "zod";
import { config } from "../config.js";
import { snapshotCache, type SnapshotCache } from "../services/cache.js";
import { httpGet, type FetchImpl } from "../services/fetch.js";
import {
  BudgetExhaustedError,
  ExtractionError,
  SnapshotNotFoundError,
} from "../utils/errors.js";
import type { HostValidator } from "../utils/network.js";
import type {
  AttemptContext,
  FetchStrategy,
  StrategyOutcome,
} from "./strategy.js";

/** Timeout for the index query, which answers with a few bytes of JSON. */
const INDEX_TIMEOUT_MS = 10_000;

/**
 * Shape of the archive's sparkline answer. Only the timestamps matter; the
 * per-year histogram it also carries is ignored.
 */
const sparklineSchema = z.object({
  first_ts: z.union([z.string(), z.number()]).nullish(),
  last_ts: z.union([z.string(), z.number()]).nullish(),
});

/** Escape a literal for use inside a RegExp. */
function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Strip archive prefixes (`{base}/web/20240101000000/` or the host-relative
 * `/web/20240101000000im_/`) from href attribute values.
 */
export function unwrapArchiveLinks(html: string, baseUrl: string): string {
  const pattern = new RegExp(
    `(href\\s*=\\s*["']?)(?:${escapeRegExp(baseUrl)})?/web/\\d{1,14}[a-z_]*/`,
    "gi",
  );
  return html.replace(pattern, "$1");
}

export interface ArchiveStrategyOptions {
  /** Archive root, e.g. `https://web.archive.org`. */
  baseUrl?: string;
  /** Timeout for the snapshot fetch in milliseconds. */
  timeout?: number;
  maxBytes?: number;
  fetchImpl?: FetchImpl;
  validateHost?: HostValidator | false;
  cache?: SnapshotCache;
}

export class ArchiveStrategy implements FetchStrategy {
  readonly name = "archived" as const;

  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxBytes: number | undefined;
  private readonly fetchImpl: FetchImpl | undefined;
  private readonly validateHost: HostValidator | false | undefined;
  private readonly cache: SnapshotCache;

  constructor(options: ArchiveStrategyOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.archiveBaseUrl).replace(/\/+$/, "");
    this.timeout = options.timeout ?? config.directTimeout;
    this.maxBytes = options.maxBytes;
    this.fetchImpl = options.fetchImpl;
    this.validateHost = options.validateHost;
    this.cache = options.cache ?? snapshotCache;
  }

  /** The index query URL for `url`. */
  indexUrl(url: string): string {
    return (
      `${this.baseUrl}/__wb/sparkline?url=${encodeURIComponent(url)}` +
      `&collection=web&output=json`
    );
  }

  /** The archived copy of `url` at `timestamp`. */
  snapshotUrl(url: string, timestamp: string): string {
    return `${this.baseUrl}/web/${timestamp}/${url}`;
  }

  /**
   * Timestamp of the newest snapshot of `url`, or `null` when there is none.
   * Answers are cached, negative ones included; `pace` runs only before a
   * query that actually goes out.
   */
  async latestTimestamp(
    url: string,
    headers: Record<string, string>,
    pace?: () => Promise<void>,
  ): Promise<string | null> {
    const cached = this.cache.get(url);
    if (cached !== undefined) {
      return cached.timestamp;
    }

    if (pace) {
      await pace();
    }

    const response = await httpGet(this.indexUrl(url), {
      headers: { ...headers, Accept: "application/json" },
      timeout: INDEX_TIMEOUT_MS,
      fetchImpl: this.fetchImpl,
      validateHost: this.validateHost,
      requireHtml: false,
    });

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch {
      throw new SnapshotNotFoundError(`Archive index returned invalid JSON for ${url}`);
    }

    const parsed = sparklineSchema.safeParse(json);
    if (!parsed.success) {
      throw new SnapshotNotFoundError(
        `Archive index answer for ${url} has an unexpected shape: ${parsed.error.message}`,
      );
    }

    const lastTs = parsed.data.last_ts;
    const timestamp =
      lastTs === null || lastTs === undefined || String(lastTs) === ""
        ? null
        : String(lastTs);

    this.cache.set(url, { timestamp, fetchedAt: Date.now() });
    return timestamp;
  }

  async attempt(url: string, ctx: AttemptContext): Promise<StrategyOutcome> {
    if (!ctx.canAcquire()) {
      throw new BudgetExhaustedError(`Budget denied ${url} before the archive lookup`);
    }

    const timestamp = await this.latestTimestamp(url, ctx.nextHeaders(), () => ctx.pace());
    if (timestamp === null) {
      throw new SnapshotNotFoundError(`No archived snapshot of ${url}`);
    }

    const archivedUrl = this.snapshotUrl(url, timestamp);
    console.error(`[archive] Using snapshot ${archivedUrl}`);

    await ctx.acquire();

    const response = await httpGet(archivedUrl, {
      headers: ctx.nextHeaders(),
      timeout: this.timeout,
      maxBytes: this.maxBytes,
      fetchImpl: this.fetchImpl,
      validateHost: this.validateHost,
    });

    if (response.body.trim() === "") {
      throw new ExtractionError(`Empty archived copy of ${url}`);
    }

    return {
      html: unwrapArchiveLinks(response.body, this.baseUrl),
      finalUrl: url,
    };
  }
}
